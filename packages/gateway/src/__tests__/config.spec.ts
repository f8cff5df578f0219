/**
 * Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { loadConfigFromEnv, resolveGatewayConfig } from "../config.js";

describe("resolveGatewayConfig", () => {
  it("fills in defaults", () => {
    const config = resolveGatewayConfig({ id: "gw-1" });

    expect(config).toMatchObject({
      port: 18790,
      host: "127.0.0.1",
      id: "gw-1",
      embedded: false,
      path: "/rpc",
      httpPathPrefix: "",
      httpCorsOrigin: "*",
      keepaliveMs: 15_000,
      sessions: { idleTimeoutMs: 1_800_000, sweepIntervalMs: 60_000 },
      calls: { idleTimeoutMs: 300_000 },
      replay: { enabled: true, capacity: 1024, gracePeriodMs: 30_000 },
      negotiation: { paramsSizeThreshold: 256, methods: {} },
    });
  });

  it("normalizes paths", () => {
    const config = resolveGatewayConfig({ path: "calls/", httpPathPrefix: "/api/" });

    expect(config.path).toBe("/calls");
    expect(config.httpPathPrefix).toBe("/api");
  });

  it("generates an id", () => {
    expect(resolveGatewayConfig().id).toMatch(/^gw-[0-9a-z]+$/);
  });
});

describe("loadConfigFromEnv", () => {
  it("reads SWITCHYARD_* variables", () => {
    const { gateway, logLevel } = loadConfigFromEnv({
      SWITCHYARD_PORT: "9000",
      SWITCHYARD_HOST: "0.0.0.0",
      SWITCHYARD_REPLAY_ENABLED: "0",
      SWITCHYARD_REPLAY_CAPACITY: "64",
      SWITCHYARD_CALL_IDLE_TIMEOUT_MS: "5000",
      SWITCHYARD_LOG_LEVEL: "debug",
    });

    expect(gateway.port).toBe(9000);
    expect(gateway.host).toBe("0.0.0.0");
    expect(gateway.replay).toEqual({ enabled: false, capacity: 64, gracePeriodMs: undefined });
    expect(gateway.calls).toEqual({ idleTimeoutMs: 5000 });
    expect(logLevel).toBe("debug");
  });

  it("leaves unset variables to the defaults", () => {
    const { gateway, logLevel } = loadConfigFromEnv({});
    const resolved = resolveGatewayConfig(gateway);

    expect(resolved.port).toBe(18790);
    expect(resolved.replay.enabled).toBe(true);
    expect(logLevel).toBeUndefined();
  });

  it("rejects invalid values", () => {
    expect(() => loadConfigFromEnv({ SWITCHYARD_PORT: "not-a-port" })).toThrow();
    expect(() => loadConfigFromEnv({ SWITCHYARD_REPLAY_ENABLED: "maybe" })).toThrow();
    expect(() => loadConfigFromEnv({ SWITCHYARD_LOG_LEVEL: "loud" })).toThrow();
  });
});
