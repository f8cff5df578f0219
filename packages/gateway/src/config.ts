/**
 * Gateway configuration defaults and environment loading.
 */

import { z } from "zod";
import { isLogLevel, type LogLevel } from "@switchyard/kernel";
import { DEFAULT_CALL_IDLE_TIMEOUT_MS } from "./dispatcher.js";
import { DEFAULT_PARAMS_SIZE_THRESHOLD } from "./negotiator.js";
import { DEFAULT_REPLAY_CAPACITY, DEFAULT_REPLAY_GRACE_MS } from "./replay-buffer.js";
import type { GatewayConfig, MethodClass } from "./types.js";

export const DEFAULT_PORT = 18790;
export const DEFAULT_HOST = "127.0.0.1";
export const DEFAULT_PATH = "/rpc";
export const DEFAULT_SESSION_IDLE_TIMEOUT_MS = 30 * 60 * 1000;
export const DEFAULT_SESSION_SWEEP_INTERVAL_MS = 60_000;
export const DEFAULT_KEEPALIVE_MS = 15_000;

export interface ResolvedGatewayConfig {
  port: number;
  host: string;
  id: string;
  embedded: boolean;
  path: string;
  httpPathPrefix: string;
  httpCorsOrigin: string;
  keepaliveMs: number;
  sessions: { idleTimeoutMs: number; sweepIntervalMs: number };
  calls: { idleTimeoutMs: number };
  replay: { enabled: boolean; capacity: number; gracePeriodMs: number };
  negotiation: { paramsSizeThreshold: number; methods: Record<string, MethodClass> };
  identify: NonNullable<GatewayConfig["identify"]> | undefined;
}

export function resolveGatewayConfig(config: GatewayConfig = {}): ResolvedGatewayConfig {
  return {
    port: config.port ?? DEFAULT_PORT,
    host: config.host ?? DEFAULT_HOST,
    id: config.id ?? `gw-${Date.now().toString(36)}`,
    embedded: config.embedded ?? false,
    path: normalizePath(config.path ?? DEFAULT_PATH),
    httpPathPrefix: config.httpPathPrefix ? normalizePath(config.httpPathPrefix) : "",
    httpCorsOrigin: config.httpCorsOrigin ?? "*",
    keepaliveMs: config.keepaliveMs ?? DEFAULT_KEEPALIVE_MS,
    sessions: {
      idleTimeoutMs: config.sessions?.idleTimeoutMs ?? DEFAULT_SESSION_IDLE_TIMEOUT_MS,
      sweepIntervalMs: config.sessions?.sweepIntervalMs ?? DEFAULT_SESSION_SWEEP_INTERVAL_MS,
    },
    calls: {
      idleTimeoutMs: config.calls?.idleTimeoutMs ?? DEFAULT_CALL_IDLE_TIMEOUT_MS,
    },
    replay: {
      enabled: config.replay?.enabled ?? true,
      capacity: config.replay?.capacity ?? DEFAULT_REPLAY_CAPACITY,
      gracePeriodMs: config.replay?.gracePeriodMs ?? DEFAULT_REPLAY_GRACE_MS,
    },
    negotiation: {
      paramsSizeThreshold:
        config.negotiation?.paramsSizeThreshold ?? DEFAULT_PARAMS_SIZE_THRESHOLD,
      methods: { ...config.negotiation?.methods },
    },
    identify: config.identify,
  };
}

/** Leading slash, no trailing slash */
function normalizePath(path: string): string {
  const trimmed = path.replace(/\/+$/, "");
  return trimmed.startsWith("/") ? trimmed : `/${trimmed}`;
}

// ============================================================================
// Environment
// ============================================================================

const booleanFromEnv = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  SWITCHYARD_PORT: z.coerce.number().int().min(0).max(65535).optional(),
  SWITCHYARD_HOST: z.string().min(1).optional(),
  SWITCHYARD_PATH: z.string().min(1).optional(),
  SWITCHYARD_CORS_ORIGIN: z.string().min(1).optional(),
  SWITCHYARD_KEEPALIVE_MS: z.coerce.number().int().nonnegative().optional(),
  SWITCHYARD_SESSION_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  SWITCHYARD_CALL_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  SWITCHYARD_REPLAY_ENABLED: booleanFromEnv.optional(),
  SWITCHYARD_REPLAY_CAPACITY: z.coerce.number().int().positive().optional(),
  SWITCHYARD_REPLAY_GRACE_MS: z.coerce.number().int().nonnegative().optional(),
  SWITCHYARD_PARAMS_SIZE_THRESHOLD: z.coerce.number().int().nonnegative().optional(),
  SWITCHYARD_LOG_LEVEL: z.string().refine(isLogLevel, "unknown log level").optional(),
});

export interface EnvConfig {
  gateway: GatewayConfig;
  logLevel?: LogLevel;
}

/**
 * Read `SWITCHYARD_*` variables. Unset variables leave the defaults in
 * place; invalid ones throw a ZodError naming the variable.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const vars = envSchema.parse(env);

  const gateway: GatewayConfig = {
    port: vars.SWITCHYARD_PORT,
    host: vars.SWITCHYARD_HOST,
    path: vars.SWITCHYARD_PATH,
    httpCorsOrigin: vars.SWITCHYARD_CORS_ORIGIN,
    keepaliveMs: vars.SWITCHYARD_KEEPALIVE_MS,
    sessions: { idleTimeoutMs: vars.SWITCHYARD_SESSION_IDLE_TIMEOUT_MS },
    calls: { idleTimeoutMs: vars.SWITCHYARD_CALL_IDLE_TIMEOUT_MS },
    replay: {
      enabled: vars.SWITCHYARD_REPLAY_ENABLED,
      capacity: vars.SWITCHYARD_REPLAY_CAPACITY,
      gracePeriodMs: vars.SWITCHYARD_REPLAY_GRACE_MS,
    },
    negotiation: { paramsSizeThreshold: vars.SWITCHYARD_PARAMS_SIZE_THRESHOLD },
  };

  const level = vars.SWITCHYARD_LOG_LEVEL;
  return { gateway, logLevel: level && isLogLevel(level) ? level : undefined };
}
