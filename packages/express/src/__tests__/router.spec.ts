/**
 * Express Middleware Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import express, { type Express } from "express";
import request from "supertest";
import { EventDecoder } from "@switchyard/shared";
import { createSwitchyardMiddleware, Gateway, method, type SwitchyardRouter } from "../index.js";

const methods = {
  echo: (params: Record<string, unknown>) => params.msg,
  whoami: method({ handler: (_params, ctx) => ctx.identity ?? null }),
  words: method({
    mode: "long-running",
    handler: async function* () {
      yield "Hello, ";
      yield "world";
    },
  }),
};

describe("createSwitchyardMiddleware", () => {
  let router: SwitchyardRouter;

  function createApp(options: Parameters<typeof createSwitchyardMiddleware>[1] = {}, parseJson = false): Express {
    const app = express();
    if (parseJson) app.use(express.json());
    router = createSwitchyardMiddleware({ methods }, options);
    app.use("/api", router);
    return app;
  }

  afterEach(async () => {
    await router.gateway.close();
  });

  it("attaches an embedded gateway", () => {
    createApp();
    expect(router.gateway).toBeInstanceOf(Gateway);
    expect(router.gateway.status.methods).toEqual(["echo", "whoami", "words"]);
  });

  it("answers immediate calls", async () => {
    const app = createApp();

    const res = await request(app)
      .post("/api/rpc")
      .set("Accept", "application/json")
      .send({ id: "1", method: "echo", params: { msg: "hi" } });

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ id: "1", result: "hi" });
    expect(res.headers["mcp-session-id"]).toMatch(/^[0-9a-f]{32}$/);
  });

  it("uses a body already parsed by express.json()", async () => {
    const app = createApp({}, true);

    const res = await request(app)
      .post("/api/rpc")
      .send({ id: 2, method: "echo", params: { msg: "parsed" } });

    expect(res.body).toEqual({ id: 2, result: "parsed" });
  });

  it("streams long-running calls", async () => {
    const app = createApp();

    const res = await request(app)
      .post("/api/rpc")
      .set("Accept", "application/json, text/event-stream")
      .send({ id: "s", method: "words" })
      .buffer(true);

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("text/event-stream");
    const events = new EventDecoder().feed(res.text);
    expect(events.map((event) => event.kind)).toEqual(["start", "content", "content", "end"]);
  });

  it("forwards tokens from getToken as a bearer token", async () => {
    const app = createApp({ getToken: (req) => req.header("x-api-key") });

    const res = await request(app)
      .post("/api/rpc")
      .set("x-api-key", "test-key")
      .send({ id: 3, method: "whoami" });

    expect(res.body).toEqual({ id: 3, result: "test-key" });
  });

  it("answers unknown routes under the mount point", async () => {
    const app = createApp();

    const res = await request(app).get("/api/nowhere");

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ id: null, error: { code: "NOT_FOUND", message: "Not found" } });
  });
});
