/**
 * @switchyard/express - Express adapter for the switchyard gateway
 *
 * Mounts an embedded Gateway as Express middleware. Routing, negotiation
 * and streaming all stay in @switchyard/gateway.
 *
 * @example
 * ```typescript
 * import express from "express";
 * import { createSwitchyardMiddleware, method } from "@switchyard/express";
 * import { z } from "zod";
 *
 * const app = express();
 *
 * const rpc = createSwitchyardMiddleware({
 *   methods: {
 *     echo: async (params) => params.msg,
 *     reports: {
 *       build: method({
 *         schema: z.object({ year: z.number() }),
 *         mode: "long-running",
 *         handler: async function* ({ year }) {
 *           yield `building ${year}`;
 *         },
 *       }),
 *     },
 *   },
 * });
 *
 * app.use("/api", rpc);
 * const server = app.listen(3000);
 *
 * process.on("SIGTERM", () => {
 *   server.close();
 *   void rpc.gateway.close();
 * });
 * ```
 *
 * @module @switchyard/express
 */

import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { Gateway, type GatewayConfig } from "@switchyard/gateway";

export interface SwitchyardMiddlewareOptions {
  /**
   * Extract a token from the Express request. When it returns one, the
   * request is forwarded with `Authorization: Bearer <token>`.
   */
  getToken?: (req: Request) => string | undefined;
}

/**
 * Gateway config for the middleware, without standalone-only options.
 */
export type SwitchyardExpressConfig = Omit<GatewayConfig, "port" | "host" | "embedded">;

/**
 * Express Router with the gateway it delegates to.
 */
export type SwitchyardRouter = Router & {
  gateway: Gateway;
};

/**
 * Create Express middleware that delegates to an embedded Gateway.
 *
 * The gateway's session sweep is not started; call `router.gateway.start()`
 * to expire idle sessions and `router.gateway.close()` on shutdown.
 */
export function createSwitchyardMiddleware(
  gatewayConfig: SwitchyardExpressConfig = {},
  options: SwitchyardMiddlewareOptions = {},
): SwitchyardRouter {
  const gateway = createSwitchyardGateway(gatewayConfig);
  const router = Object.assign(Router(), { gateway });

  router.use((req: Request, res: Response, next: NextFunction) => {
    if (options.getToken) {
      const token = options.getToken(req);
      if (token) {
        req.headers.authorization = `Bearer ${token}`;
      }
    }

    gateway.handleRequest(req, res).catch(next);
  });

  return router;
}

/**
 * Create an embedded gateway without the router, for frameworks that wire
 * `handleRequest` themselves.
 */
export function createSwitchyardGateway(gatewayConfig: SwitchyardExpressConfig = {}): Gateway {
  return new Gateway({
    ...gatewayConfig,
    embedded: true,
  });
}

export {
  Gateway,
  method,
  type GatewayConfig,
  type MethodDefinition,
  type CallContext,
} from "@switchyard/gateway";
