/**
 * Command-line entry: serve the methods exported by a module.
 */

import { resolve } from "path";
import { pathToFileURL } from "url";
import { Logger } from "@switchyard/kernel";
import { loadConfigFromEnv } from "./config.js";
import { createGateway, type Gateway } from "./gateway.js";
import { isMethodDefinition, type MethodsConfig } from "./types.js";

const log = Logger.for("CLI");

export const USAGE = `Usage: switchyard-gateway <methods-module>

The module must export \`methods\` (or a default export) shaped like
GatewayConfig.methods. Settings come from SWITCHYARD_* environment variables.`;

/**
 * Check that a value is a methods tree: functions, method() definitions and
 * nested namespaces of those, at any depth.
 */
export function isMethodsConfig(value: unknown): value is MethodsConfig {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  return Object.values(value).every(
    (entry) => typeof entry === "function" || isMethodDefinition(entry) || isMethodsConfig(entry),
  );
}

/**
 * Import a module and return its `methods` export, or its default export.
 */
export async function loadMethodsModule(modulePath: string): Promise<MethodsConfig> {
  const url = pathToFileURL(resolve(modulePath)).href;
  const mod: unknown = await import(url);

  if (typeof mod === "object" && mod !== null) {
    if ("methods" in mod && isMethodsConfig(mod.methods)) return mod.methods;
    if ("default" in mod && isMethodsConfig(mod.default)) return mod.default;
  }
  throw new Error(`${modulePath} does not export a methods tree`);
}

/**
 * Start a standalone gateway and stop it on SIGINT/SIGTERM.
 */
export async function runGateway(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
): Promise<Gateway> {
  const [modulePath] = argv;
  if (!modulePath) {
    throw new Error(USAGE);
  }

  const { gateway: config, logLevel } = loadConfigFromEnv(env);
  if (logLevel) {
    Logger.configure({ level: logLevel });
  }

  const methods = await loadMethodsModule(modulePath);
  const gateway = createGateway({ ...config, methods });
  await gateway.start();

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    gateway.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        log.error({ err: error }, "shutdown failed");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  return gateway;
}
