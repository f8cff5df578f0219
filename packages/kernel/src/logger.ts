/**
 * Logger
 *
 * Structured logging on top of pino. Components take a named child once at
 * module load and log objects first, message second:
 *
 * ```typescript
 * const log = Logger.for("CallDispatcher");
 * log.info({ sessionId, callId }, "call completed");
 * ```
 *
 * The starting level comes from `SWITCHYARD_LOG_LEVEL` (default "info").
 * `Logger.configure()` changes the level of the root and of every child
 * handed out so far.
 *
 * @module @switchyard/kernel/logger
 */

import { pino, type Logger as PinoLogger, type LevelWithSilent } from "pino";

export type LogLevel = LevelWithSilent;

export type ComponentLogger = PinoLogger;

export interface LoggerConfig {
  level: LogLevel;
}

const LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LEVELS.some((level) => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.SWITCHYARD_LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

let root: PinoLogger | null = null;
const children = new Set<PinoLogger>();

function getRoot(): PinoLogger {
  if (!root) {
    root = pino({ name: "switchyard", level: initialLevel(), base: {} });
  }
  return root;
}

export const Logger = {
  /** Named child logger, bound to `{ component }` */
  for(component: string): ComponentLogger {
    const child = getRoot().child({ component });
    children.add(child);
    return child;
  },

  configure(config: LoggerConfig): void {
    const logger = getRoot();
    logger.level = config.level;
    for (const child of children) {
      child.level = config.level;
    }
  },

  get level(): string {
    return getRoot().level;
  },
};
