/**
 * # Switchyard Kernel
 *
 * Low-level primitives the gateway and client build on:
 *
 * - **Logger** - structured logging with configurable levels
 * - **EventBuffer** - append-only event log with replay and async iteration
 *
 * @module @switchyard/kernel
 */

export * from "./logger.js";
export * from "./event-buffer.js";
