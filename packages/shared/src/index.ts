/**
 * # Switchyard Shared
 *
 * Platform-independent pieces used by both ends of the wire:
 *
 * - **Protocol** - call envelopes, immediate responses, stream events, headers
 * - **Schemas** - zod validation for everything that crosses the wire
 * - **Errors** - the call-scoped error taxonomy
 * - **Framing** - Server-Sent Event encoding and incremental decoding
 *
 * @module @switchyard/shared
 */

export * from "./protocol.js";
export * from "./schemas.js";
export * from "./errors.js";
export * from "./framing.js";
