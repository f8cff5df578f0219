/**
 * @switchyard/client - Client SDK for a switchyard gateway
 *
 * @example
 * ```typescript
 * import { createClient } from '@switchyard/client';
 *
 * const client = createClient({ baseUrl: 'http://127.0.0.1:18790' });
 *
 * // Whatever mode the gateway picks, the result comes back the same way
 * const greeting = await client.request('echo', { msg: 'hi' });
 *
 * // Or consume events as they arrive
 * const outcome = await client.call('generate', { prompt: 'long story' });
 * if (outcome.mode === 'streamed') {
 *   for await (const event of outcome.events) {
 *     if (event.kind === 'content') process.stdout.write(String(event.payload));
 *   }
 * }
 * ```
 *
 * @module @switchyard/client
 */

export {
  CallClient,
  createClient,
  type CallClientConfig,
  type CallOptions,
  type CallResponse,
  type FetchLike,
} from "./client.js";
export { CallClientError, type CallClientErrorOptions } from "./errors.js";

// Re-export wire types consumers handle
export type {
  AcceptSet,
  CallId,
  DiscoveryResponse,
  ErrorPayload,
  ImmediateResponse,
  MethodDescriptor,
  StreamEvent,
} from "@switchyard/shared";
