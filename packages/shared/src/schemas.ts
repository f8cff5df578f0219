/**
 * Zod schemas for everything that crosses the wire.
 *
 * @module @switchyard/shared/schemas
 */

import { z } from "zod";
import type {
  CallEnvelope,
  DiscoveryResponse,
  ErrorPayload,
  ImmediateResponse,
  StreamEvent,
} from "./protocol.js";

export const callIdSchema = z.union([z.string().min(1), z.number().int()]);

/**
 * Inbound envelope. A `jsonrpc: "2.0"` marker is tolerated so JSON-RPC
 * clients can talk to the endpoint unchanged; it is not echoed back.
 */
export const callEnvelopeSchema = z.object({
  jsonrpc: z.literal("2.0").optional(),
  id: callIdSchema,
  method: z.string().min(1),
  params: z.record(z.unknown()).default({}),
});

export const errorPayloadSchema = z.object({
  code: z.string(),
  message: z.string(),
  data: z.unknown().optional(),
});

const eventBase = {
  callId: callIdSchema,
  sequence: z.number().int().nonnegative(),
};

export const streamEventSchema = z.discriminatedUnion("kind", [
  z.object({
    ...eventBase,
    kind: z.literal("start"),
    payload: z.object({ sessionId: z.string() }),
  }),
  z.object({ ...eventBase, kind: z.literal("content"), payload: z.unknown() }),
  z.object({ ...eventBase, kind: z.literal("error"), payload: errorPayloadSchema }),
  z.object({ ...eventBase, kind: z.literal("end") }),
]);

export const cancelRequestSchema = z.object({
  callId: callIdSchema,
  reason: z.string().optional(),
});

const immediateResponseSchema = z.union([
  z.object({ id: z.union([callIdSchema, z.null()]), error: errorPayloadSchema }),
  z.object({ id: callIdSchema, result: z.unknown() }),
]);

export const discoveryResponseSchema = z.object({
  protocol: z.object({
    version: z.string(),
    modes: z.array(z.enum(["immediate", "streamed"])),
    resume: z.boolean(),
  }),
  methods: z.array(
    z.object({
      name: z.string(),
      mode: z.enum(["simple", "long-running"]).optional(),
      description: z.string().optional(),
    }),
  ),
});

// ============================================================================
// Parsers
// ============================================================================

export type EnvelopeParseResult =
  | { ok: true; envelope: CallEnvelope }
  | { ok: false; id: CallEnvelope["id"] | null; issues: string[] };

/**
 * Validate a raw request body. On failure the caller's id is still
 * recovered when it is usable, so the rejection can be correlated.
 */
export function parseCallEnvelope(body: unknown): EnvelopeParseResult {
  const parsed = callEnvelopeSchema.safeParse(body);
  if (parsed.success) {
    const { id, method, params } = parsed.data;
    return { ok: true, envelope: { id, method, params } };
  }

  let id: CallEnvelope["id"] | null = null;
  if (body && typeof body === "object" && "id" in body) {
    const candidate = callIdSchema.safeParse(body.id);
    if (candidate.success) id = candidate.data;
  }
  return { ok: false, id, issues: formatIssues(parsed.error) };
}

/**
 * Validate a decoded stream event. Returns null when the value is not one.
 */
export function parseStreamEvent(value: unknown): StreamEvent | null {
  const parsed = streamEventSchema.safeParse(value);
  if (!parsed.success) return null;

  const event = parsed.data;
  switch (event.kind) {
    case "start":
      return {
        callId: event.callId,
        sequence: event.sequence,
        kind: "start",
        payload: event.payload,
      };
    case "content":
      return {
        callId: event.callId,
        sequence: event.sequence,
        kind: "content",
        payload: event.payload,
      };
    case "error":
      return {
        callId: event.callId,
        sequence: event.sequence,
        kind: "error",
        payload: toPayload(event.payload),
      };
    case "end":
      return { callId: event.callId, sequence: event.sequence, kind: "end" };
  }
}

export function parseImmediateResponse(value: unknown): ImmediateResponse | null {
  const parsed = immediateResponseSchema.safeParse(value);
  if (!parsed.success) return null;

  const response = parsed.data;
  if ("error" in response) {
    return { id: response.id, error: toPayload(response.error) };
  }
  return { id: response.id, result: response.result };
}

export function parseDiscoveryResponse(value: unknown): DiscoveryResponse | null {
  const parsed = discoveryResponseSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

function toPayload(error: z.infer<typeof errorPayloadSchema>): ErrorPayload {
  return error.data === undefined
    ? { code: error.code, message: error.message }
    : { code: error.code, message: error.message, data: error.data };
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
  );
}
