/**
 * Capability Negotiator
 *
 * Picks the response mode for one call. Pure: the answer depends only on
 * the session's capabilities, what the caller declared for this call, the
 * call's shape and the configured policy.
 */

import type { AcceptSet, CallEnvelope, ResponseMode } from "@switchyard/shared";
import type { MethodClass, NegotiationPolicy, NegotiationPolicyInput, Session } from "./types.js";

export const DEFAULT_PARAMS_SIZE_THRESHOLD = 256;

/**
 * Decide immediate vs streamed, in priority order:
 *
 * 1. the session was not created streaming-capable → immediate
 * 2. this call's accept set excludes streaming → immediate
 * 3. the method's classification, when it has one
 * 4. serialized params at or above the size threshold → streamed
 */
export function decideResponseMode(
  session: Pick<Session, "capabilities">,
  call: Pick<CallEnvelope, "method" | "params">,
  declaredAccept: AcceptSet,
  policy: NegotiationPolicy,
): ResponseMode {
  if (!session.capabilities.supportsStreaming) return "immediate";
  if (declaredAccept === "immediate-only") return "immediate";

  const methodClass = policy.classify(call.method);
  if (methodClass === "long-running") return "streamed";
  if (methodClass === "simple") return "immediate";

  return paramsSize(call.params) >= policy.paramsSizeThreshold ? "streamed" : "immediate";
}

/** Serialized size of params in characters */
export function paramsSize(params: Record<string, unknown>): number {
  return JSON.stringify(params).length;
}

/**
 * Build a policy from configuration plus the `mode` hints of registered
 * methods. Configured classifications take precedence over hints.
 */
export function createNegotiationPolicy(
  input: NegotiationPolicyInput = {},
  hints: (method: string) => MethodClass | undefined = () => undefined,
): NegotiationPolicy {
  const configured = new Map(Object.entries(input.methods ?? {}));
  return {
    paramsSizeThreshold: input.paramsSizeThreshold ?? DEFAULT_PARAMS_SIZE_THRESHOLD,
    classify: (method) => configured.get(method) ?? hints(method),
  };
}
