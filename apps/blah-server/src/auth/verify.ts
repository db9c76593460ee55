import type { z } from "zod";
import { AuthEnvelopeSchema, type WithSig } from "@blah/protocol";
import { CanonicalEncodingError, verifyEnvelope } from "@blah/crypto";
import { ChatError } from "../errors.js";
import type { CoreContext, KeyDirectory } from "../context.js";
import { assertFresh } from "./replay.js";

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Decode a raw request body into a typed envelope */
export function parseEnvelope<S extends z.ZodTypeAny>(schema: S, raw: unknown): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ChatError("BAD_ENVELOPE", describeIssues(result.error));
  }
  return result.data;
}

/** Resolve the signer's key and check the signature over the canonical signee */
export function verifySignature<T>(envelope: WithSig<T>, keys: KeyDirectory): void {
  const publicKey = keys.resolve(envelope.signee.user);
  if (!publicKey) {
    throw new ChatError("UNKNOWN_USER", `Unknown user ${envelope.signee.user}`);
  }

  let valid: boolean;
  try {
    valid = verifyEnvelope(envelope, publicKey);
  } catch (err) {
    if (err instanceof CanonicalEncodingError) {
      throw new ChatError("BAD_ENVELOPE", err.message);
    }
    throw err;
  }

  if (!valid) {
    throw new ChatError("INVALID_SIGNATURE", "Signature verification failed");
  }
}

/**
 * Check an optional `Authorization` header carrying a signed auth payload.
 * Returns the proven user, or undefined for anonymous requests. The nonce
 * is not consumed, so a client may reuse the header inside the window.
 */
export function verifyAuthHeader(
  header: string | undefined,
  roomId: string,
  ctx: CoreContext
): string | undefined {
  if (header === undefined || header === "") return undefined;

  let raw: unknown;
  try {
    raw = JSON.parse(header);
  } catch {
    throw new ChatError("BAD_ENVELOPE", "Authorization header is not valid JSON");
  }

  const envelope = parseEnvelope(AuthEnvelopeSchema, raw);
  if (envelope.signee.payload.room !== roomId) {
    throw new ChatError("BAD_ENVELOPE", "Authorization is for a different room");
  }
  verifySignature(envelope, ctx.keys);
  assertFresh(envelope.signee.timestamp, ctx.clock(), ctx.maxSkewSecs);
  return envelope.signee.user;
}
