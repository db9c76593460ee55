import type { Signee } from "@blah/protocol";
import { encode } from "./utils.js";

/**
 * Canonical signee encoding.
 *
 * The bytes that get signed are the UTF-8 encoding of a JSON text following
 * RFC 8785 (JCS), restricted to the values envelopes can carry:
 *
 * - no insignificant whitespace
 * - object members sorted by key, comparing UTF-16 code units, at every depth
 *   (the payload's `typ` included)
 * - strings escaped as `JSON.stringify` does
 * - numbers must be safe integers, written in plain decimal
 * - booleans and null as literals, arrays in their given order
 *
 * Anything else is not encodable and raises {@link CanonicalEncodingError}.
 */

export class CanonicalEncodingError extends Error {
  constructor(
    message: string,
    readonly path: string
  ) {
    super(`${message} at ${path}`);
    this.name = "CanonicalEncodingError";
  }
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function write(value: unknown, path: string, out: string[]): void {
  if (value === null) {
    out.push("null");
    return;
  }

  switch (typeof value) {
    case "string":
      out.push(JSON.stringify(value));
      return;
    case "boolean":
      out.push(value ? "true" : "false");
      return;
    case "number":
      if (!Number.isSafeInteger(value)) {
        throw new CanonicalEncodingError("Number is not a safe integer", path);
      }
      // Normalizes -0 to 0
      out.push(String(value === 0 ? 0 : value));
      return;
    case "object":
      break;
    default:
      throw new CanonicalEncodingError(`Unsupported ${typeof value} value`, path);
  }

  if (Array.isArray(value)) {
    out.push("[");
    value.forEach((item, i) => {
      if (i > 0) out.push(",");
      write(item, `${path}[${i}]`, out);
    });
    out.push("]");
    return;
  }

  if (!isPlainObject(value)) {
    throw new CanonicalEncodingError("Unsupported object type", path);
  }

  out.push("{");
  Object.keys(value)
    .sort()
    .forEach((key, i) => {
      if (i > 0) out.push(",");
      out.push(JSON.stringify(key), ":");
      write(value[key], `${path}.${key}`, out);
    });
  out.push("}");
}

/** Serialize a value to its canonical JSON text */
export function canonicalize(value: unknown): string {
  const out: string[] = [];
  write(value, "$", out);
  return out.join("");
}

/** The exact bytes a client signs and a server verifies */
export function encodeSignee<T>(signee: Signee<T>): Uint8Array {
  return encode(canonicalize(signee));
}
