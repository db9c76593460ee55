import nacl from "tweetnacl";
import type { Signee, WithSig } from "@blah/protocol";
import { encodeSignee } from "./canonical.js";
import { encode, fromHex, isHex, toHex } from "./utils.js";

/**
 * Sign a message with an Ed25519 secret key.
 * Returns the detached signature as Uint8Array.
 */
export function sign(message: string | Uint8Array, secretKey: Uint8Array): Uint8Array {
  const data = typeof message === "string" ? encode(message) : message;
  return nacl.sign.detached(data, secretKey);
}

/**
 * Verify a detached Ed25519 signature.
 */
export function verify(
  message: string | Uint8Array,
  signature: Uint8Array,
  publicKey: Uint8Array
): boolean {
  const data = typeof message === "string" ? encode(message) : message;
  return nacl.sign.detached.verify(data, signature, publicKey);
}

export interface SignOptions {
  /** Defaults to a random u32 */
  nonce?: number;
  /** Unix seconds, defaults to now */
  timestamp?: number;
}

function randomNonce(): number {
  const [a, b, c, d] = nacl.randomBytes(4);
  return ((a << 24) | (b << 16) | (c << 8) | d) >>> 0;
}

/** Wrap a payload in a signed envelope for the given keypair */
export function signEnvelope<T>(
  payload: T,
  keypair: { publicKey: Uint8Array; secretKey: Uint8Array },
  options: SignOptions = {}
): WithSig<T> {
  const signee: Signee<T> = {
    nonce: options.nonce ?? randomNonce(),
    payload,
    timestamp: options.timestamp ?? Math.floor(Date.now() / 1000),
    user: toHex(keypair.publicKey),
  };
  return { sig: toHex(sign(encodeSignee(signee), keypair.secretKey)), signee };
}

/**
 * Check an envelope's signature against a public key.
 * A malformed signature or key fails rather than throws.
 */
export function verifyEnvelope<T>(envelope: WithSig<T>, publicKey: Uint8Array): boolean {
  if (!isHex(envelope.sig)) return false;
  const signature = fromHex(envelope.sig);
  if (signature.length !== nacl.sign.signatureLength || publicKey.length !== nacl.sign.publicKeyLength) {
    return false;
  }
  return verify(encodeSignee(envelope.signee), signature, publicKey);
}
