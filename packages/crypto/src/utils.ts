const HEX_RE = /^(?:[0-9a-f]{2})*$/;

/** True if the string is lowercase hex with an even length */
export function isHex(str: string): boolean {
  return HEX_RE.test(str);
}

/** Encode bytes to hex string */
export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, "0"))
    .join("");
}

/** Decode hex string to bytes */
export function fromHex(hex: string): Uint8Array {
  if (!isHex(hex)) {
    throw new Error("Invalid hex string");
  }
  const bytes = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    bytes[i / 2] = parseInt(hex.substring(i, i + 2), 16);
  }
  return bytes;
}

/** Encode string to UTF-8 bytes */
export function encode(str: string): Uint8Array {
  return new TextEncoder().encode(str);
}

/** Decode UTF-8 bytes to string */
export function decode(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}
