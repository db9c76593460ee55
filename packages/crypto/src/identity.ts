import { generateMnemonic as genMnemonic, validateMnemonic as valMnemonic, mnemonicToSeedSync } from "@scure/bip39";
import { wordlist } from "@scure/bip39/wordlists/english";
import nacl from "tweetnacl";
import { fromHex, isHex, toHex } from "./utils.js";

export interface Identity {
  publicKey: Uint8Array;
  secretKey: Uint8Array;
  /** Hex public key, used as the user id on the wire */
  user: string;
}

/** Generate a new 24-word BIP39 mnemonic */
export function generateMnemonic(): string {
  return genMnemonic(wordlist, 256);
}

/** Validate a BIP39 mnemonic */
export function validateMnemonic(mnemonic: string): boolean {
  return valMnemonic(mnemonic, wordlist);
}

function fromKeyPair(keypair: { publicKey: Uint8Array; secretKey: Uint8Array }): Identity {
  return {
    publicKey: keypair.publicKey,
    secretKey: keypair.secretKey,
    user: toHex(keypair.publicKey),
  };
}

/**
 * Derive an Ed25519 keypair from a BIP39 mnemonic.
 * Uses the 64-byte seed from BIP39, takes the first 32 bytes for Ed25519.
 */
export function identityFromMnemonic(mnemonic: string): Identity {
  if (!validateMnemonic(mnemonic)) {
    throw new Error("Invalid mnemonic phrase");
  }

  const seed = mnemonicToSeedSync(mnemonic);
  return fromKeyPair(nacl.sign.keyPair.fromSeed(new Uint8Array(seed.slice(0, 32))));
}

/** Deterministic identity from a 32-byte seed */
export function identityFromSeed(seed: Uint8Array): Identity {
  return fromKeyPair(nacl.sign.keyPair.fromSeed(seed));
}

/** Parse a hex user id back into a public key. Undefined if it is not one. */
export function publicKeyFromUser(user: string): Uint8Array | undefined {
  if (user.length !== nacl.sign.publicKeyLength * 2 || !isHex(user)) {
    return undefined;
  }
  return fromHex(user);
}
