export {
  generateMnemonic,
  validateMnemonic,
  identityFromMnemonic,
  identityFromSeed,
  publicKeyFromUser,
  type Identity,
} from "./identity.js";

export {
  sign,
  verify,
  signEnvelope,
  verifyEnvelope,
  type SignOptions,
} from "./signing.js";

export {
  canonicalize,
  encodeSignee,
  CanonicalEncodingError,
} from "./canonical.js";

export {
  isHex,
  toHex,
  fromHex,
  encode,
  decode,
} from "./utils.js";
