/**
 * Crypto module - cipher resolution, symmetric encryption, key management
 * and the token byte layout
 */

export {
  lookupCipher,
  resolveCipher,
  GCM_TAG_LENGTH,
  HMAC_TAG_LENGTH,
  type CipherSpec,
  type AeadCipherSpec,
  type MacCipherSpec,
  type MacMode
} from './cipher-spec.js';
export { CipherEngine, type SealedPayload } from './cipher-engine.js';
export {
  KeyManager,
  encodeKey,
  toKeyBuffer,
  zeroizeKey,
  type KeyInput,
  type KeyOwner
} from './keys.js';
export {
  TOKEN_VERSION,
  encodeHeader,
  assembleToken,
  parseToken,
  type TokenHeader,
  type ParsedToken
} from './token.js';
