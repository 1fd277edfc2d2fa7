/**
 * crypt-token
 *
 * Encrypt any serializable value into a self-contained, URL-safe token and
 * recover the exact value later, under a private key or a password.
 */

export {
  createSettings,
  configure,
  getSettings,
  isConfigured,
  resetSettings,
  type Settings,
  type SettingsInput
} from './config/index.js';
export {
  CryptPipeline,
  FieldCrypt,
  cryptFor,
  getDefaultPipeline,
  type Encryptable,
  type EncryptOptions
} from './pipeline/index.js';
export {
  CipherEngine,
  KeyManager,
  lookupCipher,
  resolveCipher,
  encodeKey,
  toKeyBuffer,
  zeroizeKey,
  TOKEN_VERSION,
  type CipherSpec,
  type KeyInput,
  type KeyOwner,
  type SealedPayload,
  type TokenHeader
} from './crypto/index.js';
export { serialize, deserialize, compress, decompress, encode, decode } from './codec/index.js';
export {
  CryptError,
  ConfigurationError,
  SerializationError,
  FormatError,
  DecryptionError
} from './lib/errors.js';
export { createLogger, logger, type LoggerOptions } from './lib/logger.js';
