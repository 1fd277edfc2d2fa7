/**
 * Error taxonomy for the encryption pipeline.
 *
 * Every failure surfaces as one of these classes. Nothing is retried and
 * nothing falls back to a weaker behaviour.
 */

export class CryptError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Bad or missing cipher id, compression level, password, key size, or an
 * attempt to reconfigure settings after first use
 */
export class ConfigurationError extends CryptError {}

/**
 * Value cannot be represented, or bytes do not form a serialized value
 */
export class SerializationError extends CryptError {}

/**
 * Malformed transport text, token layout, version or header field
 */
export class FormatError extends CryptError {}

const DECRYPTION_FAILED = 'Decryption failed';

/**
 * Raised for every decryption failure with the same message, so callers
 * cannot tell a bad key from a bad tag or bad padding.
 */
export class DecryptionError extends CryptError {
  constructor() {
    super(DECRYPTION_FAILED);
  }
}
