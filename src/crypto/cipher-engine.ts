/**
 * Cipher Engine
 *
 * Symmetric encryption for one resolved cipher. Each `encrypt` call draws a
 * fresh random IV. Every payload is authenticated together with caller
 * supplied associated data (the token header):
 * - GCM: native auth tag, associated data passed as AAD
 * - other modes: HMAC-SHA256 over aad || iv || ciphertext, keyed with a MAC
 *   key derived from the cipher key through HKDF
 */

import {
  createCipheriv,
  createDecipheriv,
  createHmac,
  hkdfSync,
  randomBytes,
  timingSafeEqual
} from 'node:crypto';

import { ConfigurationError, DecryptionError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

import { resolveCipher, HMAC_TAG_LENGTH, type CipherSpec } from './cipher-spec.js';
import { zeroizeKey } from './keys.js';

const EMPTY = Buffer.alloc(0);
const MAC_KEY_INFO = 'crypt-token/mac-key';

/**
 * Output of one encryption
 */
export interface SealedPayload {
  iv: Buffer;
  ciphertext: Buffer;
  tag: Buffer;
}

export class CipherEngine {
  readonly spec: CipherSpec;

  /**
   * @throws ConfigurationError when the cipher id is unknown or unsupported
   */
  constructor(cipherId: string) {
    this.spec = resolveCipher(cipherId);
  }

  encrypt(plaintext: Buffer, key: Buffer, aad: Buffer = EMPTY): SealedPayload {
    if (key.length !== this.spec.keyLength) {
      throw new ConfigurationError(
        `${this.spec.id} requires a ${this.spec.keyLength}-byte key, got ${key.length} bytes`
      );
    }

    const iv = randomBytes(this.spec.ivLength);

    if (this.spec.kind === 'aead') {
      const cipher = createCipheriv(this.spec.algorithm, key, iv, { authTagLength: this.spec.tagLength });
      cipher.setAAD(aad);
      const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
      return { iv, ciphertext, tag: cipher.getAuthTag() };
    }

    const cipher = createCipheriv(this.spec.algorithm, key, iv);
    const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
    return { iv, ciphertext, tag: computeMac(key, aad, iv, ciphertext) };
  }

  /**
   * @throws DecryptionError for every failure, without saying which check failed
   */
  decrypt(payload: SealedPayload, key: Buffer, aad: Buffer = EMPTY): Buffer {
    try {
      return this.open(payload, key, aad);
    } catch {
      logger.debug({ cipher: this.spec.id }, 'Decryption failed');
      throw new DecryptionError();
    }
  }

  private open({ iv, ciphertext, tag }: SealedPayload, key: Buffer, aad: Buffer): Buffer {
    if (
      key.length !== this.spec.keyLength ||
      iv.length !== this.spec.ivLength ||
      tag.length !== this.spec.tagLength
    ) {
      throw new DecryptionError();
    }

    if (this.spec.kind === 'aead') {
      const decipher = createDecipheriv(this.spec.algorithm, key, iv, { authTagLength: this.spec.tagLength });
      decipher.setAAD(aad);
      decipher.setAuthTag(tag);
      return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
    }

    const expected = computeMac(key, aad, iv, ciphertext);
    if (!timingSafeEqual(expected, tag)) {
      throw new DecryptionError();
    }

    const decipher = createDecipheriv(this.spec.algorithm, key, iv);
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  }
}

function computeMac(key: Buffer, aad: Buffer, iv: Buffer, ciphertext: Buffer): Buffer {
  const macKey = Buffer.from(hkdfSync('sha256', key, EMPTY, MAC_KEY_INFO, HMAC_TAG_LENGTH));
  try {
    return createHmac('sha256', macKey).update(aad).update(iv).update(ciphertext).digest();
  } finally {
    zeroizeKey(macKey);
  }
}
