/**
 * Key Manager
 *
 * Generates random private keys, derives keys from passwords, and keeps the
 * one cached key each host type may own.
 *
 * The cache is a registry keyed by owner identity. Every method is
 * synchronous, so a get-or-create call runs to completion before any other
 * call on the same thread can observe the registry. Worker threads each load
 * their own copy of this module and therefore their own registry; establish
 * keys explicitly (`setCachedKey`) when several workers must agree.
 */

import { randomBytes, scryptSync, type ScryptOptions } from 'node:crypto';

import { decode, encode } from '../codec/transport.js';
import type { Settings } from '../config/settings.js';
import { ConfigurationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

import { resolveCipher } from './cipher-spec.js';

/**
 * A private key as raw bytes, or as the base64url text `encodeKey` returns
 */
export type KeyInput = Buffer | Uint8Array | string;

/**
 * Anything with a stable identity: usually the host class itself
 */
export type KeyOwner = object;

const PASSWORD_SALT_PREFIX = 'crypt-token/password-key/';

const SCRYPT_OPTIONS: ScryptOptions = {
  N: 16384,
  r: 8,
  p: 1
};

/**
 * Securely zero out a key in memory
 * This helps prevent key material from lingering in memory
 */
export function zeroizeKey(key: Buffer): void {
  if (key && key.length > 0) {
    key.fill(0);
  }
}

/**
 * Base64url text form of a key, suitable for environment variables
 */
export function encodeKey(key: Uint8Array): string {
  return encode(key);
}

/**
 * Copy a key input into a Buffer the caller cannot mutate from outside
 */
export function toKeyBuffer(input: KeyInput): Buffer {
  if (typeof input === 'string') {
    return decode(input);
  }
  return Buffer.from(input);
}

export class KeyManager {
  private readonly cache = new WeakMap<KeyOwner, Buffer>();

  constructor(private readonly settings: Settings) {}

  /**
   * Fresh random key. Strength defaults to the private-key cipher's key size.
   */
  generateKey(strengthBits: number = resolveCipher(this.settings.privateKeyCipher).keyLength * 8): Buffer {
    if (!Number.isInteger(strengthBits) || strengthBits <= 0 || strengthBits % 8 !== 0) {
      throw new ConfigurationError(`Key strength must be a positive multiple of 8 bits, got ${strengthBits}`);
    }
    return randomBytes(strengthBits / 8);
  }

  /**
   * Derive a key sized for `cipherId` from a password.
   *
   * The salt is fixed per cipher, so the same password and cipher always give
   * the same key. Passwords are compared byte for byte; case matters.
   */
  deriveKeyFromPassword(password: string, cipherId: string = this.settings.passwordCipher): Buffer {
    if (!password) {
      throw new ConfigurationError('A non-empty password is required');
    }

    const spec = resolveCipher(cipherId);
    return scryptSync(password, `${PASSWORD_SALT_PREFIX}${spec.id}`, spec.keyLength, SCRYPT_OPTIONS);
  }

  /**
   * The owner's cached key, generated on first access.
   *
   * Returns a copy: `clearCachedKey` zeroizes only the registry's own buffer.
   */
  getOrCreateCachedKey(owner: KeyOwner): Buffer {
    const existing = this.cache.get(owner);
    if (existing) {
      return Buffer.from(existing);
    }

    const key = this.generateKey();
    this.cache.set(owner, key);
    logger.debug({ owner: ownerName(owner), bits: key.length * 8 }, 'Generated cached private key');
    return Buffer.from(key);
  }

  /**
   * Replace the owner's cached key; the last assignment wins. Returns a copy.
   */
  setCachedKey(owner: KeyOwner, key: KeyInput): Buffer {
    const buffer = toKeyBuffer(key);
    this.cache.set(owner, buffer);
    logger.debug({ owner: ownerName(owner), bits: buffer.length * 8 }, 'Assigned cached private key');
    return Buffer.from(buffer);
  }

  hasCachedKey(owner: KeyOwner): boolean {
    return this.cache.has(owner);
  }

  clearCachedKey(owner: KeyOwner): boolean {
    const key = this.cache.get(owner);
    if (!key) {
      return false;
    }
    zeroizeKey(key);
    return this.cache.delete(owner);
  }
}

function ownerName(owner: KeyOwner): string {
  return typeof owner === 'function' && owner.name ? owner.name : 'anonymous';
}
