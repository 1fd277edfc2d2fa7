/**
 * Cipher identifiers and the parameters they resolve to.
 *
 * Ids follow OpenSSL naming ("AES-256-CBC", "aes-128-gcm", aliases such as
 * "aes256") and are looked up in Node's cipher table. The canonical id is the
 * trimmed, upper-cased name as given. Only modes that take an IV and
 * that this library can authenticate are accepted, and only when the running
 * OpenSSL build can construct them (legacy ciphers such as BF-CBC are listed
 * but disabled under OpenSSL 3):
 * - GCM carries its own 16-byte tag and binds the token header as AAD
 * - CBC, CFB, OFB and CTR are sealed encrypt-then-MAC with HMAC-SHA256
 */

import { createCipheriv, getCipherInfo, type CipherGCMTypes } from 'node:crypto';

import { ConfigurationError } from '../lib/errors.js';

const GCM_ALGORITHMS = ['aes-128-gcm', 'aes-192-gcm', 'aes-256-gcm'] as const satisfies readonly CipherGCMTypes[];

const MAC_MODES = ['cbc', 'cfb', 'ofb', 'ctr'] as const;

export type MacMode = (typeof MAC_MODES)[number];

export const GCM_TAG_LENGTH = 16;
export const HMAC_TAG_LENGTH = 32;

interface BaseCipherSpec {
  /** Canonical id, upper case. This is what tokens carry. */
  id: string;
  keyLength: number;
  ivLength: number;
  blockSize: number;
  tagLength: number;
}

export interface AeadCipherSpec extends BaseCipherSpec {
  kind: 'aead';
  algorithm: CipherGCMTypes;
}

export interface MacCipherSpec extends BaseCipherSpec {
  kind: 'mac';
  algorithm: string;
  mode: MacMode;
}

export type CipherSpec = AeadCipherSpec | MacCipherSpec;

function isGcmAlgorithm(name: string): name is CipherGCMTypes {
  return GCM_ALGORITHMS.some(algorithm => algorithm === name);
}

function isMacMode(mode: string): mode is MacMode {
  return MAC_MODES.some(candidate => candidate === mode);
}

function isConstructible(algorithm: string, keyLength: number, ivLength: number): boolean {
  try {
    createCipheriv(algorithm, Buffer.alloc(keyLength), Buffer.alloc(ivLength));
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a cipher id, or return undefined when it is unknown or unsupported
 */
export function lookupCipher(id: string): CipherSpec | undefined {
  const algorithm = id.trim().toLowerCase();
  if (algorithm.length === 0) {
    return undefined;
  }

  const info = getCipherInfo(algorithm);
  if (!info || !info.ivLength || !isConstructible(algorithm, info.keyLength, info.ivLength)) {
    return undefined;
  }

  const base = {
    id: algorithm.toUpperCase(),
    keyLength: info.keyLength,
    ivLength: info.ivLength,
    blockSize: info.blockSize ?? 1
  };

  if (info.mode === 'gcm') {
    return isGcmAlgorithm(algorithm)
      ? { ...base, kind: 'aead', algorithm, tagLength: GCM_TAG_LENGTH }
      : undefined;
  }

  if (isMacMode(info.mode)) {
    return { ...base, kind: 'mac', algorithm, mode: info.mode, tagLength: HMAC_TAG_LENGTH };
  }

  return undefined;
}

/**
 * Resolve a cipher id or fail with a ConfigurationError
 */
export function resolveCipher(id: string): CipherSpec {
  const spec = lookupCipher(id);
  if (!spec) {
    throw new ConfigurationError(`Unsupported cipher: ${id}`);
  }
  return spec;
}
