/**
 * Token byte layout (version 1)
 *
 * Format:
 * - Version (1 byte, 0x01)
 * - Cipher id length n (1 byte, 1-255)
 * - Cipher id (n bytes, upper-case ASCII)
 * - Compression flag (1 byte, 0x00 or 0x01)
 * - IV (cipher IV length)
 * - Ciphertext (variable)
 * - Tag (last 16 bytes for GCM, 32 for HMAC-SHA256)
 *
 * Every field is a single byte or a byte string, so no byte order applies.
 * The first four fields form the header, which the cipher engine
 * authenticates along with the payload.
 */

import { FormatError } from '../lib/errors.js';

import { lookupCipher, type CipherSpec } from './cipher-spec.js';
import type { SealedPayload } from './cipher-engine.js';

export const TOKEN_VERSION = 0x01;

const FLAG_UNCOMPRESSED = 0x00;
const FLAG_COMPRESSED = 0x01;
const MAX_CIPHER_ID_LENGTH = 0xff;

/**
 * Public, unencrypted part of a token
 */
export interface TokenHeader {
  version: number;
  cipherId: string;
  compressed: boolean;
}

export interface ParsedToken extends TokenHeader {
  cipher: CipherSpec;
  /** Raw header bytes, authenticated as associated data */
  header: Buffer;
  payload: SealedPayload;
}

/**
 * Encode the header for a cipher id (already canonical) and compression flag
 */
export function encodeHeader(cipherId: string, compressed: boolean): Buffer {
  const id = Buffer.from(cipherId, 'latin1');
  if (id.length === 0 || id.length > MAX_CIPHER_ID_LENGTH) {
    throw new FormatError(`Cipher id must be 1-${MAX_CIPHER_ID_LENGTH} bytes long`);
  }

  const buffer = Buffer.allocUnsafe(3 + id.length);
  let offset = 0;

  buffer.writeUInt8(TOKEN_VERSION, offset++);
  buffer.writeUInt8(id.length, offset++);
  id.copy(buffer, offset);
  offset += id.length;
  buffer.writeUInt8(compressed ? FLAG_COMPRESSED : FLAG_UNCOMPRESSED, offset);

  return buffer;
}

export function assembleToken(header: Buffer, payload: SealedPayload): Buffer {
  return Buffer.concat([header, payload.iv, payload.ciphertext, payload.tag]);
}

export function parseToken(bytes: Buffer): ParsedToken {
  if (bytes.length < 3) {
    throw new FormatError('Token is too short');
  }

  let offset = 0;

  const version = bytes.readUInt8(offset++);
  if (version !== TOKEN_VERSION) {
    throw new FormatError(`Unsupported token version: ${version}`);
  }

  const idLength = bytes.readUInt8(offset++);
  if (idLength === 0 || offset + idLength + 1 > bytes.length) {
    throw new FormatError('Token header is truncated');
  }

  const cipherId = bytes.toString('latin1', offset, offset + idLength);
  offset += idLength;

  const cipher = lookupCipher(cipherId);
  if (!cipher || cipher.id !== cipherId) {
    throw new FormatError('Token names an unknown cipher');
  }

  const flag = bytes.readUInt8(offset++);
  if (flag !== FLAG_UNCOMPRESSED && flag !== FLAG_COMPRESSED) {
    throw new FormatError(`Unknown compression flag: ${flag}`);
  }

  const header = bytes.subarray(0, offset);

  if (offset + cipher.ivLength + cipher.tagLength > bytes.length) {
    throw new FormatError('Token body is truncated');
  }

  const iv = bytes.subarray(offset, offset + cipher.ivLength);
  offset += cipher.ivLength;

  const tagStart = bytes.length - cipher.tagLength;
  const ciphertext = bytes.subarray(offset, tagStart);
  const tag = bytes.subarray(tagStart);

  return {
    version,
    cipherId,
    compressed: flag === FLAG_COMPRESSED,
    cipher,
    header,
    payload: { iv, ciphertext, tag }
  };
}
