/**
 * Transport codec: bytes <-> unpadded base64url text.
 *
 * Output is safe in JSON strings, URLs, file names and environment variables.
 * Decoding is strict; anything `encode` could not have produced is rejected.
 */

import { FormatError } from '../lib/errors.js';

const BASE64URL_PATTERN = /^[A-Za-z0-9_-]*$/;

export function encode(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64url');
}

export function decode(text: string): Buffer {
  if (!BASE64URL_PATTERN.test(text)) {
    throw new FormatError('Text is not unpadded base64url');
  }

  // A single trailing character cannot encode a whole byte
  if (text.length % 4 === 1) {
    throw new FormatError('Base64url text has an impossible length');
  }

  const bytes = Buffer.from(text, 'base64url');

  // Reject leftover bits that would silently be dropped
  if (bytes.toString('base64url') !== text) {
    throw new FormatError('Base64url text is not canonical');
  }

  return bytes;
}
