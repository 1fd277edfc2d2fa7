import { constants, deflateSync, inflateSync } from 'node:zlib';

import { ConfigurationError, FormatError } from '../lib/errors.js';

export const MIN_COMPRESSION_LEVEL = constants.Z_NO_COMPRESSION;
export const MAX_COMPRESSION_LEVEL = constants.Z_BEST_COMPRESSION;

export function assertCompressionLevel(level: number): void {
  if (!Number.isInteger(level) || level < MIN_COMPRESSION_LEVEL || level > MAX_COMPRESSION_LEVEL) {
    throw new ConfigurationError(
      `Compression level must be an integer within ${MIN_COMPRESSION_LEVEL}-${MAX_COMPRESSION_LEVEL}, got ${level}`
    );
  }
}

/**
 * Deflate bytes (zlib format) at the given level
 */
export function compress(bytes: Buffer, level: number): Buffer {
  assertCompressionLevel(level);
  return deflateSync(bytes, { level });
}

/**
 * Inflate bytes produced by `compress`
 */
export function decompress(bytes: Buffer): Buffer {
  try {
    return inflateSync(bytes);
  } catch (error) {
    throw new FormatError('Compressed payload is corrupt', { cause: error });
  }
}
