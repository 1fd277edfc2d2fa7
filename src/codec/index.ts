/**
 * Codec module - serialization, compression and transport encoding
 */

export { serialize, deserialize } from './serializer.js';
export {
  compress,
  decompress,
  assertCompressionLevel,
  MIN_COMPRESSION_LEVEL,
  MAX_COMPRESSION_LEVEL
} from './compressor.js';
export { encode, decode } from './transport.js';
