/**
 * Pipeline Facade
 *
 * Composes the codec and crypto modules into the four public operations:
 *
 *   encrypt: serialize -> compress? -> encrypt -> assemble token -> base64url
 *   decrypt: base64url -> parse token -> decrypt -> inflate? -> deserialize
 *
 * Tokens are self-describing: the cipher id and compression flag travel in
 * the authenticated header, so decoding never consults the live settings.
 * A failure at any step propagates unchanged and no token is produced.
 */

import { compress, decompress } from '../codec/compressor.js';
import { deserialize, serialize } from '../codec/serializer.js';
import { decode, encode } from '../codec/transport.js';
import type { Settings } from '../config/settings.js';
import { CipherEngine } from '../crypto/cipher-engine.js';
import { KeyManager, toKeyBuffer, zeroizeKey, type KeyInput } from '../crypto/keys.js';
import { assembleToken, encodeHeader, parseToken, type ParsedToken, type TokenHeader } from '../crypto/token.js';
import { logger } from '../lib/logger.js';

export interface EncryptOptions {
  /** Override the settings' compression toggle for this call */
  compress?: boolean;
}

export class CryptPipeline {
  readonly keys: KeyManager;
  private readonly engines = new Map<string, CipherEngine>();

  constructor(
    readonly settings: Settings,
    keys?: KeyManager
  ) {
    this.keys = keys ?? new KeyManager(settings);
  }

  encryptWithKey(value: unknown, key: KeyInput, options: EncryptOptions = {}): string {
    return this.seal(value, toKeyBuffer(key), this.settings.dataCipher, options);
  }

  decryptWithKey(token: string, key: KeyInput): unknown {
    return this.open(parseToken(decode(token)), toKeyBuffer(key));
  }

  encryptWithPassword(value: unknown, password: string, options: EncryptOptions = {}): string {
    const key = this.keys.deriveKeyFromPassword(password, this.settings.passwordCipher);
    try {
      return this.seal(value, key, this.settings.passwordCipher, options);
    } finally {
      zeroizeKey(key);
    }
  }

  decryptWithPassword(token: string, password: string): unknown {
    const parsed = parseToken(decode(token));
    const key = this.keys.deriveKeyFromPassword(password, parsed.cipherId);
    try {
      return this.open(parsed, key);
    } finally {
      zeroizeKey(key);
    }
  }

  /**
   * Read a token's header without decrypting it
   */
  inspectToken(token: string): TokenHeader {
    const { version, cipherId, compressed } = parseToken(decode(token));
    return { version, cipherId, compressed };
  }

  private seal(value: unknown, key: Buffer, cipherId: string, options: EncryptOptions): string {
    const engine = this.engine(cipherId);
    const compressed = options.compress ?? this.settings.compressionEnabled;

    const serialized = serialize(value);
    const envelope = compressed ? compress(serialized, this.settings.compressionLevel) : serialized;

    const header = encodeHeader(engine.spec.id, compressed);
    const payload = engine.encrypt(envelope, key, header);
    const token = encode(assembleToken(header, payload));

    logger.debug(
      { cipher: engine.spec.id, compressed, plaintextBytes: serialized.length, tokenLength: token.length },
      'Sealed value'
    );
    return token;
  }

  private open(parsed: ParsedToken, key: Buffer): unknown {
    const engine = this.engine(parsed.cipherId);
    const envelope = engine.decrypt(parsed.payload, key, parsed.header);
    const serialized = parsed.compressed ? decompress(envelope) : envelope;

    logger.debug({ cipher: parsed.cipherId, compressed: parsed.compressed }, 'Opened token');
    return deserialize(serialized);
  }

  private engine(cipherId: string): CipherEngine {
    let engine = this.engines.get(cipherId);
    if (!engine) {
      engine = new CipherEngine(cipherId);
      this.engines.set(cipherId, engine);
    }
    return engine;
  }
}
