import { describe, it, expect } from 'vitest';
import { decode, encode } from '../../src/codec/transport.js';
import { createSettings, type SettingsInput } from '../../src/config/settings.js';
import { encodeKey } from '../../src/crypto/keys.js';
import { CryptPipeline } from '../../src/pipeline/crypt-pipeline.js';
import {
  ConfigurationError,
  DecryptionError,
  FormatError,
  SerializationError
} from '../../src/lib/errors.js';

const baseSettings = {
  dataCipher: 'AES-256-CBC',
  passwordCipher: 'AES-128-CBC',
  compressionEnabled: true,
  compressionLevel: 9
};

function pipelineWith(overrides: SettingsInput = {}): CryptPipeline {
  return new CryptPipeline(createSettings({ ...baseSettings, ...overrides }));
}

function expectRejected(attempt: () => unknown): void {
  let caught: unknown;
  try {
    attempt();
  } catch (error) {
    caught = error;
  }
  expect(caught instanceof DecryptionError || caught instanceof FormatError).toBe(true);
}

// Header for AES-256-CBC: version, id length, 11-byte id, flag
const CBC_HEADER_LENGTH = 14;
const CBC_IV_LENGTH = 16;

describe('Crypt pipeline', () => {
  const pipeline = pipelineWith();
  const zeroKey = Buffer.alloc(32);

  describe('encryptWithKey/decryptWithKey', () => {
    it('should round-trip a record under a 32-byte zero key', () => {
      const record = { id: 42, name: 'alice' };

      const token = pipeline.encryptWithKey(record, zeroKey);

      expect(typeof token).toBe('string');
      expect(token).toMatch(/^[A-Za-z0-9_-]+$/);
      expect(pipeline.decryptWithKey(token, zeroKey)).toEqual({ id: 42, name: 'alice' });
    });

    it('should round-trip rich values', () => {
      const value = {
        when: new Date('2025-11-11T12:00:00.000Z'),
        lookup: new Map([['a', [1, 2, 3]]]),
        members: new Set(['x', 'y']),
        amount: 10n ** 20n,
        list: [1, 'two', null, { three: 3 }]
      };

      expect(pipeline.decryptWithKey(pipeline.encryptWithKey(value, zeroKey), zeroKey)).toEqual(value);
    });

    it('should produce different tokens for the same value', () => {
      const first = pipeline.encryptWithKey('same', zeroKey);
      const second = pipeline.encryptWithKey('same', zeroKey);

      expect(first).not.toBe(second);
    });

    it('should accept keys as base64url text', () => {
      const key = pipeline.keys.generateKey();

      const token = pipeline.encryptWithKey('text key', encodeKey(key));

      expect(pipeline.decryptWithKey(token, key)).toBe('text key');
    });

    it('should fail closed with the wrong key', () => {
      const token = pipeline.encryptWithKey({ id: 42 }, zeroKey);

      expect(() => pipeline.decryptWithKey(token, Buffer.alloc(32, 1))).toThrow(DecryptionError);
    });

    it('should fail closed with a key of the wrong length', () => {
      const token = pipeline.encryptWithKey({ id: 42 }, zeroKey);

      expect(() => pipeline.decryptWithKey(token, Buffer.alloc(16))).toThrow(DecryptionError);
    });

    it('should reject a key of the wrong length when encrypting', () => {
      expect(() => pipeline.encryptWithKey({ id: 42 }, Buffer.alloc(16))).toThrow(ConfigurationError);
    });

    it('should reject values that cannot be serialized', () => {
      expect(() => pipeline.encryptWithKey({ run: () => undefined }, zeroKey)).toThrow(SerializationError);
    });

    it('should refuse class instances instead of returning plain objects', () => {
      class Money {
        constructor(readonly cents: number) {}
      }

      expect(() => pipeline.encryptWithKey(new Money(5), zeroKey)).toThrow(SerializationError);
    });

    it('should reject malformed token text', () => {
      expect(() => pipeline.decryptWithKey('not a token!', zeroKey)).toThrow(FormatError);
    });
  });

  describe('tamper detection', () => {
    const token = pipeline.encryptWithKey({ id: 42, name: 'alice' }, zeroKey);
    const bytes = decode(token);

    it('should reject a flipped byte in the ciphertext region', () => {
      const tampered = Buffer.from(bytes);
      tampered[CBC_HEADER_LENGTH + CBC_IV_LENGTH] ^= 0x01;

      expect(() => pipeline.decryptWithKey(encode(tampered), zeroKey)).toThrow(DecryptionError);
    });

    it('should never return a value when any single byte is flipped', () => {
      for (let index = 0; index < bytes.length; index++) {
        const tampered = Buffer.from(bytes);
        tampered[index] ^= 0xff;

        expectRejected(() => pipeline.decryptWithKey(encode(tampered), zeroKey));
      }
    });

    it('should reject a flipped compression flag', () => {
      const tampered = Buffer.from(bytes);
      tampered[CBC_HEADER_LENGTH - 1] ^= 0x01;

      expect(() => pipeline.decryptWithKey(encode(tampered), zeroKey)).toThrow(DecryptionError);
    });

    it('should reject a truncated token', () => {
      expectRejected(() => pipeline.decryptWithKey(encode(bytes.subarray(0, bytes.length - 1)), zeroKey));
    });
  });

  describe('compression', () => {
    const repetitive = 'x'.repeat(10000);

    it('should round-trip with compression on and off', () => {
      const record = { id: 42, name: 'alice' };
      const uncompressed = pipelineWith({ compressionEnabled: false });

      const packed = pipeline.encryptWithKey(record, zeroKey);
      const plain = uncompressed.encryptWithKey(record, zeroKey);

      expect(packed).not.toBe(plain);
      expect(pipeline.inspectToken(packed).compressed).toBe(true);
      expect(pipeline.inspectToken(plain).compressed).toBe(false);
      expect(pipeline.decryptWithKey(packed, zeroKey)).toEqual(record);
      expect(pipeline.decryptWithKey(plain, zeroKey)).toEqual(record);
    });

    it('should decode by the embedded flag, not the reader settings', () => {
      const writer = pipelineWith({ compressionEnabled: false });
      const reader = pipelineWith({ compressionEnabled: true });

      expect(reader.decryptWithKey(writer.encryptWithKey(repetitive, zeroKey), zeroKey)).toBe(repetitive);
      expect(writer.decryptWithKey(reader.encryptWithKey(repetitive, zeroKey), zeroKey)).toBe(repetitive);
    });

    it('should shrink highly repetitive values', () => {
      const compressed = pipeline.encryptWithKey(repetitive, zeroKey);
      const uncompressed = pipelineWith({ compressionEnabled: false }).encryptWithKey(repetitive, zeroKey);

      expect(compressed.length).toBeLessThan(200);
      expect(uncompressed.length).toBeGreaterThan(13000);
    });

    it('should let a call override the settings', () => {
      const token = pipeline.encryptWithKey(repetitive, zeroKey, { compress: false });

      expect(pipeline.inspectToken(token).compressed).toBe(false);
      expect(pipeline.decryptWithKey(token, zeroKey)).toBe(repetitive);
    });
  });

  describe('encryptWithPassword/decryptWithPassword', () => {
    it('should round-trip with a password', () => {
      const token = pipeline.encryptWithPassword({ id: 42, name: 'alice' }, 'correct-horse');

      expect(pipeline.decryptWithPassword(token, 'correct-horse')).toEqual({ id: 42, name: 'alice' });
    });

    it('should tag the token with the password cipher', () => {
      const token = pipeline.encryptWithPassword('value', 'correct-horse');

      expect(pipeline.inspectToken(token)).toEqual({ version: 1, cipherId: 'AES-128-CBC', compressed: true });
    });

    it('should fail closed with the wrong password', () => {
      const token = pipeline.encryptWithPassword('value', 'correct-horse');

      expect(() => pipeline.decryptWithPassword(token, 'Correct-horse')).toThrow(DecryptionError);
    });

    it('should reject an empty password', () => {
      const token = pipeline.encryptWithPassword('value', 'correct-horse');

      expect(() => pipeline.encryptWithPassword('value', '')).toThrow(ConfigurationError);
      expect(() => pipeline.decryptWithPassword(token, '')).toThrow(ConfigurationError);
    });

    it('should decrypt with the key derived for the token cipher', () => {
      const token = pipeline.encryptWithPassword('value', 'correct-horse');
      const key = pipeline.keys.deriveKeyFromPassword('correct-horse', 'AES-128-CBC');

      expect(pipeline.decryptWithKey(token, key)).toBe('value');
    });

    it('should decrypt tokens written under a different password cipher', () => {
      const writer = pipelineWith({ passwordCipher: 'AES-256-GCM' });

      const token = writer.encryptWithPassword('value', 'correct-horse');

      expect(pipeline.inspectToken(token).cipherId).toBe('AES-256-GCM');
      expect(pipeline.decryptWithPassword(token, 'correct-horse')).toBe('value');
    });
  });

  describe('authenticated ciphers', () => {
    const gcm = pipelineWith({ dataCipher: 'aes-256-gcm' });

    it('should round-trip under AES-256-GCM', () => {
      const token = gcm.encryptWithKey({ id: 42, name: 'alice' }, zeroKey);

      expect(gcm.inspectToken(token).cipherId).toBe('AES-256-GCM');
      expect(gcm.decryptWithKey(token, zeroKey)).toEqual({ id: 42, name: 'alice' });
    });

    it('should let a CBC pipeline read a GCM token', () => {
      const token = gcm.encryptWithKey('portable', zeroKey);

      expect(pipeline.decryptWithKey(token, zeroKey)).toBe('portable');
    });

    it('should fail closed with the wrong key', () => {
      const token = gcm.encryptWithKey('secret', zeroKey);

      expect(() => gcm.decryptWithKey(token, Buffer.alloc(32, 1))).toThrow(DecryptionError);
    });
  });

  describe('inspectToken', () => {
    it('should read the header without a key', () => {
      const token = pipeline.encryptWithKey('value', zeroKey);

      expect(pipeline.inspectToken(token)).toEqual({ version: 1, cipherId: 'AES-256-CBC', compressed: true });
    });

    it('should reject tokens with an unknown version', () => {
      const bytes = decode(pipeline.encryptWithKey('value', zeroKey));
      bytes.writeUInt8(9, 0);

      expect(() => pipeline.inspectToken(encode(bytes))).toThrow(FormatError);
    });
  });
});
