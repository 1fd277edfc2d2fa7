import { describe, it, expect } from 'vitest';
import { lookupCipher, resolveCipher } from '../../src/crypto/cipher-spec.js';
import { ConfigurationError } from '../../src/lib/errors.js';

describe('Cipher spec', () => {
  it('should resolve AES-256-CBC as a MAC-sealed cipher', () => {
    expect(resolveCipher('AES-256-CBC')).toEqual({
      id: 'AES-256-CBC',
      kind: 'mac',
      algorithm: 'aes-256-cbc',
      mode: 'cbc',
      keyLength: 32,
      ivLength: 16,
      blockSize: 16,
      tagLength: 32
    });
  });

  it('should resolve AES-128-GCM as an AEAD cipher', () => {
    const spec = resolveCipher('aes-128-gcm');

    expect(spec.kind).toBe('aead');
    expect(spec.id).toBe('AES-128-GCM');
    expect(spec.keyLength).toBe(16);
    expect(spec.ivLength).toBe(12);
    expect(spec.tagLength).toBe(16);
  });

  it('should canonicalise case and surrounding whitespace', () => {
    expect(resolveCipher(' aes-128-cbc ').id).toBe('AES-128-CBC');
  });

  it('should accept CTR mode', () => {
    const spec = lookupCipher('aes-256-ctr');

    expect(spec?.kind).toBe('mac');
    expect(spec?.ivLength).toBe(16);
  });

  it('should reject modes without an IV', () => {
    expect(() => resolveCipher('AES-256-ECB')).toThrow(ConfigurationError);
  });

  it('should reject modes it cannot authenticate', () => {
    expect(lookupCipher('aes-256-ccm')).toBeUndefined();
  });

  it('should reject legacy ciphers the OpenSSL build cannot construct', () => {
    for (const id of ['bf-cbc', 'des-cbc', 'cast5-cbc', 'rc2-cbc', 'seed-cbc', 'idea-cbc']) {
      expect(() => resolveCipher(id)).toThrow(ConfigurationError);
    }
  });

  it('should reject unknown and empty ids', () => {
    expect(() => resolveCipher('ROT13')).toThrow(ConfigurationError);
    expect(() => resolveCipher('')).toThrow(ConfigurationError);
    expect(() => resolveCipher('ROT13')).toThrow('Unsupported cipher: ROT13');
  });
});
