import { describe, it, expect } from 'vitest';
import {
  CryptError,
  ConfigurationError,
  SerializationError,
  FormatError,
  DecryptionError
} from '../../src/lib/errors.js';

describe('Errors', () => {
  it('should name each error after its class', () => {
    expect(new ConfigurationError('x').name).toBe('ConfigurationError');
    expect(new SerializationError('x').name).toBe('SerializationError');
    expect(new FormatError('x').name).toBe('FormatError');
    expect(new DecryptionError().name).toBe('DecryptionError');
  });

  it('should share the CryptError base', () => {
    for (const error of [
      new ConfigurationError('x'),
      new SerializationError('x'),
      new FormatError('x'),
      new DecryptionError()
    ]) {
      expect(error).toBeInstanceOf(CryptError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it('should keep the cause when given', () => {
    const cause = new Error('inner');
    expect(new FormatError('outer', { cause }).cause).toBe(cause);
  });

  it('should give every DecryptionError the same message and no cause', () => {
    const error = new DecryptionError();
    expect(error.message).toBe('Decryption failed');
    expect(error.cause).toBeUndefined();
  });
});
