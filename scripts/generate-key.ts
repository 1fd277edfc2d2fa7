#!/usr/bin/env tsx
/**
 * Generate Key Script
 * Prints a new random private key as base64url, sized for the private-key
 * cipher from the environment or for the cipher given as first argument.
 *
 * Usage: tsx scripts/generate-key.ts [cipher]
 */

import { createSettings } from '../src/config/settings.js';
import { KeyManager, encodeKey } from '../src/crypto/keys.js';
import { CryptError } from '../src/lib/errors.js';

function main(): void {
  const cipher = process.argv[2];
  const settings = createSettings(cipher ? { privateKeyCipher: cipher } : {});
  const key = new KeyManager(settings).generateKey();

  console.log(encodeKey(key));
}

try {
  main();
} catch (error) {
  if (error instanceof CryptError) {
    console.error(`${error.name}: ${error.message}`);
    process.exit(1);
  }
  throw error;
}
