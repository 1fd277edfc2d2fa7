/**
 * Settings Provider
 *
 * Holds the cipher ids and compression defaults every other component reads.
 * A `Settings` value is an immutable snapshot: build one with
 * `createSettings()` and hand it to the components that need it.
 *
 * The process-wide snapshot used by `FieldCrypt` lives here. It may be set
 * once with `configure()`, and only before the first `getSettings()` call;
 * after that it is read-only. Mutating settings while operations are in
 * flight is the caller's responsibility to avoid.
 */

import { z } from 'zod';

import { resolveCipher } from '../crypto/cipher-spec.js';
import { ConfigurationError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';

import { env } from './env.js';

const settingsSchema = z.object({
  dataCipher: z.string().min(1),
  passwordCipher: z.string().min(1),
  privateKeyCipher: z.string().min(1),
  compressionEnabled: z.boolean(),
  compressionLevel: z.number().int().min(0).max(9)
});

export type Settings = Readonly<z.infer<typeof settingsSchema>>;

export type SettingsInput = Partial<Settings>;

/**
 * Build a validated, frozen settings snapshot.
 * Fields left out fall back to the environment; `privateKeyCipher` falls back
 * to the resolved `dataCipher`.
 */
export function createSettings(overrides: SettingsInput = {}): Settings {
  const dataCipher = overrides.dataCipher ?? env.CRYPT_DATA_CIPHER;

  const parsed = settingsSchema.safeParse({
    dataCipher,
    passwordCipher: overrides.passwordCipher ?? env.CRYPT_PASSWORD_CIPHER,
    privateKeyCipher: overrides.privateKeyCipher ?? env.CRYPT_PRIVATE_KEY_CIPHER ?? dataCipher,
    compressionEnabled: overrides.compressionEnabled ?? env.CRYPT_COMPRESSION_ENABLED,
    compressionLevel: overrides.compressionLevel ?? env.CRYPT_COMPRESSION_LEVEL
  });

  if (!parsed.success) {
    const errors = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid settings:\n${errors}`);
  }

  const data = parsed.data;

  return Object.freeze({
    ...data,
    dataCipher: resolveCipher(data.dataCipher).id,
    passwordCipher: resolveCipher(data.passwordCipher).id,
    privateKeyCipher: resolveCipher(data.privateKeyCipher).id
  });
}

let current: Settings | undefined;
let sealed = false;

/**
 * Set the process-wide settings. Allowed once, before first use.
 */
export function configure(overrides: SettingsInput = {}): Settings {
  if (sealed) {
    throw new ConfigurationError('Settings are read-only once they have been used');
  }
  if (current) {
    throw new ConfigurationError('Settings have already been configured');
  }

  current = createSettings(overrides);
  logger.debug(
    {
      dataCipher: current.dataCipher,
      passwordCipher: current.passwordCipher,
      privateKeyCipher: current.privateKeyCipher,
      compressionEnabled: current.compressionEnabled,
      compressionLevel: current.compressionLevel
    },
    'Settings configured'
  );
  return current;
}

/**
 * Read the process-wide settings, building defaults on first call.
 * The snapshot is sealed from here on.
 */
export function getSettings(): Settings {
  current ??= createSettings();
  sealed = true;
  return current;
}

export function isConfigured(): boolean {
  return current !== undefined;
}

/**
 * Drop the process-wide snapshot so it can be configured again.
 * Meant for test setup; pipelines built from the old snapshot keep it.
 */
export function resetSettings(): void {
  current = undefined;
  sealed = false;
}
