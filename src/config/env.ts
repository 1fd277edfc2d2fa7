import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

import { ConfigurationError } from '../lib/errors.js';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  CRYPT_DATA_CIPHER: z
    .string()
    .min(1, 'CRYPT_DATA_CIPHER must not be empty')
    .default('AES-256-CBC'),
  CRYPT_PASSWORD_CIPHER: z
    .string()
    .min(1, 'CRYPT_PASSWORD_CIPHER must not be empty')
    .default('AES-128-CBC'),
  CRYPT_PRIVATE_KEY_CIPHER: z
    .string()
    .min(1, 'CRYPT_PRIVATE_KEY_CIPHER must not be empty')
    .optional()
    .describe('Defaults to CRYPT_DATA_CIPHER'),
  CRYPT_COMPRESSION_ENABLED: z
    .enum(['true', 'false'])
    .default('true')
    .transform(value => value === 'true'),
  CRYPT_COMPRESSION_LEVEL: z
    .string()
    .regex(/^\d$/, 'CRYPT_COMPRESSION_LEVEL must be a single digit from 0 to 9')
    .default('9')
    .transform(value => Number(value))
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  const formatted = parseResult.error.flatten();
  const errors = Object.entries(formatted.fieldErrors)
    .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
    .join('\n');

  throw new ConfigurationError(`Environment validation failed:\n${errors}`);
}

const data = parseResult.data;

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
