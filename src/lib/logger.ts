import { pino, type DestinationStream, type LevelWithSilent, type Logger } from 'pino';

import { env } from '../config/env.js';

const redactPaths: string[] = [
  'password',
  'key',
  'privateKey',
  '*.password',
  '*.key',
  '*.privateKey'
];

const transport = env.isDevelopment
  ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: true
      }
    }
  : undefined;

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Write here instead of stdout; disables the pretty transport */
  destination?: DestinationStream;
}

export function createLogger({ level = env.LOG_LEVEL, destination }: LoggerOptions = {}): Logger {
  const options = {
    level,
    base: {
      lib: 'crypt-token',
      env: env.NODE_ENV
    },
    redact: {
      paths: redactPaths,
      remove: true
    }
  };

  return destination ? pino(options, destination) : pino({ ...options, transport });
}

export const logger = createLogger();
