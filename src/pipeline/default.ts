import { getSettings } from '../config/settings.js';

import { CryptPipeline } from './crypt-pipeline.js';

let shared: CryptPipeline | undefined;

/**
 * Pipeline over the process-wide settings, built on first use.
 * A new snapshot (only possible after `resetSettings()`) gets a new pipeline,
 * and with it an empty key registry.
 */
export function getDefaultPipeline(): CryptPipeline {
  const settings = getSettings();
  if (!shared || shared.settings !== settings) {
    shared = new CryptPipeline(settings);
  }
  return shared;
}
