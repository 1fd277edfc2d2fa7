export { env } from './env.js';
export type { AppEnvironment } from './env.js';
export {
  createSettings,
  configure,
  getSettings,
  isConfigured,
  resetSettings,
  type Settings,
  type SettingsInput
} from './settings.js';
