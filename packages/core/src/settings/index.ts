/**
 * @fileoverview Settings exports
 */

export { DEFAULT_SETTINGS, DEFAULT_PROMPT } from './defaults.js';
export {
  getSettingsDir,
  getSettingsPath,
  readUserSettings,
  mergeSettings,
  loadSettings,
  saveSettings,
  type UserSettingsResult,
} from './loader.js';
export { userSettingsSchema, formatSettingsIssues, type UserSettings } from './schema.js';
export type { ShellSettings, HistorySettings, LoggingSettings } from './types.js';
