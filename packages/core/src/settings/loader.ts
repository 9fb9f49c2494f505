/**
 * @fileoverview Settings Loader
 *
 * Loads ~/.necroshell/settings.json, validates it against the settings schema
 * and merges it over the defaults. A missing file means defaults; an invalid
 * file is reported and ignored.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { createLogger } from '../logging/index.js';
import { DEFAULT_SETTINGS } from './defaults.js';
import { formatSettingsIssues, userSettingsSchema, type UserSettings } from './schema.js';
import type { ShellSettings } from './types.js';

const log = createLogger('settings');

// =============================================================================
// Constants
// =============================================================================

const SETTINGS_DIR = '.necroshell';
const SETTINGS_FILE = 'settings.json';

export type UserSettingsResult =
  | { status: 'missing' }
  | { status: 'loaded'; settings: UserSettings }
  | { status: 'invalid'; issues: string[] };

// =============================================================================
// Paths
// =============================================================================

/**
 * Get the path to the settings directory
 */
export function getSettingsDir(homeDir?: string): string {
  return path.join(homeDir ?? os.homedir(), SETTINGS_DIR);
}

/**
 * Get the path to the settings file
 */
export function getSettingsPath(homeDir?: string): string {
  return path.join(getSettingsDir(homeDir), SETTINGS_FILE);
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Read and validate the user settings file
 */
export function readUserSettings(settingsPath?: string): UserSettingsResult {
  const filePath = settingsPath ?? getSettingsPath();

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return { status: 'missing' };
    }
    return {
      status: 'invalid',
      issues: [error instanceof Error ? error.message : String(error)],
    };
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    return {
      status: 'invalid',
      issues: [`invalid JSON: ${error instanceof Error ? error.message : String(error)}`],
    };
  }

  const parsed = userSettingsSchema.safeParse(json);
  if (!parsed.success) {
    return { status: 'invalid', issues: formatSettingsIssues(parsed.error) };
  }
  return { status: 'loaded', settings: parsed.data };
}

/**
 * Merge user settings over defaults
 */
export function mergeSettings(base: ShellSettings, user: UserSettings): ShellSettings {
  return {
    prompt: user.prompt ?? base.prompt,
    history: { ...base.history, ...user.history },
    logging: { ...base.logging, ...user.logging },
  };
}

/**
 * Load and merge settings with defaults
 */
export function loadSettings(settingsPath?: string): ShellSettings {
  const filePath = settingsPath ?? getSettingsPath();
  const result = readUserSettings(filePath);

  switch (result.status) {
    case 'missing':
      return structuredClone(DEFAULT_SETTINGS);
    case 'invalid':
      log.warn('Ignoring invalid settings file', { path: filePath, issues: result.issues });
      return structuredClone(DEFAULT_SETTINGS);
    case 'loaded':
      return mergeSettings(DEFAULT_SETTINGS, result.settings);
  }
}

/**
 * Save settings to file
 */
export function saveSettings(settings: UserSettings, settingsPath?: string): void {
  const filePath = settingsPath ?? getSettingsPath();
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, `${JSON.stringify(settings, null, 2)}\n`, 'utf-8');
}
