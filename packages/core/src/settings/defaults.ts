/**
 * @fileoverview Default Settings
 *
 * Fallback values when the user settings file does not specify them.
 */

import type { ShellSettings } from './types.js';

export const DEFAULT_PROMPT = 'necromancer> ';

export const DEFAULT_SETTINGS: ShellSettings = {
  prompt: DEFAULT_PROMPT,
  history: {
    capacity: 100,
    persist: true,
  },
  logging: {
    level: 'warn',
    pretty: true,
  },
};
