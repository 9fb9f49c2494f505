/**
 * @fileoverview Main entry point for @necromancers-shell/core
 *
 * Command interpreter for the Necromancer's Shell: tokenizer, parser,
 * registry, dispatcher, autocomplete, history and the session that owns them.
 */

// Re-export the command pipeline
export * from './commands/index.js';

// Re-export the session orchestrator
export * from './session/index.js';

// Re-export logging
export * from './logging/index.js';

// Re-export settings
export * from './settings/index.js';

// Version info
export const VERSION = '0.1.0';
export const NAME = 'necromancers-shell';
