/**
 * @fileoverview Main entry point for @necromancers-shell/tui
 *
 * Terminal front end: readline line source, tab completion, result
 * rendering, built-in commands and the shell loop.
 */
export * from './types.js';
export * from './theme.js';
export * from './render.js';
export * from './completer.js';
export * from './config.js';
export * from './shell.js';
export * from './commands/builtins.js';
export * from './input/readline-source.js';
