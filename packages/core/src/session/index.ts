/**
 * @fileoverview Session module exports
 */
export * from './types.js';
export { CommandSession, createCommandSession } from './command-session.js';
