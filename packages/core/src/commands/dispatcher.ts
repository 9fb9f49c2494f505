/**
 * @fileoverview Command Dispatcher
 *
 * Runs the handler of a parsed command and normalizes every outcome,
 * including parse failures and thrown errors, into a CommandResult.
 */

import { createLogger } from '../logging/index.js';
import { parseErrorString, type ParseResult } from './parser.js';
import type { CommandFailure, CommandResult, CommandSuccess, ErrorKind, ParsedCommand } from './types.js';

const log = createLogger('commands:dispatcher');

const ERROR_KIND_LABELS: Record<ErrorKind, string> = {
  command_failed: 'Command failed',
  invalid_command: 'Invalid command',
  permission_denied: 'Permission denied',
  not_implemented: 'Not implemented',
  internal: 'Internal error',
  not_initialized: 'Not initialized',
};

// =============================================================================
// Result Builders
// =============================================================================

export function commandSuccess(output?: string): CommandSuccess {
  return output === undefined
    ? { success: true, shouldExit: false }
    : { success: true, output, shouldExit: false };
}

export function commandError(errorKind: ErrorKind, error: string): CommandFailure {
  return { success: false, errorKind, error, shouldExit: false };
}

/**
 * Success that asks the game loop to stop
 */
export function commandExit(output?: string): CommandSuccess {
  return output === undefined
    ? { success: true, shouldExit: true }
    : { success: true, output, shouldExit: true };
}

export function errorKindLabel(kind: ErrorKind): string {
  return ERROR_KIND_LABELS[kind];
}

// =============================================================================
// Dispatch
// =============================================================================

/**
 * Invoke a parsed command's handler; the handler's result passes through
 */
export function executeCommand(command: ParsedCommand): CommandResult {
  const stopTimer = log.startTimer(`command ${command.name}`);
  try {
    const result = command.descriptor.handler(command);
    log.debug('Command executed', { command: command.name, success: result.success });
    return result;
  } catch (error) {
    log.error('Command handler threw', {
      command: command.name,
      err: error instanceof Error ? error : new Error(String(error)),
    });
    return commandError(
      'command_failed',
      error instanceof Error ? error.message : 'Command execution failed'
    );
  } finally {
    stopTimer();
  }
}

/**
 * Dispatch a parse outcome. Failed parses never reach a handler.
 */
export function dispatch(parsed: ParseResult): CommandResult {
  if (!parsed.success) {
    log.debug('Parse failed', { kind: parsed.error.kind });
    return commandError('command_failed', `Parse error: ${parseErrorString(parsed.error)}`);
  }
  return executeCommand(parsed.command);
}
