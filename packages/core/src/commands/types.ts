/**
 * @fileoverview Command Types
 *
 * Types shared by the tokenizer, parser, registry, dispatcher and session.
 */

// =============================================================================
// Tokens
// =============================================================================

/**
 * A single token produced by the tokenizer
 */
export interface Token {
  /** Token text with quotes removed and escapes resolved */
  readonly text: string;
  /** Whether any part of the token was quoted */
  readonly wasQuoted: boolean;
}

// =============================================================================
// Values
// =============================================================================

export type ValueType = 'string' | 'int' | 'float' | 'bool';

/**
 * A flag value coerced to the type its definition declares
 */
export type TypedValue =
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'int'; readonly value: number }
  | { readonly type: 'float'; readonly value: number }
  | { readonly type: 'bool'; readonly value: boolean };

// =============================================================================
// Descriptors
// =============================================================================

/**
 * Flag/option definition attached to a command
 */
export interface FlagDefinition {
  /** Long name, matched by `--name` */
  readonly name: string;
  /** Single-character short name, matched by `-x` */
  readonly short?: string;
  /** Type the flag value is coerced to */
  readonly type: ValueType;
  /** Whether parsing fails when the flag is absent */
  readonly required?: boolean;
  /** Help text for this flag */
  readonly description?: string;
}

/**
 * Command handler function
 */
export type CommandHandler = (command: ParsedCommand) => CommandResult;

/**
 * Registered schema and handler for one command name
 */
export interface CommandDescriptor {
  /** Command name, unique within a registry */
  readonly name: string;
  /** Short description */
  readonly description: string;
  /** Usage pattern, e.g. `upgrade <action> [id]` */
  readonly usage?: string;
  /** Detailed help text */
  readonly helpText?: string;
  /** Flag schema, in declaration order */
  readonly flags?: readonly FlagDefinition[];
  /** Minimum positional arguments */
  readonly minArgs?: number;
  /** Maximum positional arguments (0 = unlimited) */
  readonly maxArgs?: number;
  /** Hide from help listings and completion */
  readonly hidden?: boolean;
  /** Command handler */
  readonly handler: CommandHandler;
}

// =============================================================================
// Parsed Commands
// =============================================================================

/**
 * A command line that passed parsing against its descriptor
 */
export interface ParsedCommand {
  /** The command name (first token) */
  readonly name: string;
  /** Descriptor the name resolved to */
  readonly descriptor: Readonly<CommandDescriptor>;
  /** Flag values keyed by long name */
  readonly flags: ReadonlyMap<string, TypedValue>;
  /** Positional arguments in encounter order */
  readonly args: readonly string[];
  /** Original full input string */
  readonly raw: string;
}

// =============================================================================
// Results
// =============================================================================

export type ErrorKind =
  | 'command_failed'
  | 'invalid_command'
  | 'permission_denied'
  | 'not_implemented'
  | 'internal'
  | 'not_initialized';

/**
 * Successful command execution
 */
export interface CommandSuccess {
  readonly success: true;
  /** Output to display to user */
  readonly output?: string;
  /** Whether the game should exit */
  readonly shouldExit: boolean;
}

/**
 * Failed command execution
 */
export interface CommandFailure {
  readonly success: false;
  readonly errorKind: ErrorKind;
  /** Human-readable error message */
  readonly error: string;
  /** Partial output produced before the failure */
  readonly output?: string;
  readonly shouldExit: boolean;
}

/**
 * Result of command execution, returned by every handler and failure path
 */
export type CommandResult = CommandSuccess | CommandFailure;
