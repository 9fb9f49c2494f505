/**
 * @fileoverview Command interpreter exports
 */

export type {
  Token,
  ValueType,
  TypedValue,
  FlagDefinition,
  CommandHandler,
  CommandDescriptor,
  ParsedCommand,
  ErrorKind,
  CommandSuccess,
  CommandFailure,
  CommandResult,
} from './types.js';

export {
  tokenize,
  tokenizeErrorString,
  isBlank,
  type TokenizeError,
  type TokenizeResult,
} from './tokenizer.js';

export {
  coerce,
  formatTypedValue,
  TRUE_LITERALS,
  FALSE_LITERALS,
  type CoercionResult,
} from './coercion.js';

export {
  CommandRegistry,
  createCommandRegistry,
  type ReadonlyCommandRegistry,
} from './registry.js';

export {
  parse,
  parseLine,
  parseErrorString,
  isFlagToken,
  getFlag,
  hasFlag,
  getArg,
  getString,
  getInt,
  getFloat,
  getBool,
  type ParseError,
  type ParseErrorKind,
  type ParseResult,
} from './parser.js';

export {
  dispatch,
  executeCommand,
  commandSuccess,
  commandError,
  commandExit,
  errorKindLabel,
} from './dispatcher.js';

export {
  Autocomplete,
  type CompletionContext,
  type LineCompletion,
} from './autocomplete.js';

export {
  CommandHistory,
  DEFAULT_HISTORY_CAPACITY,
  getDefaultHistoryPath,
} from './history.js';

export { formatCommandHelp, formatCommandList, formatFlagSignature } from './help.js';
