/**
 * optscope - Hierarchical, typed option scopes with usage tracking.
 */

// Core
export { ConfigScope, createScope } from './scope.js';
export type { ScopeReader, ValueRef } from './scope.js';
export { OptionId, resolveKey, describeKey, optionIdForKey } from './option-id.js';
export type { OptionIdInit, OptionKey } from './option-id.js';

// Stores
export { TypedStore, StoreEntry } from './store/typed-store.js';
export { VALUE_SCHEMAS, VALUE_KINDS, ZERO_VALUES, KIND_NAMES, isValueOf } from './store/value-kinds.js';
export type { ValueKind, ValueOf, ValueTypes } from './store/value-kinds.js';

// Parsing
export { parseScope, parseInto, assignLiteral, Tokenizer, MAX_DEPTH } from './parser/index.js';
export type { ParseOptions, Token, TokenType } from './parser/index.js';

// Validation
export { walkScopes, checkTreeAllRead } from './validation.js';
export type { TreeCheckOptions } from './validation.js';

// Errors
export {
  ScopeError,
  KeyNotFoundError,
  SubscopeNotFoundError,
  DuplicateSubscopeError,
  ScopeSyntaxError,
  UnrecognizedOptionError,
  ValueTypeError,
  InvalidOptionIdError,
  ErrorCodes,
} from './errors.js';
export type { ErrorCode, ErrorOptions } from './errors.js';

// Observability
export { Logger, getDefaultLogger } from './observability/logger.js';
export type { LogLevel, LoggerOptions, WritableOutput } from './observability/logger.js';

export const VERSION = '0.1.0';
