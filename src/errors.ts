/**
 * Error hierarchy for optscope.
 */

export interface ErrorOptions {
  cause?: Error;
  suggestion?: string | null;
}

export class ScopeError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;
  readonly suggestion: string | null;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
    suggestion?: string | null,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'ScopeError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
    this.suggestion = suggestion ?? null;
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    if (this.suggestion !== null) {
      obj.suggestion = this.suggestion;
    }
    return obj;
  }
}

export class KeyNotFoundError extends ScopeError {
  readonly key: string;

  constructor(key: string, options?: ErrorOptions) {
    super('KEY_NOT_FOUND', `Key [${key}] was not set in options.`, { key }, options?.cause, options?.suggestion);
    this.name = 'KeyNotFoundError';
    this.key = key;
  }
}

export class SubscopeNotFoundError extends ScopeError {
  readonly scopeName: string;

  constructor(scopeName: string, options?: ErrorOptions) {
    super(
      'SUBSCOPE_NOT_FOUND',
      `Subdictionary not found: ${scopeName}`,
      { scopeName },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'SubscopeNotFoundError';
    this.scopeName = scopeName;
  }
}

export class DuplicateSubscopeError extends ScopeError {
  readonly scopeName: string;

  constructor(scopeName: string, options?: ErrorOptions) {
    super(
      'DUPLICATE_SUBSCOPE',
      `Subdictionary already exists: ${scopeName}`,
      { scopeName },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'DuplicateSubscopeError';
    this.scopeName = scopeName;
  }
}

/**
 * Malformed scope text. `position` is the zero-based offset of the
 * offending character in the parsed string.
 */
export class ScopeSyntaxError extends ScopeError {
  readonly reason: string;
  readonly position: number;
  readonly context: string;

  constructor(reason: string, position: number, text: string, options?: ErrorOptions) {
    const context = text.slice(Math.max(0, position - 10), position + 10);
    super(
      'SYNTAX_ERROR',
      `${reason} at position ${position} in options string: ${text}`,
      { reason, position, context },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'ScopeSyntaxError';
    this.reason = reason;
    this.position = position;
    this.context = context;
  }
}

export class UnrecognizedOptionError extends ScopeError {
  readonly optionPath: string;

  constructor(kindName: string, optionPath: string, options?: ErrorOptions) {
    super(
      'UNRECOGNIZED_OPTION',
      `Unknown ${kindName} option: ${optionPath}`,
      { kind: kindName, optionPath },
      options?.cause,
      options?.suggestion ?? 'Check the option name for typos.',
    );
    this.name = 'UnrecognizedOptionError';
    this.optionPath = optionPath;
  }
}

export class ValueTypeError extends ScopeError {
  constructor(key: string, kindName: string, value: unknown, options?: ErrorOptions) {
    super(
      'VALUE_TYPE_MISMATCH',
      `Value for key [${key}] is not a valid ${kindName}: ${String(value)}`,
      { key, kind: kindName, value },
      options?.cause,
      options?.suggestion,
    );
    this.name = 'ValueTypeError';
  }
}

export class InvalidOptionIdError extends ScopeError {
  constructor(message: string, options?: ErrorOptions) {
    super('INVALID_OPTION_ID', message, {}, options?.cause, options?.suggestion);
    this.name = 'InvalidOptionIdError';
  }
}

/**
 * All error codes as constants.
 */
export const ErrorCodes = Object.freeze({
  KEY_NOT_FOUND: 'KEY_NOT_FOUND',
  SUBSCOPE_NOT_FOUND: 'SUBSCOPE_NOT_FOUND',
  DUPLICATE_SUBSCOPE: 'DUPLICATE_SUBSCOPE',
  SYNTAX_ERROR: 'SYNTAX_ERROR',
  UNRECOGNIZED_OPTION: 'UNRECOGNIZED_OPTION',
  VALUE_TYPE_MISMATCH: 'VALUE_TYPE_MISMATCH',
  INVALID_OPTION_ID: 'INVALID_OPTION_ID',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
