/**
 * Builds a scope tree from text.
 *
 *   scope   := [ element ("," element)* ]
 *   element := name "=" value | name "(" scope ")" | quoted-string
 *
 * Names and values may be bare tokens or double-quoted strings with
 * backslash escapes. A lone quoted string is stored as a string option
 * under the empty key.
 */

import { ScopeSyntaxError } from '../errors.js';
import { getDefaultLogger, type Logger } from '../observability/logger.js';
import type { ConfigScope } from '../scope.js';
import { Tokenizer, type Token } from './tokenizer.js';

export interface ParseOptions {
  /** Receives a debug record for every sub-scope the parser opens. */
  logger?: Logger;
}

/** Deepest sub-scope nesting the parser accepts. */
export const MAX_DEPTH = 256;

const INT_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?$/;

/** Stores a bare literal under the kind its spelling implies. */
export function assignLiteral(scope: ConfigScope, key: string, literal: string): void {
  if (literal === 'true' || literal === 'false') {
    scope.set('bool', key, literal === 'true');
    return;
  }
  if (INT_PATTERN.test(literal)) {
    const n = Number(literal);
    if (Number.isSafeInteger(n)) {
      scope.set('int', key, n);
    } else {
      scope.set('float', key, n);
    }
    return;
  }
  if (FLOAT_PATTERN.test(literal)) {
    const n = Number(literal);
    if (Number.isFinite(n)) {
      scope.set('float', key, n);
      return;
    }
  }
  scope.set('string', key, literal);
}

class ScopeParser {
  private readonly _tokens: Tokenizer;
  private readonly _logger: Logger;
  private _depth = 0;

  constructor(text: string, options?: ParseOptions) {
    this._tokens = new Tokenizer(text);
    this._logger = options?.logger ?? getDefaultLogger();
  }

  parse(scope: ConfigScope): void {
    this._parseList(scope, '');
    const trailing = this._tokens.peek();
    if (trailing.type === ')') {
      this._fail("Unmatched ')'", trailing);
    }
    if (trailing.type !== 'eof') {
      this._fail('Unexpected trailing characters', trailing);
    }
  }

  private _parseList(scope: ConfigScope, path: string): void {
    const first = this._tokens.peek();
    if (first.type === 'eof' || first.type === ')') return;

    for (;;) {
      this._parseElement(scope, path);
      if (this._tokens.peek().type !== ',') return;
      this._tokens.next();
    }
  }

  private _parseElement(scope: ConfigScope, path: string): void {
    const name = this._tokens.next();
    if (name.type !== 'bare' && name.type !== 'quoted') {
      this._fail('Expected option name', name);
    }

    const lookahead = this._tokens.peek();
    if (lookahead.type === '=') {
      this._tokens.next();
      this._parseValue(scope, name.value);
      return;
    }
    if (lookahead.type === '(') {
      this._tokens.next();
      this._parseSubscope(scope, name.value, path, lookahead);
      return;
    }
    if (name.type === 'quoted' && (lookahead.type === ',' || lookahead.type === ')' || lookahead.type === 'eof')) {
      scope.set('string', '', name.value);
      return;
    }
    this._fail(`Expected '=' or '(' after '${name.value}'`, lookahead);
  }

  private _parseValue(scope: ConfigScope, key: string): void {
    const value = this._tokens.next();
    if (value.type === 'quoted') {
      scope.set('string', key, value.value);
    } else if (value.type === 'bare') {
      assignLiteral(scope, key, value.value);
    } else {
      this._fail(`Expected value for '${key}'`, value);
    }
  }

  private _parseSubscope(scope: ConfigScope, name: string, path: string, open: Token): void {
    if (this._depth >= MAX_DEPTH) {
      this._fail('Nesting too deep', open);
    }
    const childPath = path ? `${path}.${name}` : name;
    let child: ConfigScope;
    if (scope.hasSubscope(name)) {
      child = scope.getMutableSubscope(name);
    } else {
      child = scope.addSubscope(name);
      this._logger.debug('Opened subscope', { path: childPath });
    }

    this._depth++;
    this._parseList(child, childPath);
    this._depth--;
    const close = this._tokens.next();
    if (close.type === 'eof') {
      this._fail("Unmatched '('", open);
    }
    if (close.type !== ')') {
      this._fail(`Expected ',' or ')' in '${childPath}'`, close);
    }
  }

  private _fail(reason: string, token: Token): never {
    throw new ScopeSyntaxError(reason, token.position, this._tokens.text);
  }
}

/** Parses `text` into an existing scope. */
export function parseInto(scope: ConfigScope, text: string, options?: ParseOptions): void {
  new ScopeParser(text, options).parse(scope);
}
