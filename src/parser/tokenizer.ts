/**
 * Tokenizer for scope text such as `threads=4, search(cpuct=3.1)`.
 */

import { ScopeSyntaxError } from '../errors.js';

export type TokenType = 'bare' | 'quoted' | '=' | ',' | '(' | ')' | 'eof';

export interface Token {
  type: TokenType;
  value: string;
  /** Offset of the token's first character. */
  position: number;
}

const PUNCTUATION = new Set(['=', ',', '(', ')']);

const WHITESPACE = /\s/;

function isWhitespace(ch: string): boolean {
  return WHITESPACE.test(ch);
}

function isBareChar(ch: string): boolean {
  return !isWhitespace(ch) && !PUNCTUATION.has(ch) && ch !== '"';
}

export class Tokenizer {
  private readonly _text: string;
  private _pos = 0;
  private _lookahead: Token | null = null;

  constructor(text: string) {
    this._text = text;
  }

  get text(): string {
    return this._text;
  }

  peek(): Token {
    if (this._lookahead === null) {
      this._lookahead = this._read();
    }
    return this._lookahead;
  }

  next(): Token {
    const token = this.peek();
    this._lookahead = null;
    return token;
  }

  private _read(): Token {
    const text = this._text;
    while (this._pos < text.length && isWhitespace(text[this._pos])) {
      this._pos++;
    }
    const start = this._pos;
    if (start >= text.length) {
      return { type: 'eof', value: '', position: start };
    }

    const ch = text[start];
    if (ch === '=' || ch === ',' || ch === '(' || ch === ')') {
      this._pos++;
      return { type: ch, value: ch, position: start };
    }
    if (ch === '"') {
      return this._readQuoted(start);
    }

    while (this._pos < text.length && isBareChar(text[this._pos])) {
      this._pos++;
    }
    return { type: 'bare', value: text.slice(start, this._pos), position: start };
  }

  private _readQuoted(start: number): Token {
    const text = this._text;
    let value = '';
    let i = start + 1;
    while (i < text.length) {
      const ch = text[i];
      if (ch === '"') {
        this._pos = i + 1;
        return { type: 'quoted', value, position: start };
      }
      if (ch === '\\') {
        i++;
        if (i >= text.length) break;
        value += text[i];
      } else {
        value += ch;
      }
      i++;
    }
    throw new ScopeSyntaxError('Unterminated quoted string', start, text);
  }
}
