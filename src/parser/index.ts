import { ConfigScope } from '../scope.js';
import { parseInto, type ParseOptions } from './scope-parser.js';

export { Tokenizer } from './tokenizer.js';
export type { Token, TokenType } from './tokenizer.js';
export { parseInto, assignLiteral, MAX_DEPTH } from './scope-parser.js';
export type { ParseOptions } from './scope-parser.js';

/** Parses `text` into a fresh root scope. */
export function parseScope(text: string, options?: ParseOptions): ConfigScope {
  const root = new ConfigScope();
  parseInto(root, text, options);
  return root;
}
