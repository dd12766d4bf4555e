/**
 * Filter DSL Tokenizer
 *
 * Tokens:
 *   identifier = [A-Za-z0-9_.]+            (keywords matched case-insensitively)
 *   string     = "'" ( "\'" | "\\" | any other char except "'" and "\" )* "'"
 *   operator   = '=' | '!='
 *   punct      = '(' | ')' | ','
 *
 * Backslash escapes only a quote or a backslash; anything else after a
 * backslash is rejected.
 */

import { LexError } from './errors.js';
import type { KeywordTokenType, Token } from './types.js';

const KEYWORDS: ReadonlyMap<string, KeywordTokenType> = new Map<string, KeywordTokenType>([
  ['and', 'and'],
  ['or', 'or'],
  ['not', 'not'],
  ['in', 'in'],
  ['is', 'is'],
  ['null', 'null'],
  ['like', 'like'],
  ['contains', 'contains'],
]);

const IDENTIFIER_CHAR = /[A-Za-z0-9_.]/;
const WHITESPACE = /\s/;

/**
 * Split a filter expression into tokens
 * @returns Tokens, always terminated by an `eof` token
 * @throws {LexError} on an unterminated string, bad escape or illegal character
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  while (pos < input.length) {
    const char = input[pos];

    if (WHITESPACE.test(char)) {
      pos++;
      continue;
    }

    if (IDENTIFIER_CHAR.test(char)) {
      const start = pos;
      while (pos < input.length && IDENTIFIER_CHAR.test(input[pos])) {
        pos++;
      }
      const text = input.slice(start, pos);
      const keyword = KEYWORDS.get(text.toLowerCase());
      tokens.push({ type: keyword ?? 'identifier', text, position: start });
      continue;
    }

    switch (char) {
      case "'": {
        const literal = readString(input, pos);
        tokens.push({ type: 'string', text: literal.value, position: pos });
        pos = literal.end;
        continue;
      }
      case '=':
        tokens.push({ type: 'eq', text: '=', position: pos });
        pos++;
        continue;
      case '!':
        if (input[pos + 1] === '=') {
          tokens.push({ type: 'neq', text: '!=', position: pos });
          pos += 2;
          continue;
        }
        break;
      case '(':
        tokens.push({ type: 'lparen', text: '(', position: pos });
        pos++;
        continue;
      case ')':
        tokens.push({ type: 'rparen', text: ')', position: pos });
        pos++;
        continue;
      case ',':
        tokens.push({ type: 'comma', text: ',', position: pos });
        pos++;
        continue;
    }

    throw new LexError(`Unexpected character '${char}'`, pos);
  }

  tokens.push({ type: 'eof', text: '', position: input.length });
  return tokens;
}

/** Read a single-quoted literal starting at `start` (the opening quote) */
function readString(input: string, start: number): { value: string; end: number } {
  let pos = start + 1;
  let value = '';

  while (pos < input.length) {
    const char = input[pos];

    if (char === "'") {
      return { value, end: pos + 1 };
    }

    if (char === '\\') {
      if (pos + 1 >= input.length) {
        break;
      }
      const next = input[pos + 1];
      if (next !== "'" && next !== '\\') {
        throw new LexError(`Invalid escape sequence '\\${next}'`, pos);
      }
      value += next;
      pos += 2;
      continue;
    }

    value += char;
    pos++;
  }

  throw new LexError('Unterminated string starting', start);
}
