import { CesqlSyntaxError } from './errors.js';

export const TokenType = {
  STRING: 'STRING',
  INTEGER: 'INTEGER',
  IDENTIFIER: 'IDENTIFIER',
  KEYWORD: 'KEYWORD',
  OPERATOR: 'OPERATOR',
  LPAREN: 'LPAREN',
  RPAREN: 'RPAREN',
  COMMA: 'COMMA',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TokenType)[keyof typeof TokenType];

export const KEYWORDS = ['AND', 'OR', 'XOR', 'NOT', 'LIKE', 'IN', 'EXISTS', 'TRUE', 'FALSE'] as const;

export type Keyword = (typeof KEYWORDS)[number];

export interface Token {
  readonly type: TokenType;
  /** Keywords are upper-cased; everything else is verbatim. */
  readonly value: string;
  readonly offset: number;
}

const KEYWORD_SET: ReadonlySet<string> = new Set(KEYWORDS);

/** Longest operators first so `<=` wins over `<`. */
const OPERATORS = ['<>', '!=', '<=', '>=', '=', '<', '>', '+', '-', '*', '/', '%'] as const;

/**
 * Tokenizes a CloudEvents SQL expression.
 * Keywords are case-insensitive; identifiers are case-sensitive.
 */
export function tokenize(input: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;

  const fail = (message: string): never => {
    throw new CesqlSyntaxError(message, input, pos);
  };

  while (pos < input.length) {
    const char = input.charAt(pos);

    if (char === ' ' || char === '\t' || char === '\n' || char === '\r') {
      pos++;
      continue;
    }

    const start = pos;

    if (char === "'" || char === '"') {
      pos++;
      let value = '';
      let closed = false;
      while (pos < input.length) {
        const c = input.charAt(pos);
        if (c === '\\') {
          if (pos + 1 >= input.length) fail('Unterminated escape sequence');
          value += input.charAt(pos + 1);
          pos += 2;
          continue;
        }
        if (c === char) {
          // doubled quote stands for a literal quote
          if (input.charAt(pos + 1) === char) {
            value += char;
            pos += 2;
            continue;
          }
          pos++;
          closed = true;
          break;
        }
        value += c;
        pos++;
      }
      if (!closed) fail('Unterminated string literal');
      tokens.push({ type: TokenType.STRING, value, offset: start });
      continue;
    }

    if (isDigit(char)) {
      while (pos < input.length && isDigit(input.charAt(pos))) pos++;
      if (pos < input.length && isIdentifierStart(input.charAt(pos))) fail('Invalid integer literal');
      tokens.push({ type: TokenType.INTEGER, value: input.slice(start, pos), offset: start });
      continue;
    }

    if (isIdentifierStart(char)) {
      while (pos < input.length && isIdentifierPart(input.charAt(pos))) pos++;
      const word = input.slice(start, pos);
      const upper = word.toUpperCase();
      if (KEYWORD_SET.has(upper)) {
        tokens.push({ type: TokenType.KEYWORD, value: upper, offset: start });
      } else {
        tokens.push({ type: TokenType.IDENTIFIER, value: word, offset: start });
      }
      continue;
    }

    if (char === '(') {
      tokens.push({ type: TokenType.LPAREN, value: char, offset: start });
      pos++;
      continue;
    }
    if (char === ')') {
      tokens.push({ type: TokenType.RPAREN, value: char, offset: start });
      pos++;
      continue;
    }
    if (char === ',') {
      tokens.push({ type: TokenType.COMMA, value: char, offset: start });
      pos++;
      continue;
    }

    const operator = OPERATORS.find((op) => input.startsWith(op, pos));
    if (operator === undefined) fail(`Unexpected character '${char}'`);
    else {
      tokens.push({ type: TokenType.OPERATOR, value: operator, offset: start });
      pos += operator.length;
    }
  }

  tokens.push({ type: TokenType.EOF, value: '', offset: input.length });
  return tokens;
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isIdentifierStart(char: string): boolean {
  return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
}

function isIdentifierPart(char: string): boolean {
  return isIdentifierStart(char) || isDigit(char);
}
