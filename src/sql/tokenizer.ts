/**
 * Query Tokenizer
 * ================
 *
 * Turns query text into a positioned token stream. Lexical forms:
 *
 * - keywords (case-insensitive, value upper-cased) and identifiers
 * - `[any name]` bracketed column names, always names even when numeric
 * - `#3` positional column indices (0-based)
 * - `{type:path}` or bare `type:path` datasource literals
 * - `'string'` / `"string"` literals, a doubled quote escapes itself
 * - numbers, comparison operators and punctuation
 *
 * @module
 */

import { QuerySyntaxError } from '../errors';

export type TokenType =
  | 'KEYWORD'
  | 'IDENTIFIER'
  | 'BRACKETED'
  | 'INDEX'
  | 'DATASOURCE'
  | 'STRING'
  | 'NUMBER'
  | 'OPERATOR'
  | 'PUNCTUATION'
  | 'EOF';

export interface Token {
  type: TokenType;
  value: string;
  /** 1-based line of the first character */
  line: number;
  /** 1-based column of the first character */
  column: number;
}

export const END_OF_INPUT = '<end of input>';

export const KEYWORDS: ReadonlySet<string> = new Set([
  'SELECT', 'DISTINCT', 'INTO', 'FROM', 'AS',
  'JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL', 'OUTER', 'ON',
  'WHERE', 'AND', 'OR', 'NOT', 'LIKE',
  'GROUP', 'ORDER', 'BY', 'ASC', 'DESC', 'LIMIT', 'TAIL',
  'INSERT', 'VALUES', 'UPDATE', 'SET', 'DELETE',
  'NULL', 'TRUE', 'FALSE',
]);

export type TokenizerErrorType =
  | 'unterminated_string'
  | 'unterminated_identifier'
  | 'unterminated_datasource'
  | 'invalid_token';

export class TokenizerError extends QuerySyntaxError {
  constructor(
    message: string,
    public readonly source: string,
    public readonly position: number,
    character: string,
    line: number,
    column: number,
    public readonly errorType: TokenizerErrorType,
  ) {
    super(message, character, line, column);
    this.message = TokenizerError.createDetailedMessage(this.message, source, line, column);
  }

  private static createDetailedMessage(message: string, source: string, line: number, column: number): string {
    const errorLine = source.split('\n')[line - 1] ?? '';
    const pointer = ' '.repeat(Math.max(0, column - 1)) + '^';
    return `${message}\n${errorLine}\n${pointer}`;
  }
}

interface Rule {
  type: TokenType | 'SKIP';
  pattern: RegExp;
  /** Capture group holding the token value (whole match when absent) */
  group?: number;
  unescape?: (value: string) => string;
}

// Order matters: datasource literals before words, numbers before punctuation
const RULES: readonly Rule[] = [
  { type: 'SKIP', pattern: /\s+/y },
  { type: 'SKIP', pattern: /--[^\n]*/y },
  { type: 'DATASOURCE', pattern: /\{([^{}\n]*)\}/y, group: 1 },
  { type: 'DATASOURCE', pattern: /[A-Za-z_][A-Za-z0-9_]*:[^\s;,()]+/y },
  { type: 'STRING', pattern: /'((?:[^']|'')*)'/y, group: 1, unescape: value => value.replace(/''/g, "'") },
  { type: 'STRING', pattern: /"((?:[^"]|"")*)"/y, group: 1, unescape: value => value.replace(/""/g, '"') },
  { type: 'BRACKETED', pattern: /\[([^\]\n]*)\]/y, group: 1 },
  { type: 'INDEX', pattern: /#(\d+)/y, group: 1 },
  { type: 'NUMBER', pattern: /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y },
  { type: 'IDENTIFIER', pattern: /[A-Za-z_][A-Za-z0-9_]*/y },
  { type: 'OPERATOR', pattern: /<=|>=|<>|!=|=|<|>/y },
  { type: 'PUNCTUATION', pattern: /[(),;.*]/y },
];

const UNTERMINATED: Record<string, { label: string; errorType: TokenizerErrorType }> = {
  "'": { label: 'string literal', errorType: 'unterminated_string' },
  '"': { label: 'string literal', errorType: 'unterminated_string' },
  '[': { label: 'bracketed column name', errorType: 'unterminated_identifier' },
  '{': { label: 'datasource literal', errorType: 'unterminated_datasource' },
};

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let position = 0;
  let line = 1;
  let column = 1;

  const advance = (text: string): void => {
    for (const char of text) {
      if (char === '\n') {
        line++;
        column = 1;
      } else {
        column++;
      }
    }
    position += text.length;
  };

  scan: while (position < source.length) {
    for (const rule of RULES) {
      rule.pattern.lastIndex = position;
      const match = rule.pattern.exec(source);
      if (!match) continue;

      const text = match[0];
      if (rule.type !== 'SKIP') {
        const raw = rule.group !== undefined ? match[rule.group] : text;
        tokens.push({ type: rule.type, value: rule.unescape ? rule.unescape(raw) : raw, line, column });
      }
      advance(text);
      continue scan;
    }

    const char = source[position];
    const unterminated = UNTERMINATED[char];
    if (unterminated) {
      throw new TokenizerError(
        `Unterminated ${unterminated.label}`,
        source,
        position,
        char,
        line,
        column,
        unterminated.errorType,
      );
    }
    throw new TokenizerError(`Unexpected character`, source, position, char, line, column, 'invalid_token');
  }

  tokens.push({ type: 'EOF', value: END_OF_INPUT, line, column });
  return tokens.map(promoteKeyword);
}

function promoteKeyword(token: Token): Token {
  if (token.type !== 'IDENTIFIER') return token;
  const upper = token.value.toUpperCase();
  return KEYWORDS.has(upper) ? { ...token, type: 'KEYWORD', value: upper } : token;
}
