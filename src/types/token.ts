/**
 * Token type definitions
 */
export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
  // Offsets of the lexeme within the source buffer
  start: number;
  end: number;
}

export enum TokenType {
  KEYWORD,
  SYMBOL,
  INTEGER_CONSTANT,
  STRING_CONSTANT,
  IDENTIFIER,
  // End of file
  EOF,
}

export enum Keyword {
  CLASS = 'class',
  CONSTRUCTOR = 'constructor',
  FUNCTION = 'function',
  METHOD = 'method',
  FIELD = 'field',
  STATIC = 'static',
  VAR = 'var',
  INT = 'int',
  CHAR = 'char',
  BOOLEAN = 'boolean',
  VOID = 'void',
  TRUE = 'true',
  FALSE = 'false',
  NULL = 'null',
  THIS = 'this',
  LET = 'let',
  DO = 'do',
  IF = 'if',
  ELSE = 'else',
  WHILE = 'while',
  RETURN = 'return',
}

export const KEYWORDS: ReadonlyMap<string, Keyword> = new Map(
  Object.values(Keyword).map((keyword) => [keyword, keyword] as const)
);

export const SYMBOLS: ReadonlySet<string> = new Set([
  '{', '}', '(', ')', '[', ']', '.', ',', ';',
  '+', '-', '*', '/', '&', '|', '<', '>', '=', '~',
]);

export const EOF_LEXEME = 'eof';

export const describeToken = (token: Token): string =>
  token.type === TokenType.EOF
    ? 'end of input'
    : `${TokenType[token.type]} "${token.value}"`;
