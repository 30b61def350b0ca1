import { Token, TokenType, KEYWORDS, SYMBOLS, EOF_LEXEME, LexicalError } from '../types';

const MAX_INTEGER_CONSTANT = 0xffff;

const isDigit = (char: string) => char >= '0' && char <= '9';
const isIdentifierStart = (char: string) => /[a-zA-Z_$]/.test(char);
const isIdentifierPart = (char: string) => /[a-zA-Z0-9_$]/.test(char);

/**
 * Lexer - turns Jack source text into a token stream
 */
export class Lexer {
  private code: string;
  private pos: number = 0;
  private line: number = 1;
  private column: number = 1;
  private tokens: Token[] = [];

  constructor(code: string) {
    this.code = code;
  }

  tokenize(): Token[] {
    const createToken = (
      type: TokenType,
      value: string,
      start: number,
      end: number = this.pos,
      column: number = this.column - (end - start)
    ): Token => ({
      type,
      value,
      line: this.line,
      column,
      start,
      end,
    });

    const advance = (n: number = 1) => {
      for (let i = 0; i < n; i++) {
        if (this.code[this.pos] === '\n') {
          this.line++;
          this.column = 1;
        } else {
          this.column++;
        }
        this.pos++;
      }
    };

    const peek = (n: number = 0) => this.code[this.pos + n] || '';

    while (this.pos < this.code.length) {
      const char = peek();

      if (char === ' ' || char === '\t' || char === '\r' || char === '\n') {
        advance();
        continue;
      }

      // Line comments
      if (char === '/' && peek(1) === '/') {
        while (this.pos < this.code.length && peek() !== '\n') {
          advance();
        }
        continue;
      }

      // Block and doc comments
      if (char === '/' && peek(1) === '*') {
        const startLine = this.line;
        advance(2);
        while (this.pos < this.code.length && !(peek() === '*' && peek(1) === '/')) {
          advance();
        }
        if (this.pos >= this.code.length) {
          throw new LexicalError('Unterminated comment', startLine);
        }
        advance(2);
        continue;
      }

      if (isDigit(char)) {
        const start = this.pos;
        while (this.pos < this.code.length && isDigit(peek())) {
          advance();
        }
        const lexeme = this.code.slice(start, this.pos);
        if (Number(lexeme) > MAX_INTEGER_CONSTANT) {
          throw new LexicalError(`Could not parse a number: ${lexeme}`, this.line);
        }
        this.tokens.push(createToken(TokenType.INTEGER_CONSTANT, lexeme, start));
        continue;
      }

      if (char === '"') {
        const startLine = this.line;
        // Column of the opening quote
        const startColumn = this.column;
        advance();
        const start = this.pos;
        while (this.pos < this.code.length && peek() !== '"' && peek() !== '\n') {
          advance();
        }
        if (peek() !== '"') {
          throw new LexicalError('Unterminated string', startLine);
        }
        const end = this.pos;
        advance();
        this.tokens.push(createToken(TokenType.STRING_CONSTANT, this.code.slice(start, end), start, end, startColumn));
        continue;
      }

      if (SYMBOLS.has(char)) {
        const start = this.pos;
        advance();
        this.tokens.push(createToken(TokenType.SYMBOL, char, start));
        continue;
      }

      if (isIdentifierStart(char)) {
        const start = this.pos;
        while (this.pos < this.code.length && isIdentifierPart(peek())) {
          advance();
        }
        const word = this.code.slice(start, this.pos);
        const type = KEYWORDS.has(word) ? TokenType.KEYWORD : TokenType.IDENTIFIER;
        this.tokens.push(createToken(type, word, start));
        continue;
      }

      throw new LexicalError(`Unexpected character: ${char}`, this.line);
    }

    this.tokens.push({
      type: TokenType.EOF,
      value: EOF_LEXEME,
      line: this.line,
      column: this.column,
      start: this.pos,
      end: this.pos,
    });
    return this.tokens;
  }
}
