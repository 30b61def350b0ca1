import { Token, TokenType, Keyword, ClassDec, JackSyntaxError, describeToken } from '../types';
import * as declarations from './declarations';
import * as statements from './statements';
import * as expressions from './expressions';

/**
 * Parser - turns a token stream into a class AST
 *
 * Productions live in declarations.ts, statements.ts and expressions.ts and
 * are installed on the prototype below.
 */
export class Parser {
  tokens: Token[];
  pos: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  /**
   * Parses one class. Tokens after its closing brace are left unread.
   */
  parse(): ClassDec {
    return this.parseClass();
  }

  peek(offset: number = 0): Token | null {
    return this.pos + offset < this.tokens.length ? this.tokens[this.pos + offset] : null;
  }

  consume(): Token {
    const token = this.peek();
    if (!token || token.type === TokenType.EOF) {
      this.fail('a token');
    }
    this.pos++;
    return token;
  }

  match(type: TokenType, value?: string): boolean {
    const token = this.peek();
    if (!token) return false;
    if (token.type !== type) return false;
    if (value !== undefined && token.value !== value) return false;
    return true;
  }

  matchKeyword(...keywords: Keyword[]): boolean {
    return keywords.some((keyword) => this.match(TokenType.KEYWORD, keyword));
  }

  matchSymbol(...symbols: string[]): boolean {
    return symbols.some((symbol) => this.match(TokenType.SYMBOL, symbol));
  }

  expect(type: TokenType, value?: string): Token {
    if (!this.match(type, value)) {
      this.fail(`${TokenType[type]}${value !== undefined ? ` "${value}"` : ''}`);
    }
    return this.consume();
  }

  expectKeyword(keyword: Keyword): Token {
    return this.expect(TokenType.KEYWORD, keyword);
  }

  expectSymbol(symbol: string): Token {
    return this.expect(TokenType.SYMBOL, symbol);
  }

  expectIdentifier(): Token {
    return this.expect(TokenType.IDENTIFIER);
  }

  fail(expected: string): never {
    const token = this.peek();
    throw new JackSyntaxError(expected, token ? describeToken(token) : 'end of input', token?.line);
  }
}

export interface Parser {
  parseClass: typeof declarations.parseClass;
  parseClassVarDec: typeof declarations.parseClassVarDec;
  parseType: typeof declarations.parseType;
  parseSubroutineDec: typeof declarations.parseSubroutineDec;
  parseParameterList: typeof declarations.parseParameterList;
  parseSubroutineBody: typeof declarations.parseSubroutineBody;
  parseVarDec: typeof declarations.parseVarDec;

  parseStatements: typeof statements.parseStatements;
  parseStatement: typeof statements.parseStatement;
  parseLetStatement: typeof statements.parseLetStatement;
  parseIfStatement: typeof statements.parseIfStatement;
  parseWhileStatement: typeof statements.parseWhileStatement;
  parseDoStatement: typeof statements.parseDoStatement;
  parseReturnStatement: typeof statements.parseReturnStatement;

  parseExpression: typeof expressions.parseExpression;
  parseBinaryOperator: typeof expressions.parseBinaryOperator;
  parseTerm: typeof expressions.parseTerm;
  parseSubroutineCall: typeof expressions.parseSubroutineCall;
  parseExpressionList: typeof expressions.parseExpressionList;
}

Object.assign(Parser.prototype, declarations, statements, expressions);
