import type { Parser } from './parser';
import {
  ASTNodeType,
  DoStatement,
  Expression,
  IfStatement,
  Keyword,
  LetStatement,
  ReturnStatement,
  Statement,
  TokenType,
  WhileStatement,
} from '../types';

export function parseStatements(this: Parser): Statement[] {
  const body: Statement[] = [];
  let stmt = this.parseStatement();
  while (stmt) {
    body.push(stmt);
    stmt = this.parseStatement();
  }
  return body;
}

/**
 * Returns null when the next token does not start a statement.
 */
export function parseStatement(this: Parser): Statement | null {
  const token = this.peek();
  if (!token || token.type !== TokenType.KEYWORD) return null;
  switch (token.value) {
    case Keyword.LET:
      return this.parseLetStatement();
    case Keyword.IF:
      return this.parseIfStatement();
    case Keyword.WHILE:
      return this.parseWhileStatement();
    case Keyword.DO:
      return this.parseDoStatement();
    case Keyword.RETURN:
      return this.parseReturnStatement();
    default:
      return null;
  }
}

export function parseLetStatement(this: Parser): LetStatement {
  const line = this.expectKeyword(Keyword.LET).line;
  const varName = this.expectIdentifier().value;
  let index: Expression | null = null;
  if (this.matchSymbol('[')) {
    this.consume();
    index = this.parseExpression();
    this.expectSymbol(']');
  }
  this.expectSymbol('=');
  const value = this.parseExpression();
  this.expectSymbol(';');
  return { type: ASTNodeType.LET_STATEMENT, varName, index, value, line };
}

export function parseIfStatement(this: Parser): IfStatement {
  const line = this.expectKeyword(Keyword.IF).line;
  this.expectSymbol('(');
  const condition = this.parseExpression();
  this.expectSymbol(')');
  this.expectSymbol('{');
  const thenBranch = this.parseStatements();
  this.expectSymbol('}');
  let elseBranch: Statement[] | null = null;
  if (this.matchKeyword(Keyword.ELSE)) {
    this.consume();
    this.expectSymbol('{');
    elseBranch = this.parseStatements();
    this.expectSymbol('}');
  }
  return { type: ASTNodeType.IF_STATEMENT, condition, thenBranch, elseBranch, line };
}

export function parseWhileStatement(this: Parser): WhileStatement {
  const line = this.expectKeyword(Keyword.WHILE).line;
  this.expectSymbol('(');
  const condition = this.parseExpression();
  this.expectSymbol(')');
  this.expectSymbol('{');
  const body = this.parseStatements();
  this.expectSymbol('}');
  return { type: ASTNodeType.WHILE_STATEMENT, condition, body, line };
}

export function parseDoStatement(this: Parser): DoStatement {
  const line = this.expectKeyword(Keyword.DO).line;
  const call = this.parseSubroutineCall();
  this.expectSymbol(';');
  return { type: ASTNodeType.DO_STATEMENT, call, line };
}

export function parseReturnStatement(this: Parser): ReturnStatement {
  const line = this.expectKeyword(Keyword.RETURN).line;
  const value = this.matchSymbol(';') ? null : this.parseExpression();
  this.expectSymbol(';');
  return { type: ASTNodeType.RETURN_STATEMENT, value, line };
}
