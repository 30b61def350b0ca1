import type { Parser } from './parser';
import {
  ASTNodeType,
  BinaryOperator,
  BinaryTail,
  Expression,
  Keyword,
  KeywordConstantValue,
  SubroutineCall,
  Term,
  TokenType,
} from '../types';

const BINARY_OPERATORS: ReadonlySet<string> = new Set(['+', '-', '*', '/', '&', '|', '<', '>', '=']);
const KEYWORD_CONSTANTS: ReadonlySet<string> = new Set([Keyword.TRUE, Keyword.FALSE, Keyword.NULL, Keyword.THIS]);

const isBinaryOperator = (value: string): value is BinaryOperator => BINARY_OPERATORS.has(value);
const isKeywordConstant = (value: string): value is KeywordConstantValue => KEYWORD_CONSTANTS.has(value);

/**
 * expression := term (op term)?
 *
 * Only one operator/term pair is read. In `a + b + c` the second `+` is
 * left for the enclosing construct.
 */
export function parseExpression(this: Parser): Expression {
  const line = this.peek()?.line;
  const term = this.parseTerm();
  const rest: BinaryTail[] = [];
  const operator = this.parseBinaryOperator();
  if (operator) {
    rest.push({ operator, term: this.parseTerm() });
  }
  return { type: ASTNodeType.EXPRESSION, term, rest, line };
}

export function parseBinaryOperator(this: Parser): BinaryOperator | null {
  const token = this.peek();
  if (!token || token.type !== TokenType.SYMBOL) return null;
  const operator = token.value;
  if (!isBinaryOperator(operator)) return null;
  this.consume();
  return operator;
}

export function parseTerm(this: Parser): Term {
  const token = this.peek();
  if (!token) this.fail('a term');
  const line = token.line;
  const value = token.value;

  if (token.type === TokenType.KEYWORD && isKeywordConstant(value)) {
    this.consume();
    return { type: ASTNodeType.KEYWORD_CONSTANT, value, line };
  }

  if (token.type === TokenType.SYMBOL && (value === '-' || value === '~')) {
    this.consume();
    const term = this.parseTerm();
    return { type: ASTNodeType.UNARY_OPERATION, operator: value, term, line };
  }

  if (token.type === TokenType.INTEGER_CONSTANT) {
    this.consume();
    return { type: ASTNodeType.INTEGER_CONSTANT, value: Number(value), line };
  }

  if (token.type === TokenType.STRING_CONSTANT) {
    this.consume();
    return { type: ASTNodeType.STRING_CONSTANT, value, line };
  }

  if (token.type === TokenType.SYMBOL && value === '(') {
    this.consume();
    const expression = this.parseExpression();
    this.expectSymbol(')');
    return { type: ASTNodeType.PARENTHESIZED, expression, line };
  }

  if (token.type === TokenType.IDENTIFIER) {
    // One more token decides between varName, varName[...] and a call
    const next = this.peek(1);
    if (next && next.type === TokenType.SYMBOL && next.value === '[') {
      this.consume();
      this.consume();
      const index = this.parseExpression();
      this.expectSymbol(']');
      return { type: ASTNodeType.ARRAY_ELEMENT, name: value, index, line };
    }
    if (next && next.type === TokenType.SYMBOL && (next.value === '(' || next.value === '.')) {
      return { type: ASTNodeType.SUBROUTINE_CALL_TERM, call: this.parseSubroutineCall(), line };
    }
    this.consume();
    return { type: ASTNodeType.VAR_NAME, name: value, line };
  }

  return this.fail('a term');
}

export function parseSubroutineCall(this: Parser): SubroutineCall {
  const first = this.expectIdentifier();
  if (this.matchSymbol('.')) {
    this.consume();
    const name = this.expectIdentifier().value;
    this.expectSymbol('(');
    const args = this.parseExpressionList();
    this.expectSymbol(')');
    return { type: ASTNodeType.CLASS_CALL, target: first.value, name, args, line: first.line };
  }
  this.expectSymbol('(');
  const args = this.parseExpressionList();
  this.expectSymbol(')');
  return { type: ASTNodeType.CALL, name: first.value, args, line: first.line };
}

export function parseExpressionList(this: Parser): Expression[] {
  const args: Expression[] = [];
  if (this.matchSymbol(')')) return args;
  args.push(this.parseExpression());
  while (this.matchSymbol(',')) {
    this.consume();
    args.push(this.parseExpression());
  }
  return args;
}
