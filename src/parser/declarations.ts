import type { Parser } from './parser';
import {
  ASTNodeType,
  ClassDec,
  ClassVarDec,
  JackType,
  Keyword,
  Parameter,
  SubroutineBody,
  SubroutineDec,
  SubroutineKind,
  TokenType,
  VarDec,
} from '../types';

export function parseClass(this: Parser): ClassDec {
  const line = this.expectKeyword(Keyword.CLASS).line;
  const name = this.expectIdentifier().value;
  this.expectSymbol('{');

  // All class variables come before the first subroutine
  const classVarDecs: ClassVarDec[] = [];
  while (this.matchKeyword(Keyword.STATIC, Keyword.FIELD)) {
    classVarDecs.push(this.parseClassVarDec());
  }

  const subroutineDecs: SubroutineDec[] = [];
  while (this.matchKeyword(Keyword.CONSTRUCTOR, Keyword.FUNCTION, Keyword.METHOD)) {
    subroutineDecs.push(this.parseSubroutineDec());
  }

  this.expectSymbol('}');
  return { type: ASTNodeType.CLASS, name, classVarDecs, subroutineDecs, line };
}

export function parseClassVarDec(this: Parser): ClassVarDec {
  const token = this.consume();
  const kind = token.value === Keyword.STATIC ? 'static' : 'field';
  const varType = this.parseType() ?? this.fail('a type');
  const names = [this.expectIdentifier().value];
  while (this.matchSymbol(',')) {
    this.consume();
    names.push(this.expectIdentifier().value);
  }
  this.expectSymbol(';');
  return { type: ASTNodeType.CLASS_VAR_DEC, kind, varType, names, line: token.line };
}

export function parseType(this: Parser): JackType | null {
  const token = this.peek();
  if (!token) return null;
  if (token.type === TokenType.IDENTIFIER) {
    this.consume();
    return { type: ASTNodeType.CLASS_TYPE, name: token.value, line: token.line };
  }
  if (this.matchKeyword(Keyword.INT, Keyword.CHAR, Keyword.BOOLEAN)) {
    this.consume();
    const name = token.value === Keyword.INT ? 'int' : token.value === Keyword.CHAR ? 'char' : 'boolean';
    return { type: ASTNodeType.PRIMITIVE_TYPE, name, line: token.line };
  }
  return null;
}

const SUBROUTINE_KINDS: ReadonlyMap<string, SubroutineKind> = new Map<string, SubroutineKind>([
  [Keyword.CONSTRUCTOR, 'constructor'],
  [Keyword.FUNCTION, 'function'],
  [Keyword.METHOD, 'method'],
]);

export function parseSubroutineDec(this: Parser): SubroutineDec {
  const token = this.consume();
  const kind = SUBROUTINE_KINDS.get(token.value) ?? this.fail('a subroutine kind');

  let returnType: 'void' | JackType;
  if (this.matchKeyword(Keyword.VOID)) {
    this.consume();
    returnType = 'void';
  } else {
    returnType = this.parseType() ?? this.fail('a return type');
  }

  const name = this.expectIdentifier().value;
  this.expectSymbol('(');
  const parameters = this.parseParameterList();
  this.expectSymbol(')');
  const body = this.parseSubroutineBody();

  return { type: ASTNodeType.SUBROUTINE_DEC, kind, returnType, name, parameters, body, line: token.line };
}

export function parseParameterList(this: Parser): Parameter[] {
  const parameters: Parameter[] = [];
  if (this.matchSymbol(')')) return parameters;
  // eslint-disable-next-line no-constant-condition
  while (true) {
    const varType = this.parseType() ?? this.fail('a parameter type');
    const name = this.expectIdentifier().value;
    parameters.push({ varType, name });
    if (!this.matchSymbol(',')) break;
    this.consume();
  }
  return parameters;
}

export function parseSubroutineBody(this: Parser): SubroutineBody {
  this.expectSymbol('{');
  const varDecs: VarDec[] = [];
  while (this.matchKeyword(Keyword.VAR)) {
    varDecs.push(this.parseVarDec());
  }
  const statements = this.parseStatements();
  this.expectSymbol('}');
  return { varDecs, statements };
}

export function parseVarDec(this: Parser): VarDec {
  const line = this.expectKeyword(Keyword.VAR).line;
  const varType = this.parseType() ?? this.fail('a type');
  const names = [this.expectIdentifier().value];
  while (this.matchSymbol(',')) {
    this.consume();
    names.push(this.expectIdentifier().value);
  }
  this.expectSymbol(';');
  return { type: ASTNodeType.VAR_DEC, varType, names, line };
}
