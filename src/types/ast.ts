export enum ASTNodeType {
  CLASS = 'Class',
  CLASS_VAR_DEC = 'ClassVarDec',
  SUBROUTINE_DEC = 'SubroutineDec',
  VAR_DEC = 'VarDec',
  PRIMITIVE_TYPE = 'PrimitiveType',
  CLASS_TYPE = 'ClassType',

  LET_STATEMENT = 'LetStatement',
  IF_STATEMENT = 'IfStatement',
  WHILE_STATEMENT = 'WhileStatement',
  DO_STATEMENT = 'DoStatement',
  RETURN_STATEMENT = 'ReturnStatement',

  EXPRESSION = 'Expression',
  INTEGER_CONSTANT = 'IntegerConstant',
  STRING_CONSTANT = 'StringConstant',
  KEYWORD_CONSTANT = 'KeywordConstant',
  VAR_NAME = 'VarName',
  ARRAY_ELEMENT = 'ArrayElement',
  PARENTHESIZED = 'Parenthesized',
  UNARY_OPERATION = 'UnaryOperation',
  SUBROUTINE_CALL_TERM = 'SubroutineCallTerm',

  CALL = 'Call',
  CLASS_CALL = 'ClassCall',
}

export interface BaseASTNode<T extends ASTNodeType = ASTNodeType> {
  readonly type: T;
  // Line of the node's first token
  readonly line?: number;
}

export type ClassVarKind = 'static' | 'field';
export type SubroutineKind = 'constructor' | 'function' | 'method';
export type PrimitiveTypeName = 'int' | 'char' | 'boolean';
export type KeywordConstantValue = 'true' | 'false' | 'null' | 'this';
export type BinaryOperator = '+' | '-' | '*' | '/' | '&' | '|' | '<' | '>' | '=';
export type UnaryOperator = '-' | '~';

export interface PrimitiveType extends BaseASTNode<ASTNodeType.PRIMITIVE_TYPE> {
  readonly name: PrimitiveTypeName;
}

export interface ClassType extends BaseASTNode<ASTNodeType.CLASS_TYPE> {
  readonly name: string;
}

export type JackType = PrimitiveType | ClassType;

export interface ClassDec extends BaseASTNode<ASTNodeType.CLASS> {
  readonly name: string;
  readonly classVarDecs: readonly ClassVarDec[];
  readonly subroutineDecs: readonly SubroutineDec[];
}

export interface ClassVarDec extends BaseASTNode<ASTNodeType.CLASS_VAR_DEC> {
  readonly kind: ClassVarKind;
  readonly varType: JackType;
  readonly names: readonly string[];
}

export interface Parameter {
  readonly varType: JackType;
  readonly name: string;
}

export interface VarDec extends BaseASTNode<ASTNodeType.VAR_DEC> {
  readonly varType: JackType;
  readonly names: readonly string[];
}

export interface SubroutineBody {
  readonly varDecs: readonly VarDec[];
  readonly statements: readonly Statement[];
}

export interface SubroutineDec extends BaseASTNode<ASTNodeType.SUBROUTINE_DEC> {
  readonly kind: SubroutineKind;
  readonly returnType: 'void' | JackType;
  readonly name: string;
  readonly parameters: readonly Parameter[];
  readonly body: SubroutineBody;
}

export interface LetStatement extends BaseASTNode<ASTNodeType.LET_STATEMENT> {
  readonly varName: string;
  // Present for `let a[i] = ...`
  readonly index: Expression | null;
  readonly value: Expression;
}

export interface IfStatement extends BaseASTNode<ASTNodeType.IF_STATEMENT> {
  readonly condition: Expression;
  readonly thenBranch: readonly Statement[];
  readonly elseBranch: readonly Statement[] | null;
}

export interface WhileStatement extends BaseASTNode<ASTNodeType.WHILE_STATEMENT> {
  readonly condition: Expression;
  readonly body: readonly Statement[];
}

export interface DoStatement extends BaseASTNode<ASTNodeType.DO_STATEMENT> {
  readonly call: SubroutineCall;
}

export interface ReturnStatement extends BaseASTNode<ASTNodeType.RETURN_STATEMENT> {
  readonly value: Expression | null;
}

export type Statement =
  | LetStatement
  | IfStatement
  | WhileStatement
  | DoStatement
  | ReturnStatement;

export interface BinaryTail {
  readonly operator: BinaryOperator;
  readonly term: Term;
}

/**
 * `term (op term)?` — the parser fills `rest` with at most one pair.
 */
export interface Expression extends BaseASTNode<ASTNodeType.EXPRESSION> {
  readonly term: Term;
  readonly rest: readonly BinaryTail[];
}

export interface IntegerConstant extends BaseASTNode<ASTNodeType.INTEGER_CONSTANT> {
  readonly value: number;
}

export interface StringConstant extends BaseASTNode<ASTNodeType.STRING_CONSTANT> {
  readonly value: string;
}

export interface KeywordConstant extends BaseASTNode<ASTNodeType.KEYWORD_CONSTANT> {
  readonly value: KeywordConstantValue;
}

export interface VarName extends BaseASTNode<ASTNodeType.VAR_NAME> {
  readonly name: string;
}

export interface ArrayElement extends BaseASTNode<ASTNodeType.ARRAY_ELEMENT> {
  readonly name: string;
  readonly index: Expression;
}

export interface Parenthesized extends BaseASTNode<ASTNodeType.PARENTHESIZED> {
  readonly expression: Expression;
}

export interface UnaryOperation extends BaseASTNode<ASTNodeType.UNARY_OPERATION> {
  readonly operator: UnaryOperator;
  readonly term: Term;
}

export interface SubroutineCallTerm extends BaseASTNode<ASTNodeType.SUBROUTINE_CALL_TERM> {
  readonly call: SubroutineCall;
}

export type Term =
  | IntegerConstant
  | StringConstant
  | KeywordConstant
  | VarName
  | ArrayElement
  | Parenthesized
  | UnaryOperation
  | SubroutineCallTerm;

/** `name(args)`: the receiver is the current object. */
export interface Call extends BaseASTNode<ASTNodeType.CALL> {
  readonly name: string;
  readonly args: readonly Expression[];
}

/** `target.name(args)`: `target` is a variable or a class name. */
export interface ClassCall extends BaseASTNode<ASTNodeType.CLASS_CALL> {
  readonly target: string;
  readonly name: string;
  readonly args: readonly Expression[];
}

export type SubroutineCall = Call | ClassCall;
