import type { ClassCompiler } from './class-compiler';
import { SubroutineSymbolTable, SymbolEntry } from './symbol-table';
import { VmWriter } from './vm-writer';
import {
  ASTNodeType,
  BinaryOperator,
  Expression,
  IfStatement,
  LetStatement,
  MalformedConstructError,
  OS_MATH_DIVIDE,
  OS_MATH_MULTIPLY,
  OS_MEMORY_ALLOC,
  OS_STRING_APPEND_CHAR,
  OS_STRING_NEW,
  Segment,
  Statement,
  SubroutineCall,
  SubroutineDec,
  Term,
  UnresolvedIdentifierError,
  WhileStatement,
} from '../types';

export interface ResolvedVariable {
  segment: Segment;
  index: number;
  // Declared class of an object-typed variable
  className?: string;
}

/**
 * Compiles one subroutine. Owns the argument and var tables and reads the
 * class tables through the enclosing ClassCompiler.
 */
export class SubroutineCompiler {
  private symbolTable = new SubroutineSymbolTable();
  private writer = new VmWriter();

  private constructor(
    private readonly classCompiler: ClassCompiler,
    private readonly subroutineDec: SubroutineDec
  ) {}

  static compile(classCompiler: ClassCompiler, subroutineDec: SubroutineDec): string[] {
    const compiler = new SubroutineCompiler(classCompiler, subroutineDec);
    compiler.compileSubroutineDec();
    return compiler.writer.getLines();
  }

  private compileSubroutineDec() {
    const className = this.classCompiler.className;
    const { kind, name, parameters, body } = this.subroutineDec;
    const nLocals = body.varDecs.reduce((count, varDec) => count + varDec.names.length, 0);

    this.writer.writeFunction(`${className}.${name}`, nLocals);

    switch (kind) {
      case 'constructor':
        this.writer.writePush('constant', this.classCompiler.fieldCount);
        this.writer.writeCall(OS_MEMORY_ALLOC, 1);
        this.writer.writePop('pointer', 0);
        break;
      case 'method':
        // The receiver is argument 0; declared parameters start at 1
        this.symbolTable.insertArgument('this', { type: ASTNodeType.CLASS_TYPE, name: className });
        this.writer.writePush('argument', 0);
        this.writer.writePop('pointer', 0);
        break;
      case 'function':
        break;
    }

    for (const parameter of parameters) {
      this.symbolTable.insertArgument(parameter.name, parameter.varType);
    }

    for (const varDec of body.varDecs) {
      for (const varName of varDec.names) {
        this.symbolTable.insertVar(varName, varDec.varType);
      }
    }

    this.compileStatements(body.statements);
  }

  /**
   * Looks a name up in fields, locals, arguments and statics, in that order.
   * A field therefore hides a local or argument of the same name.
   */
  searchVar(name: string): ResolvedVariable | undefined {
    const probes: Array<[Segment, string, () => SymbolEntry | undefined]> = [
      ['this', "the class's field table", () => this.classCompiler.getField(name)],
      ['local', "the subroutine's var table", () => this.symbolTable.getVar(name)],
      ['argument', "the subroutine's argument table", () => this.symbolTable.getArgument(name)],
      ['static', "the class's static table", () => this.classCompiler.getStatic(name)],
    ];

    for (const [segment, tableName, probe] of probes) {
      const entry = probe();
      if (!entry) continue;
      this.classCompiler.trace(`Found "${name}" in ${tableName}`);
      return {
        segment,
        index: entry.index,
        className: entry.type.type === ASTNodeType.CLASS_TYPE ? entry.type.name : undefined,
      };
    }
    return undefined;
  }

  private requireVar(name: string, line?: number): ResolvedVariable {
    const resolved = this.searchVar(name);
    if (!resolved) {
      throw new UnresolvedIdentifierError(name, line);
    }
    return resolved;
  }

  private compileStatements(statements: readonly Statement[]) {
    for (const statement of statements) {
      this.compileStatement(statement);
    }
  }

  private compileStatement(statement: Statement) {
    switch (statement.type) {
      case ASTNodeType.LET_STATEMENT:
        return this.compileLetStatement(statement);
      case ASTNodeType.IF_STATEMENT:
        return this.compileIfStatement(statement);
      case ASTNodeType.WHILE_STATEMENT:
        return this.compileWhileStatement(statement);
      case ASTNodeType.DO_STATEMENT:
        this.compileSubroutineCall(statement.call);
        // Discard the return value
        this.writer.writePop('temp', 0);
        return;
      case ASTNodeType.RETURN_STATEMENT:
        if (statement.value) {
          this.compileExpression(statement.value);
        } else {
          this.writer.writePush('constant', 0);
        }
        this.writer.writeReturn();
        return;
      default: {
        const unreachable: never = statement;
        throw new MalformedConstructError(`Unknown statement: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private compileLetStatement(statement: LetStatement) {
    const target = this.requireVar(statement.varName, statement.line);

    if (statement.index) {
      this.compileExpression(statement.index);
      this.writer.writePush(target.segment, target.index);
      this.writer.writeArithmetic('add');

      this.compileExpression(statement.value);
      this.writer.writePop('temp', 0);

      this.writer.writePop('pointer', 1);
      this.writer.writePush('temp', 0);
      this.writer.writePop('that', 0);
    } else {
      this.compileExpression(statement.value);
      this.writer.writePop(target.segment, target.index);
    }
  }

  private compileIfStatement(statement: IfStatement) {
    this.compileExpression(statement.condition);
    this.writer.writeArithmetic('not');

    const endLabel = this.classCompiler.createLabel();
    const elseLabel = this.classCompiler.createLabel();

    this.writer.writeIfGoto(elseLabel);
    this.compileStatements(statement.thenBranch);
    this.writer.writeGoto(endLabel);
    this.writer.writeLabel(elseLabel);
    if (statement.elseBranch) {
      this.compileStatements(statement.elseBranch);
    }
    this.writer.writeLabel(endLabel);
  }

  private compileWhileStatement(statement: WhileStatement) {
    const topLabel = this.classCompiler.createLabel();
    const exitLabel = this.classCompiler.createLabel();

    this.writer.writeLabel(topLabel);
    this.compileExpression(statement.condition);
    this.writer.writeArithmetic('not');
    this.writer.writeIfGoto(exitLabel);
    this.compileStatements(statement.body);
    this.writer.writeGoto(topLabel);
    this.writer.writeLabel(exitLabel);
  }

  private compileExpression(expression: Expression) {
    this.compileTerm(expression.term);
    for (const { operator, term } of expression.rest) {
      this.compileTerm(term);
      this.compileBinaryOperator(operator);
    }
  }

  private compileTerm(term: Term) {
    switch (term.type) {
      case ASTNodeType.INTEGER_CONSTANT:
        this.writer.writePush('constant', term.value);
        return;
      case ASTNodeType.STRING_CONSTANT: {
        // No string literal instruction: build it one byte at a time
        const bytes = Buffer.from(term.value, 'utf8');
        this.writer.writePush('constant', bytes.length);
        this.writer.writeCall(OS_STRING_NEW, 1);
        for (const byte of bytes) {
          this.writer.writePush('constant', byte);
          this.writer.writeCall(OS_STRING_APPEND_CHAR, 2);
        }
        return;
      }
      case ASTNodeType.KEYWORD_CONSTANT:
        switch (term.value) {
          case 'true':
            this.writer.writePush('constant', 1);
            this.writer.writeArithmetic('neg');
            return;
          case 'false':
          case 'null':
            this.writer.writePush('constant', 0);
            return;
          case 'this':
            this.writer.writePush('pointer', 0);
            return;
        }
        return;
      case ASTNodeType.VAR_NAME: {
        const variable = this.requireVar(term.name, term.line);
        this.writer.writePush(variable.segment, variable.index);
        return;
      }
      case ASTNodeType.ARRAY_ELEMENT: {
        const array = this.requireVar(term.name, term.line);
        this.compileExpression(term.index);
        this.writer.writePush(array.segment, array.index);
        this.writer.writeArithmetic('add');
        this.writer.writePop('pointer', 1);
        this.writer.writePush('that', 0);
        return;
      }
      case ASTNodeType.PARENTHESIZED:
        this.compileExpression(term.expression);
        return;
      case ASTNodeType.UNARY_OPERATION:
        this.compileTerm(term.term);
        this.writer.writeArithmetic(term.operator === '-' ? 'neg' : 'not');
        return;
      case ASTNodeType.SUBROUTINE_CALL_TERM:
        this.compileSubroutineCall(term.call);
        return;
      default: {
        const unreachable: never = term;
        throw new MalformedConstructError(`Unknown term: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private compileSubroutineCall(call: SubroutineCall) {
    if (call.type === ASTNodeType.CALL) {
      // Implicit receiver: the current object
      this.writer.writePush('pointer', 0);
      this.compileExpressionList(call.args);
      this.writer.writeCall(`${this.classCompiler.className}.${call.name}`, call.args.length + 1);
      return;
    }

    let nArgs = call.args.length;
    let targetClass: string;
    const receiver = this.searchVar(call.target);
    if (receiver) {
      if (!receiver.className) {
        throw new MalformedConstructError(
          `Cannot call "${call.target}.${call.name}": "${call.target}" is not an object`,
          call.line
        );
      }
      this.writer.writePush(receiver.segment, receiver.index);
      targetClass = receiver.className;
      nArgs++;
    } else {
      this.classCompiler.trace(`"${call.target}" is not a variable; calling it as a class`);
      targetClass = call.target;
    }

    this.compileExpressionList(call.args);
    this.writer.writeCall(`${targetClass}.${call.name}`, nArgs);
  }

  private compileExpressionList(args: readonly Expression[]) {
    for (const arg of args) {
      this.compileExpression(arg);
    }
  }

  private compileBinaryOperator(operator: BinaryOperator) {
    switch (operator) {
      case '+':
        return this.writer.writeArithmetic('add');
      case '-':
        return this.writer.writeArithmetic('sub');
      case '*':
        return this.writer.writeCall(OS_MATH_MULTIPLY, 2);
      case '/':
        return this.writer.writeCall(OS_MATH_DIVIDE, 2);
      case '&':
        return this.writer.writeArithmetic('and');
      case '|':
        return this.writer.writeArithmetic('or');
      case '<':
        return this.writer.writeArithmetic('lt');
      case '>':
        return this.writer.writeArithmetic('gt');
      case '=':
        return this.writer.writeArithmetic('eq');
    }
  }
}
