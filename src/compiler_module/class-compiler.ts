import { ClassDec, ClassVarDec } from '../types';
import { ClassSymbolTable, SymbolEntry } from './symbol-table';
import { SubroutineCompiler } from './subroutine-compiler';

export interface CompilerOptions {
  // Receives a line per variable resolution; used by `--verbose`
  trace?: (message: string) => void;
}

/**
 * Compiles one class: registers its statics and fields, then compiles each
 * subroutine in declaration order.
 */
export class ClassCompiler {
  private labelIndex = 0;
  private symbolTable = new ClassSymbolTable();
  private output: string[] = [];

  private constructor(
    private readonly classDec: ClassDec,
    private readonly options: CompilerOptions
  ) {}

  static compile(classDec: ClassDec, options: CompilerOptions = {}): string[] {
    const compiler = new ClassCompiler(classDec, options);

    for (const classVarDec of classDec.classVarDecs) {
      compiler.compileClassVarDec(classVarDec);
    }

    for (const subroutineDec of classDec.subroutineDecs) {
      compiler.output.push(...SubroutineCompiler.compile(compiler, subroutineDec));
    }

    return compiler.output;
  }

  get className(): string {
    return this.classDec.name;
  }

  get fieldCount(): number {
    return this.symbolTable.count('field');
  }

  getField(name: string): SymbolEntry | undefined {
    return this.symbolTable.getField(name);
  }

  getStatic(name: string): SymbolEntry | undefined {
    return this.symbolTable.getStatic(name);
  }

  /**
   * Labels are unique within the class: `{ClassName}_{n}`.
   */
  createLabel(): string {
    return `${this.classDec.name}_${this.labelIndex++}`;
  }

  trace(message: string) {
    this.options.trace?.(message);
  }

  private compileClassVarDec(classVarDec: ClassVarDec) {
    for (const name of classVarDec.names) {
      if (classVarDec.kind === 'static') {
        this.symbolTable.insertStatic(name, classVarDec.varType);
      } else {
        this.symbolTable.insertField(name, classVarDec.varType);
      }
    }
  }
}
