import { ClassDec } from '../types';
import { ClassCompiler, CompilerOptions } from './class-compiler';

/**
 * Compiler - turns class ASTs into stack-machine instructions
 */
export class Compiler {
  private options: CompilerOptions;

  constructor(options: CompilerOptions = {}) {
    this.options = options;
  }

  /**
   * Classes share no state, so each one compiles independently; output
   * follows the order of `classes`.
   */
  compile(classes: ClassDec | readonly ClassDec[]): string[] {
    const units: readonly ClassDec[] = 'type' in classes ? [classes] : classes;
    const output: string[] = [];
    for (const classDec of units) {
      output.push(...ClassCompiler.compile(classDec, this.options));
    }
    return output;
  }
}
