/**
 * Jack Compiler - main entry
 * Compiles Jack source into stack-machine instructions
 */

import * as fs from 'fs';
import * as path from 'path';
import { Lexer, tokensToXml } from './lexer';
import { Parser } from './parser';
import { Compiler } from './compiler_module';
import { ClassDec, JackError, Token } from './types';
import { Result, attempt } from './common/result';
import { CompileOptions, DEFAULT_COMPILE_OPTIONS } from './config';

export const JACK_EXTENSION = '.jack';

export interface FileOutcome {
  input: string;
  // Path of the written .vm file, or the error that stopped this file
  result: Result<string, Error>;
}

const INDENT = '    ';

/**
 * Joins instruction lines. No trailing newline is written.
 */
export function formatVmOutput(lines: readonly string[], { indent }: Pick<CompileOptions, 'indent'>): string {
  const formatted = indent
    ? lines.map((line) => (line.startsWith('function ') || line.startsWith('label ') ? line : INDENT + line))
    : lines;
  return formatted.join('\n');
}

/**
 * `dir/Main.jack` with suffix `T` and extension `.xml` gives `dir/MainT.xml`.
 */
export function outputPathFor(inputPath: string, suffix: string, extension: string): string {
  const parsed = path.parse(inputPath);
  return path.join(parsed.dir, `${parsed.name}${suffix}${extension}`);
}

export class JackCompiler {
  private options: CompileOptions;

  constructor(options: Partial<CompileOptions> = {}) {
    this.options = { ...DEFAULT_COMPILE_OPTIONS, ...options };
  }

  tokenize(code: string): Token[] {
    return new Lexer(code).tokenize();
  }

  parse(code: string): ClassDec {
    return new Parser(this.tokenize(code)).parse();
  }

  /**
   * Lexes, parses and compiles one compilation unit.
   */
  compile(code: string): string[] {
    const ast = this.parse(code);
    return new Compiler(this.options).compile(ast);
  }

  tryCompile(code: string): Result<string[], JackError> {
    return attempt(() => this.compile(code), JackError);
  }

  /**
   * Compiles `Foo.jack` into `Foo.vm` beside it. Nothing is written for a
   * unit that fails to compile. Any error, including one from reading the
   * file, becomes this file's outcome.
   */
  compileFile(filePath: string): FileOutcome {
    const result = attempt(() => {
      const code = fs.readFileSync(filePath, 'utf-8');
      const tokens = this.tokenize(code);
      if (this.options.emitTokens) {
        fs.writeFileSync(outputPathFor(filePath, 'T', '.xml'), tokensToXml(tokens) + '\n');
      }
      const ast = new Parser(tokens).parse();
      const lines = new Compiler(this.options).compile(ast);

      const outputPath = outputPathFor(filePath, '', '.vm');
      fs.writeFileSync(outputPath, formatVmOutput(lines, this.options));
      return outputPath;
    }, Error);

    return { input: filePath, result };
  }

  /**
   * Compiles a single file, or every `.jack` file directly inside a
   * directory. One file failing does not stop the others.
   */
  compilePath(inputPath: string): FileOutcome[] {
    if (!fs.statSync(inputPath).isDirectory()) {
      return [this.compileFile(inputPath)];
    }

    return fs
      .readdirSync(inputPath, { withFileTypes: true })
      .filter((entry) => entry.isFile() && path.extname(entry.name).toLowerCase() === JACK_EXTENSION)
      .map((entry) => entry.name)
      .sort()
      .map((name) => this.compileFile(path.join(inputPath, name)));
  }
}

export * from './types';
