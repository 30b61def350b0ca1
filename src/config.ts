import type { CompilerOptions } from './compiler_module';

export interface CompileOptions extends CompilerOptions {
  // Four-space indent for every line but `function` and `label`
  indent: boolean;
  // Also write the `<Name>T.xml` token dump
  emitTokens: boolean;
}

export const DEFAULT_COMPILE_OPTIONS: CompileOptions = {
  indent: false,
  emitTokens: false,
};

export const USAGE = 'Usage: jackc <file.jack | directory> [--tokens] [--indent] [--verbose]';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'compile'; input: string; options: CompileOptions };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const verboseTrace = (message: string) => console.debug(`[debug] ${message}`);

export function parseCliArgs(args: readonly string[]): CliCommand {
  const options: CompileOptions = { ...DEFAULT_COMPILE_OPTIONS };
  let input: string | undefined;

  for (const arg of args) {
    switch (arg) {
      case '--help':
      case '-h':
        return { kind: 'help' };
      case '--tokens':
        options.emitTokens = true;
        break;
      case '--indent':
        options.indent = true;
        break;
      case '--verbose':
        options.trace = verboseTrace;
        break;
      default:
        if (arg.startsWith('-')) {
          throw new UsageError(`Unknown option '${arg}'`);
        }
        if (input !== undefined) {
          throw new UsageError(`Unexpected argument '${arg}'`);
        }
        input = arg;
    }
  }

  if (input === undefined) {
    throw new UsageError('Missing input file or directory');
  }
  return { kind: 'compile', input, options };
}
