#!/usr/bin/env node

import { FileOutcome, JackCompiler, formatVmOutput, outputPathFor } from './jack_compiler';
import { CliCommand, USAGE, UsageError, parseCliArgs } from './config';
import * as fs from 'fs';

// Public API
export { JackCompiler, formatVmOutput, outputPathFor };
export { Lexer, tokensToXml } from './lexer';
export { Parser, parseTokens } from './parser';
export { Compiler, ClassCompiler, ClassSymbolTable, SubroutineSymbolTable } from './compiler_module';
export { DEFAULT_COMPILE_OPTIONS, parseCliArgs } from './config';
export type { CompileOptions } from './config';
export * from './types';
export * from './common/result';

/**
 * Runs the CLI and returns the process exit code.
 */
export function main(args: string[] = process.argv.slice(2)): number {
  let command: CliCommand;
  try {
    command = parseCliArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.error(USAGE);
      return 1;
    }
    throw error;
  }

  if (command.kind === 'help') {
    console.log(USAGE);
    return 0;
  }

  const { input, options } = command;
  if (!fs.existsSync(input)) {
    console.error(`Error: '${input}' not found`);
    return 1;
  }

  console.log(`[->] Input: ${input}`);
  let outcomes: FileOutcome[];
  try {
    outcomes = new JackCompiler(options).compilePath(input);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : error);
    return 1;
  }

  let failures = 0;
  for (const outcome of outcomes) {
    if (outcome.result.ok) {
      console.log(`[->] Wrote ${outcome.result.value}`);
    } else {
      failures++;
      console.error(`Error: ${outcome.input}: ${outcome.result.error.message}`);
    }
  }

  return failures > 0 ? 1 : 0;
}

if (require.main === module) {
  process.exitCode = main();
}
