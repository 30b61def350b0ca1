export { Compiler } from './compiler';
export { ClassCompiler } from './class-compiler';
export type { CompilerOptions } from './class-compiler';
export { SubroutineCompiler } from './subroutine-compiler';
export type { ResolvedVariable } from './subroutine-compiler';
export { ClassSymbolTable, SubroutineSymbolTable } from './symbol-table';
export type { SymbolEntry, SymbolLookup, SymbolKind } from './symbol-table';
export { VmWriter } from './vm-writer';
