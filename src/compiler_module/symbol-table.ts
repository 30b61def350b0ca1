import { JackType } from '../types';

export type ClassSymbolKind = 'static' | 'field';
export type SubroutineSymbolKind = 'argument' | 'var';
export type SymbolKind = ClassSymbolKind | SubroutineSymbolKind;

export interface SymbolEntry {
  readonly type: JackType;
  readonly index: number;
}

/**
 * Read access shared by the class-scope and subroutine-scope tables.
 */
export interface SymbolLookup<K extends SymbolKind> {
  lookup(kind: K, name: string): SymbolEntry | undefined;
  count(kind: K): number;
}

/**
 * One kind namespace. Indices come from a counter, so a re-declared name
 * gets a fresh index and hides the earlier entry without freeing it.
 */
class KindTable {
  private entries = new Map<string, SymbolEntry>();
  private nextIndex = 0;

  insert(name: string, type: JackType): number {
    const index = this.nextIndex++;
    this.entries.set(name, { type, index });
    return index;
  }

  get(name: string): SymbolEntry | undefined {
    return this.entries.get(name);
  }

  get size(): number {
    return this.nextIndex;
  }
}

export class ClassSymbolTable implements SymbolLookup<ClassSymbolKind> {
  private tables: Record<ClassSymbolKind, KindTable> = {
    static: new KindTable(),
    field: new KindTable(),
  };

  insertStatic(name: string, type: JackType): number {
    return this.tables.static.insert(name, type);
  }

  insertField(name: string, type: JackType): number {
    return this.tables.field.insert(name, type);
  }

  getStatic(name: string): SymbolEntry | undefined {
    return this.tables.static.get(name);
  }

  getField(name: string): SymbolEntry | undefined {
    return this.tables.field.get(name);
  }

  lookup(kind: ClassSymbolKind, name: string): SymbolEntry | undefined {
    return this.tables[kind].get(name);
  }

  count(kind: ClassSymbolKind): number {
    return this.tables[kind].size;
  }
}

export class SubroutineSymbolTable implements SymbolLookup<SubroutineSymbolKind> {
  private tables: Record<SubroutineSymbolKind, KindTable> = {
    argument: new KindTable(),
    var: new KindTable(),
  };

  insertArgument(name: string, type: JackType): number {
    return this.tables.argument.insert(name, type);
  }

  insertVar(name: string, type: JackType): number {
    return this.tables.var.insert(name, type);
  }

  getArgument(name: string): SymbolEntry | undefined {
    return this.tables.argument.get(name);
  }

  getVar(name: string): SymbolEntry | undefined {
    return this.tables.var.get(name);
  }

  lookup(kind: SubroutineSymbolKind, name: string): SymbolEntry | undefined {
    return this.tables[kind].get(name);
  }

  count(kind: SubroutineSymbolKind): number {
    return this.tables[kind].size;
  }
}
