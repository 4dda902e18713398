/**
 * In-memory relations, addressed by name (`FROM sales`, `{memory:sales}`).
 */

import { Relation, type RecordRow } from '../internals/relation';
import { MEMORY_SOURCE_TYPE } from '../sql/parser';
import type { LoadOptions, SourceAdapter } from './types';

export class MemoryAdapter implements SourceAdapter {
  readonly sourceType = MEMORY_SOURCE_TYPE;
  private readonly tables = new Map<string, Relation>();

  constructor(tables: Record<string, Relation | readonly RecordRow[]> = {}) {
    for (const [name, table] of Object.entries(tables)) {
      this.set(name, table);
    }
  }

  set(name: string, table: Relation | readonly RecordRow[]): this {
    this.tables.set(name, table instanceof Relation ? table : Relation.fromRecords(table));
    return this;
  }

  get(name: string): Relation | undefined {
    return this.tables.get(name);
  }

  get names(): string[] {
    return Array.from(this.tables.keys());
  }

  async extract(path: string): Promise<Relation> {
    const table = this.tables.get(path);
    if (!table) {
      throw new Error(`no in-memory relation named '${path}'`);
    }
    return table;
  }

  async load(relation: Relation, destination: string, options: LoadOptions): Promise<void> {
    const existing = this.tables.get(destination);
    if (options.mode === 'append' && existing) {
      this.tables.set(destination, existing.append(relation, options.byPosition));
    } else {
      this.tables.set(destination, relation);
    }
  }
}
