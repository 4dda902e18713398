/**
 * Relation: an ordered set of uniquely named columns plus an ordered
 * sequence of rows, each row aligned to the column order.
 *
 * Relations are immutable values. The constructor validates the schema
 * invariants and copies its input, and every operation returns a new
 * relation.
 */

import type { Cell } from '../sql/ast-types';
import { ColumnNotFoundError, DuplicateColumnError, RowArityMismatchError } from '../errors';

export type Row = readonly Cell[];

export type RecordRow = Record<string, Cell>;

export class Relation {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];
  private readonly positions: ReadonlyMap<string, number>;

  constructor(columns: readonly string[], rows: readonly Row[] = []) {
    const positions = new Map<string, number>();
    columns.forEach((name, index) => {
      if (positions.has(name)) {
        throw new DuplicateColumnError(name);
      }
      positions.set(name, index);
    });

    rows.forEach((row, index) => {
      if (row.length !== columns.length) {
        throw new RowArityMismatchError(index, columns.length, row.length);
      }
    });

    this.columns = Object.freeze([...columns]);
    this.rows = Object.freeze(rows.map(row => Object.freeze([...row])));
    this.positions = positions;
  }

  /** Create a relation with no rows (and no columns unless given) */
  static empty(columns: readonly string[] = []): Relation {
    return new Relation(columns);
  }

  /**
   * Create a relation from records. Column order follows `columns` when given,
   * otherwise first appearance across the records; missing keys become null.
   */
  static fromRecords(records: readonly RecordRow[], columns?: readonly string[]): Relation {
    let names = columns;
    if (!names) {
      const seen = new Set<string>();
      for (const record of records) {
        for (const key of Object.keys(record)) {
          seen.add(key);
        }
      }
      names = [...seen];
    }
    const schema = names;
    return new Relation(
      schema,
      records.map(record => schema.map(name => (Object.prototype.hasOwnProperty.call(record, name) ? record[name] : null))),
    );
  }

  get width(): number {
    return this.columns.length;
  }

  get rowCount(): number {
    return this.rows.length;
  }

  /** True when the relation has no rows or no columns */
  get isEmpty(): boolean {
    return this.rows.length === 0 || this.columns.length === 0;
  }

  hasColumn(name: string): boolean {
    return this.positions.has(name);
  }

  /** Position of a column, or -1 when absent */
  indexOf(name: string): number {
    return this.positions.get(name) ?? -1;
  }

  column(name: string): Cell[] {
    const index = this.indexOf(name);
    if (index < 0) {
      throw new ColumnNotFoundError(name, this.columns);
    }
    return this.rows.map(row => row[index]);
  }

  /** Same schema, different rows */
  withRows(rows: readonly Row[]): Relation {
    return new Relation(this.columns, rows);
  }

  /**
   * Append the rows of another relation, keeping this schema.
   * By position the widths must agree; by name every incoming column must
   * exist here and columns it lacks are filled with null.
   */
  append(incoming: Relation, byPosition = false): Relation {
    if (byPosition) {
      incoming.rows.forEach((row, index) => {
        if (row.length !== this.width) {
          throw new RowArityMismatchError(this.rowCount + index, this.width, row.length);
        }
      });
      return this.withRows([...this.rows, ...incoming.rows]);
    }

    for (const name of incoming.columns) {
      if (!this.hasColumn(name)) {
        throw new ColumnNotFoundError(name, this.columns);
      }
    }
    const sources = this.columns.map(name => incoming.indexOf(name));
    const appended = incoming.rows.map(row => sources.map(index => (index < 0 ? null : row[index])));
    return this.withRows([...this.rows, ...appended]);
  }

  toRecords(): RecordRow[] {
    return this.rows.map(row => {
      const record: RecordRow = {};
      this.columns.forEach((name, index) => {
        record[name] = row[index];
      });
      return record;
    });
  }
}
