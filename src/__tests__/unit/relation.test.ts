import { describe, it, expect } from 'vitest';
import { Relation } from '../../internals/relation';
import { ColumnNotFoundError, DuplicateColumnError, RowArityMismatchError } from '../../errors';

describe('Relation', () => {
  describe('construction', () => {
    it('should reject duplicate column names', () => {
      expect(() => new Relation(['a', 'b', 'a'])).toThrow(DuplicateColumnError);
    });

    it('should reject rows of the wrong arity', () => {
      expect(() => new Relation(['a', 'b'], [[1, 2], [3]])).toThrow('Row 1 has 1 cells, expected 2');
      expect(() => new Relation(['a', 'b'], [[1, 2], [3]])).toThrow(RowArityMismatchError);
    });

    it('should copy its input', () => {
      const rows = [[1, 2]];
      const relation = new Relation(['a', 'b'], rows);
      rows[0][0] = 99;
      rows.push([3, 4]);
      expect(relation.rows).toEqual([[1, 2]]);
    });

    it('should build from records in first-appearance order', () => {
      const relation = Relation.fromRecords([{ a: 1 }, { b: 'x', a: 2 }]);
      expect(relation.columns).toEqual(['a', 'b']);
      expect(relation.rows).toEqual([
        [1, null],
        [2, 'x'],
      ]);
    });

    it('should build from records with an explicit column order', () => {
      const relation = Relation.fromRecords([{ a: 1, b: 2 }], ['b', 'a', 'c']);
      expect(relation.rows).toEqual([[2, 1, null]]);
    });
  });

  describe('accessors', () => {
    const relation = new Relation(['region', 'amount'], [
      ['east', 10],
      ['west', null],
    ]);

    it('should report shape and positions', () => {
      expect(relation.width).toBe(2);
      expect(relation.rowCount).toBe(2);
      expect(relation.indexOf('amount')).toBe(1);
      expect(relation.indexOf('missing')).toBe(-1);
      expect(relation.hasColumn('region')).toBe(true);
    });

    it('should read a column', () => {
      expect(relation.column('amount')).toEqual([10, null]);
      expect(() => relation.column('nope')).toThrow(ColumnNotFoundError);
    });

    it('should convert to records', () => {
      expect(relation.toRecords()).toEqual([
        { region: 'east', amount: 10 },
        { region: 'west', amount: null },
      ]);
    });

    it('should treat no rows or no columns as empty', () => {
      expect(relation.isEmpty).toBe(false);
      expect(Relation.empty(['a']).isEmpty).toBe(true);
      expect(new Relation([], [[], []]).isEmpty).toBe(true);
    });
  });

  describe('append', () => {
    const base = new Relation(['region', 'amount'], [['east', 10]]);

    it('should append by position', () => {
      const appended = base.append(new Relation(['column_0', 'column_1'], [['north', 7]]), true);
      expect(appended.columns).toEqual(['region', 'amount']);
      expect(appended.rows).toEqual([
        ['east', 10],
        ['north', 7],
      ]);
      expect(base.rowCount).toBe(1);
    });

    it('should append by name, filling absent columns with null', () => {
      const appended = base.append(new Relation(['amount'], [[3]]));
      expect(appended.rows).toEqual([
        ['east', 10],
        [null, 3],
      ]);
    });

    it('should reject unknown columns and mismatched widths', () => {
      expect(() => base.append(new Relation(['price'], [[1]]))).toThrow(ColumnNotFoundError);
      expect(() => base.append(new Relation(['x'], [[1]]), true)).toThrow(RowArityMismatchError);
    });
  });
});
