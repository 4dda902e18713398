import { describe, it, expect } from 'vitest';
import { join, joinWithLayout } from '../../internals/join';
import { Relation } from '../../internals/relation';
import {
  DuplicateColumnError,
  InvalidJoinKindError,
  JoinFailedError,
  MissingJoinColumnError,
  NullInputError,
} from '../../errors';

const orders = new Relation(['order_id', 'cust_id'], [
  [1, 10],
  [2, 20],
  [3, null],
  [4, 30],
]);

const customers = new Relation(['id', 'name'], [
  [10, 'Ann'],
  [20, 'Bob'],
  [40, 'Dan'],
]);

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}

describe('join', () => {
  describe('kinds', () => {
    it('should keep matched rows for inner', () => {
      const result = join(orders, customers, 'cust_id', 'id', 'inner');
      expect(result.columns).toEqual(['order_id', 'cust_id', 'id', 'name']);
      expect(result.rows).toEqual([
        [1, 10, 10, 'Ann'],
        [2, 20, 20, 'Bob'],
      ]);
    });

    it('should keep every left row for left, never matching null keys', () => {
      expect(join(orders, customers, 'cust_id', 'id', 'left').rows).toEqual([
        [1, 10, 10, 'Ann'],
        [2, 20, 20, 'Bob'],
        [3, null, null, null],
        [4, 30, null, null],
      ]);
    });

    it('should follow right order for right', () => {
      expect(join(orders, customers, 'cust_id', 'id', 'right').rows).toEqual([
        [1, 10, 10, 'Ann'],
        [2, 20, 20, 'Bob'],
        [null, null, 40, 'Dan'],
      ]);
    });

    it('should append unmatched right rows after left order for outer', () => {
      expect(join(orders, customers, 'cust_id', 'id', 'outer').rows).toEqual([
        [1, 10, 10, 'Ann'],
        [2, 20, 20, 'Bob'],
        [3, null, null, null],
        [4, 30, null, null],
        [null, null, 40, 'Dan'],
      ]);
    });

    it('should emit one row per matching pair', () => {
      const left = new Relation(['k'], [[1], [1]]);
      const right = new Relation(['k2', 'v'], [
        [1, 'a'],
        [1, 'b'],
      ]);
      expect(join(left, right, 'k', 'k2', 'inner').rows).toEqual([
        [1, 1, 'a'],
        [1, 1, 'b'],
        [1, 1, 'a'],
        [1, 1, 'b'],
      ]);
    });
  });

  describe('column naming', () => {
    it('should fold a key pair that shares its name', () => {
      const left = new Relation(['id', 'x'], [
        [1, 'a'],
        [2, 'b'],
      ]);
      const right = new Relation(['id', 'y'], [
        [2, 'B'],
        [3, 'C'],
      ]);
      const result = join(left, right, 'id', 'id', 'outer');
      expect(result.columns).toEqual(['id', 'x', 'y']);
      expect(result.rows).toEqual([
        [1, 'a', null],
        [2, 'b', 'B'],
        [3, null, 'C'],
      ]);
    });

    it('should suffix other shared names and report the renames', () => {
      const left = new Relation(['k', 'v'], [[1, 'l']]);
      const right = new Relation(['k2', 'v'], [[1, 'r']]);
      const { relation, layout } = joinWithLayout(left, right, 'k', 'k2', 'inner');
      expect(relation.columns).toEqual(['k', 'v_left', 'k2', 'v_right']);
      expect(relation.rows).toEqual([[1, 'l', 1, 'r']]);
      expect(layout.left?.get('v')).toBe('v_left');
      expect(layout.right?.get('v')).toBe('v_right');
      expect(layout.right?.get('k2')).toBe('k2');
    });

    it('should join on composite keys', () => {
      const left = new Relation(['a', 'b', 'l'], [
        [1, 'x', 'L1'],
        [1, 'y', 'L2'],
      ]);
      const right = new Relation(['a', 'b', 'r'], [[1, 'y', 'R1']]);
      const result = join(left, right, ['a', 'b'], ['a', 'b'], 'inner');
      expect(result.columns).toEqual(['a', 'b', 'l', 'r']);
      expect(result.rows).toEqual([[1, 'y', 'L2', 'R1']]);
    });

    it('should compare keys by exact value', () => {
      const left = new Relation(['k'], [[1], ['1']]);
      const right = new Relation(['k2'], [['1']]);
      expect(join(left, right, 'k', 'k2', 'inner').rows).toEqual([['1', '1']]);
    });
  });

  describe('empty inputs', () => {
    const empty = Relation.empty();
    const noRows = Relation.empty(['id', 'name']);

    it('should return an empty relation when both sides are empty', () => {
      const result = join(empty, noRows, 'a', 'b', 'outer');
      expect(result.columns).toEqual([]);
      expect(result.rows).toEqual([]);
    });

    it('should apply the empty-left rules', () => {
      expect(join(empty, customers, 'cust_id', 'id', 'left').columns).toEqual([]);
      expect(join(empty, customers, 'cust_id', 'id', 'inner').columns).toEqual([]);
      const right = join(empty, customers, 'cust_id', 'id', 'right');
      expect(right).not.toBe(customers);
      expect(right.columns).toEqual(customers.columns);
      expect(right.rows).toEqual(customers.rows);
      expect(join(empty, customers, 'cust_id', 'id', 'outer').rows).toEqual(customers.rows);
    });

    it('should apply the empty-right rules', () => {
      expect(join(orders, noRows, 'cust_id', 'id', 'right').columns).toEqual([]);
      expect(join(orders, noRows, 'cust_id', 'id', 'inner').rowCount).toBe(0);
      const left = join(orders, noRows, 'cust_id', 'id', 'left');
      expect(left.columns).toEqual(['order_id', 'cust_id']);
      expect(left.rows).toEqual(orders.rows);
    });

    it('should apply empty rules before checking key columns', () => {
      expect(join(orders, noRows, 'missing', 'missing', 'outer').rows).toEqual(orders.rows);
    });
  });

  describe('errors', () => {
    it('should reject unknown kinds before anything else', () => {
      const err = catchError(() => join(null, null, 'a', 'b', 'cross'));
      expect(err).toBeInstanceOf(InvalidJoinKindError);
      if (!(err instanceof InvalidJoinKindError)) return;
      expect(err.message).toBe("Invalid join type 'cross'. Must be one of inner, left, right, outer");
    });

    it('should reject absent inputs', () => {
      expect(() => join(orders, undefined, 'cust_id', 'id', 'inner')).toThrow(NullInputError);
    });

    it('should name the side and column of a missing key', () => {
      const err = catchError(() => join(orders, customers, 'cust_id', 'nope', 'inner'));
      expect(err).toBeInstanceOf(MissingJoinColumnError);
      if (!(err instanceof MissingJoinColumnError)) return;
      expect(err.side).toBe('right');
      expect(err.columnName).toBe('nope');
      expect(err.available).toEqual(['id', 'name']);
    });

    it('should reject key lists of different lengths', () => {
      const err = catchError(() => join(orders, customers, ['cust_id', 'order_id'], ['id'], 'inner'));
      expect(err).toBeInstanceOf(JoinFailedError);
      if (!(err instanceof JoinFailedError)) return;
      expect(err.leftKeys).toEqual(['cust_id', 'order_id']);
      expect(err.rightKeys).toEqual(['id']);
    });

    it('should wrap merge failures with the key columns and kind', () => {
      const left = new Relation(['k', 'v', 'v_left'], [[1, 'a', 'b']]);
      const right = new Relation(['k2', 'v'], [[1, 'c']]);
      const err = catchError(() => join(left, right, 'k', 'k2', 'left'));
      expect(err).toBeInstanceOf(JoinFailedError);
      if (!(err instanceof JoinFailedError)) return;
      expect(err.cause).toBeInstanceOf(DuplicateColumnError);
      expect(err.leftKeys).toEqual(['k']);
      expect(err.rightKeys).toEqual(['k2']);
      expect(err.leftColumns).toEqual(['k', 'v', 'v_left']);
      expect(err.joinKind).toBe('left');
      expect(err.message).toBe("Error during join: Duplicate column name 'v_left' (left_col=k, right_col=k2, how=left)");
      expect(err.details).toMatchObject({ leftKeys: ['k'], rightKeys: ['k2'], joinKind: 'left' });
    });
  });
});
