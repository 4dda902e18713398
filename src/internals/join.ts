/**
 * Join
 * ====
 *
 * Equality join of two relations on one or more key column pairs.
 *
 * Output schema is the left columns followed by the right columns. A key
 * pair whose two columns share a name is folded into a single column; any
 * other name present on both sides gets a `_left` / `_right` suffix.
 * Null keys never match.
 *
 * Row order:
 * - inner / left: left order, matches in right order
 * - right: right order, matches in left order
 * - outer: left order, then unmatched right rows in right order
 *
 * @module
 */

import { JOIN_KINDS, type Cell, type JoinKind } from '../sql/ast-types';
import {
  InvalidJoinKindError,
  JoinFailedError,
  MissingJoinColumnError,
  NullInputError,
  describeCause,
} from '../errors';
import { Relation, type Row } from './relation';

/** Original column name → name in the joined relation, per input side */
export interface JoinLayout {
  left?: ReadonlyMap<string, string>;
  right?: ReadonlyMap<string, string>;
}

export interface JoinResult {
  relation: Relation;
  layout: JoinLayout;
}

type Keys = string | readonly string[];

function isJoinKind(kind: string): kind is JoinKind {
  return JOIN_KINDS.some(valid => valid === kind);
}

function identity(relation: Relation): ReadonlyMap<string, string> {
  return new Map(relation.columns.map(name => [name, name]));
}

export function join(
  left: Relation | null | undefined,
  right: Relation | null | undefined,
  leftKeys: Keys,
  rightKeys: Keys,
  kind: string,
): Relation {
  return joinWithLayout(left, right, leftKeys, rightKeys, kind).relation;
}

export function joinWithLayout(
  left: Relation | null | undefined,
  right: Relation | null | undefined,
  leftKeys: Keys,
  rightKeys: Keys,
  kind: string,
): JoinResult {
  if (!isJoinKind(kind)) {
    throw new InvalidJoinKindError(kind, JOIN_KINDS);
  }
  if (!left || !right) {
    throw new NullInputError('join');
  }

  const leftNames = typeof leftKeys === 'string' ? [leftKeys] : [...leftKeys];
  const rightNames = typeof rightKeys === 'string' ? [rightKeys] : [...rightKeys];
  if (leftNames.length === 0 || leftNames.length !== rightNames.length) {
    throw new JoinFailedError(
      `expected matching key lists, got ${leftNames.length} left and ${rightNames.length} right`,
      leftNames,
      rightNames,
      left.columns,
      right.columns,
      kind,
    );
  }

  // ============ EMPTY INPUTS ============

  if (left.isEmpty && right.isEmpty) {
    return { relation: Relation.empty(), layout: {} };
  }
  if (left.isEmpty) {
    return kind === 'inner' || kind === 'left'
      ? { relation: Relation.empty(), layout: {} }
      : { relation: new Relation(right.columns, right.rows), layout: { right: identity(right) } };
  }
  if (right.isEmpty) {
    return kind === 'inner' || kind === 'right'
      ? { relation: Relation.empty(), layout: {} }
      : { relation: new Relation(left.columns, left.rows), layout: { left: identity(left) } };
  }

  for (const name of leftNames) {
    if (!left.hasColumn(name)) throw new MissingJoinColumnError('left', name, left.columns);
  }
  for (const name of rightNames) {
    if (!right.hasColumn(name)) throw new MissingJoinColumnError('right', name, right.columns);
  }

  try {
    return merge(left, right, leftNames, rightNames, kind);
  } catch (error) {
    if (error instanceof JoinFailedError) throw error;
    throw new JoinFailedError(describeCause(error), leftNames, rightNames, left.columns, right.columns, kind, error);
  }
}

// ============ MERGE ============

function keyOf(row: Row, indices: readonly number[]): string | null {
  const values: Cell[] = [];
  for (const index of indices) {
    const value = row[index];
    if (value === null) return null;
    values.push(value);
  }
  return JSON.stringify(values);
}

function indexRows(rows: readonly Row[], indices: readonly number[]): Map<string, number[]> {
  const index = new Map<string, number[]>();
  rows.forEach((row, position) => {
    const key = keyOf(row, indices);
    if (key === null) return;
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(position);
    } else {
      index.set(key, [position]);
    }
  });
  return index;
}

function merge(
  left: Relation,
  right: Relation,
  leftNames: readonly string[],
  rightNames: readonly string[],
  kind: JoinKind,
): JoinResult {
  const leftKeyIdx = leftNames.map(name => left.indexOf(name));
  const rightKeyIdx = rightNames.map(name => right.indexOf(name));

  // Right column position → left column position it folds into
  const folded = new Map<number, number>();
  leftNames.forEach((name, pair) => {
    if (name === rightNames[pair]) folded.set(rightKeyIdx[pair], leftKeyIdx[pair]);
  });
  const foldedInto = new Map<number, number>();
  for (const [rightIdx, leftIdx] of folded) foldedInto.set(leftIdx, rightIdx);

  const rightKept = right.columns
    .map((name, index) => ({ name, index }))
    .filter(column => !folded.has(column.index));
  const rightKeptNames = new Set(rightKept.map(column => column.name));

  const leftLayout = new Map<string, string>();
  const rightLayout = new Map<string, string>();
  const columns: string[] = [];

  left.columns.forEach((name, index) => {
    const output = !foldedInto.has(index) && rightKeptNames.has(name) ? `${name}_left` : name;
    leftLayout.set(name, output);
    columns.push(output);
  });
  for (const [rightIdx, leftIdx] of folded) {
    rightLayout.set(right.columns[rightIdx], left.columns[leftIdx]);
  }
  for (const column of rightKept) {
    const output = left.hasColumn(column.name) ? `${column.name}_right` : column.name;
    rightLayout.set(column.name, output);
    columns.push(output);
  }

  const combine = (leftRow: Row | null, rightRow: Row | null): Cell[] => {
    const cells: Cell[] = left.columns.map((_, index) => {
      if (leftRow) return leftRow[index];
      const rightIdx = foldedInto.get(index);
      return rightRow && rightIdx !== undefined ? rightRow[rightIdx] : null;
    });
    for (const column of rightKept) {
      cells.push(rightRow ? rightRow[column.index] : null);
    }
    return cells;
  };

  const rows: Cell[][] = [];

  if (kind === 'right') {
    const leftIndex = indexRows(left.rows, leftKeyIdx);
    for (const rightRow of right.rows) {
      const key = keyOf(rightRow, rightKeyIdx);
      const matches = key === null ? undefined : leftIndex.get(key);
      if (matches) {
        for (const position of matches) rows.push(combine(left.rows[position], rightRow));
      } else {
        rows.push(combine(null, rightRow));
      }
    }
  } else {
    const rightIndex = indexRows(right.rows, rightKeyIdx);
    const matchedRight = new Set<number>();
    for (const leftRow of left.rows) {
      const key = keyOf(leftRow, leftKeyIdx);
      const matches = key === null ? undefined : rightIndex.get(key);
      if (matches) {
        for (const position of matches) {
          matchedRight.add(position);
          rows.push(combine(leftRow, right.rows[position]));
        }
      } else if (kind !== 'inner') {
        rows.push(combine(leftRow, null));
      }
    }
    if (kind === 'outer') {
      right.rows.forEach((rightRow, position) => {
        if (!matchedRight.has(position)) rows.push(combine(null, rightRow));
      });
    }
  }

  return {
    relation: new Relation(columns, rows),
    layout: { left: leftLayout, right: rightLayout },
  };
}
