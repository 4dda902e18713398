/**
 * Stable multi-key ordering of rows.
 *
 * Keys apply in priority order, each with its own direction. Nulls sort
 * last in both directions; values of different types order
 * boolean < number < string.
 */

import type { Cell, SortDirection } from '../sql/ast-types';

export interface SortKey<T> {
  value: (item: T) => Cell;
  direction: SortDirection;
}

function typeRank(value: string | number | boolean): number {
  switch (typeof value) {
    case 'boolean': return 0;
    case 'number': return 1;
    default: return 2;
  }
}

/** Total order over non-null cells */
export function compareCells(a: string | number | boolean, b: string | number | boolean): number {
  const rankDiff = typeRank(a) - typeRank(b);
  if (rankDiff !== 0) return rankDiff;

  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

/** Returns a sorted copy; equal items keep their input order */
export function sortRows<T>(items: readonly T[], keys: readonly SortKey<T>[]): T[] {
  return [...items].sort((a, b) => {
    for (const key of keys) {
      const left = key.value(a);
      const right = key.value(b);
      if (left === null && right === null) continue;
      if (left === null) return 1;
      if (right === null) return -1;

      const result = compareCells(left, right);
      if (result !== 0) {
        return key.direction === 'DESC' ? -result : result;
      }
    }
    return 0;
  });
}
