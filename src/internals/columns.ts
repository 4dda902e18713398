/**
 * Column resolution against a relation's schema. Positional references are
 * resolved at execution time, never at parse time.
 */

import { formatColumnRef, type ColumnRef } from '../sql/ast-types';
import { ColumnIndexOutOfRangeError, ColumnNotFoundError } from '../errors';
import type { Relation } from './relation';

/** Resolve a column reference to a concrete column name */
export function resolveColumn(relation: Relation, ref: ColumnRef): string {
  if (ref.type === 'index') {
    if (!Number.isInteger(ref.index) || ref.index < 0 || ref.index >= relation.width) {
      throw new ColumnIndexOutOfRangeError(ref.index, relation.width);
    }
    return relation.columns[ref.index];
  }
  if (!relation.hasColumn(ref.name)) {
    throw new ColumnNotFoundError(formatColumnRef(ref), relation.columns);
  }
  return ref.name;
}

/** Resolve a column reference to its position in the relation */
export function resolveColumnIndex(relation: Relation, ref: ColumnRef): number {
  return relation.indexOf(resolveColumn(relation, ref));
}

/** Drop repeated names, keeping first occurrences in order */
export function uniqueNames(names: readonly string[]): string[] {
  return [...new Set(names)];
}
