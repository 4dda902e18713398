/**
 * Aggregation functions over a column of cells.
 *
 * Nulls are ignored unless noted. Numeric functions read numbers and
 * numeric strings and skip every other cell.
 */

import type { AggregateFunction, Aggregation, Cell } from '../sql/ast-types';
import { formatColumnRef } from '../sql/ast-types';
import { compareCells } from './ordering';

function nonNull(values: readonly Cell[]): Array<string | number | boolean> {
  const result: Array<string | number | boolean> = [];
  for (const value of values) {
    if (value !== null) result.push(value);
  }
  return result;
}

function numeric(values: readonly Cell[]): number[] {
  const result: number[] = [];
  for (const value of values) {
    if (typeof value === 'number' && !Number.isNaN(value)) {
      result.push(value);
    } else if (typeof value === 'string' && value.trim() !== '') {
      const parsed = Number(value);
      if (Number.isFinite(parsed)) result.push(parsed);
    }
  }
  return result;
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function variance(values: readonly number[]): number | null {
  if (values.length < 2) return null;
  const mean = sum(values) / values.length;
  return values.reduce((total, value) => total + (value - mean) ** 2, 0) / (values.length - 1);
}

function median(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 1 ? sorted[middle] : (sorted[middle - 1] + sorted[middle]) / 2;
}

function extreme(values: readonly Cell[], sign: 1 | -1): Cell {
  let best: string | number | boolean | null = null;
  for (const value of nonNull(values)) {
    if (best === null || sign * compareCells(value, best) > 0) {
      best = value;
    }
  }
  return best;
}

/**
 * Apply an aggregation function to the cells of one column.
 * `values` is null for a wildcard argument, in which case only `rowCount` is used.
 */
export function aggregate(fn: AggregateFunction, values: readonly Cell[] | null, rowCount: number): Cell {
  if (values === null) {
    // count(*) and size(*) both count rows
    return rowCount;
  }

  switch (fn) {
    case 'sum':
      return sum(numeric(values));
    case 'avg':
    case 'mean': {
      const numbers = numeric(values);
      return numbers.length === 0 ? null : sum(numbers) / numbers.length;
    }
    case 'median':
      return median(numeric(values));
    case 'var':
      return variance(numeric(values));
    case 'std': {
      const result = variance(numeric(values));
      return result === null ? null : Math.sqrt(result);
    }
    case 'prod':
      return numeric(values).reduce((total, value) => total * value, 1);
    case 'min':
      return extreme(values, -1);
    case 'max':
      return extreme(values, 1);
    case 'count':
      return nonNull(values).length;
    case 'size':
      return values.length;
    case 'nunique':
      return new Set(nonNull(values).map(value => JSON.stringify(value))).size;
    case 'first':
      return nonNull(values)[0] ?? null;
    case 'last': {
      const present = nonNull(values);
      return present.length === 0 ? null : present[present.length - 1];
    }
  }
}

/** Output column name of an aggregation, e.g. `sum(amount)` or `count(*)` */
export function aggregationLabel(aggregation: Aggregation, resolvedColumn?: string): string {
  const argument = aggregation.column === '*'
    ? '*'
    : resolvedColumn ?? formatColumnRef(aggregation.column);
  return `${aggregation.function}(${argument})`;
}
