/**
 * Transform
 * =========
 *
 * Applies the SELECT criteria to one relation in a fixed stage order:
 * filter, pre-group order, group, project/aggregate, distinct, limit/tail.
 * Each stage consumes the previous stage's output; a failing stage makes
 * the whole transform fail.
 *
 * @module
 */

import {
  formatColumnRef,
  isAggregation,
  type Aggregation,
  type Cell,
  type ColumnRef,
  type LimitClause,
  type OrderByItem,
  type SelectColumns,
  type WhereCondition,
} from '../sql/ast-types';
import {
  AggregationOrderWithoutGroupError,
  ColumnIndexOutOfRangeError,
  ColumnNotInGroupByError,
  InvalidLimitError,
  MixedAggregationWithoutGroupError,
  NullInputError,
} from '../errors';
import { aggregate, aggregationLabel } from './aggregates';
import { resolveColumn, resolveColumnIndex, uniqueNames } from './columns';
import { sortRows, type SortKey } from './ordering';
import { compileCondition } from './predicates';
import { Relation, type Row } from './relation';

export interface TransformCriteria {
  columns: SelectColumns;
  distinct: boolean;
  filter?: WhereCondition;
  groupBy?: readonly ColumnRef[];
  orderBy?: readonly OrderByItem[];
  limitOrTail?: LimitClause;
}

export function transform(relation: Relation | null | undefined, criteria: TransformCriteria): Relation {
  if (!relation) {
    throw new NullInputError('transform');
  }

  let current = relation;

  // ============ 1. FILTER ============
  if (criteria.filter) {
    const predicate = compileCondition(criteria.filter, current);
    current = current.withRows(current.rows.filter(predicate));
  }

  const selected = criteria.columns === '*' ? null : criteria.columns;
  const allAggregations = selected !== null && selected.length > 0 && selected.every(isAggregation);
  const groupBy = criteria.groupBy && criteria.groupBy.length > 0 ? criteria.groupBy : undefined;

  // ============ 2. PRE-GROUP ORDER ============
  if (!groupBy && criteria.orderBy && criteria.orderBy.length > 0 && !allAggregations) {
    current = orderRows(current, criteria.orderBy);
  }

  // ============ 3-4. GROUP / PROJECT / AGGREGATE ============
  if (groupBy) {
    current = group(current, criteria.columns, groupBy, criteria.orderBy);
  } else if (selected !== null) {
    if (allAggregations) {
      current = aggregateAll(current, selected.filter(isAggregation));
    } else if (selected.some(isAggregation)) {
      throw new MixedAggregationWithoutGroupError(
        selected.map(column => (isAggregation(column) ? aggregationLabel(column) : formatColumnRef(column))),
      );
    } else {
      current = project(current, selected.filter((column): column is ColumnRef => !isAggregation(column)));
    }
  }

  // ============ 5. DISTINCT ============
  if (criteria.distinct) {
    current = distinct(current);
  }

  // ============ 6. LIMIT / TAIL ============
  if (criteria.limitOrTail) {
    current = limit(current, criteria.limitOrTail);
  }

  return current;
}

function orderRows(relation: Relation, orderBy: readonly OrderByItem[]): Relation {
  const keys = orderBy.map((item): SortKey<Row> => {
    const parameter = item.parameter;
    if (isAggregation(parameter)) {
      throw new AggregationOrderWithoutGroupError(aggregationLabel(parameter));
    }
    const index = resolveColumnIndex(relation, parameter);
    return { value: row => row[index], direction: item.direction };
  });
  return relation.withRows(sortRows(relation.rows, keys));
}

function project(relation: Relation, columns: readonly ColumnRef[]): Relation {
  const indices = columns.map(ref => resolveColumnIndex(relation, ref));
  return new Relation(
    indices.map(index => relation.columns[index]),
    relation.rows.map(row => indices.map(index => row[index])),
  );
}

/** Evaluate an aggregation over a subset of rows */
function evaluateAggregation(relation: Relation, aggregation: Aggregation, rows: readonly Row[]): Cell {
  if (aggregation.column === '*') {
    return aggregate(aggregation.function, null, rows.length);
  }
  const index = resolveColumnIndex(relation, aggregation.column);
  return aggregate(aggregation.function, rows.map(row => row[index]), rows.length);
}

function labelOf(relation: Relation, aggregation: Aggregation): string {
  return aggregation.column === '*'
    ? aggregationLabel(aggregation)
    : aggregationLabel(aggregation, resolveColumn(relation, aggregation.column));
}

function aggregateAll(relation: Relation, aggregations: readonly Aggregation[]): Relation {
  return new Relation(
    aggregations.map(aggregation => labelOf(relation, aggregation)),
    [aggregations.map(aggregation => evaluateAggregation(relation, aggregation, relation.rows))],
  );
}

interface Group {
  key: Row;
  rows: Row[];
}

interface GroupOutput {
  label: string;
  cell: (group: Group) => Cell;
}

function group(
  relation: Relation,
  columns: SelectColumns,
  groupBy: readonly ColumnRef[],
  orderBy: readonly OrderByItem[] | undefined,
): Relation {
  const keyNames = uniqueNames(groupBy.map(ref => resolveColumn(relation, ref)));
  const keyIndices = keyNames.map(name => relation.indexOf(name));

  const selected: ReadonlyArray<ColumnRef | Aggregation> = columns === '*'
    ? relation.columns.map((name): ColumnRef => ({ type: 'column', name }))
    : columns;

  const keyPosition = (ref: ColumnRef): number => {
    const name = resolveColumn(relation, ref);
    const position = keyNames.indexOf(name);
    if (position < 0) {
      throw new ColumnNotInGroupByError(name, keyNames);
    }
    return position;
  };

  // Resolve the select list up front so schema errors surface before grouping
  const outputs = selected.map((column): GroupOutput => {
    if (isAggregation(column)) {
      return { label: labelOf(relation, column), cell: g => evaluateAggregation(relation, column, g.rows) };
    }
    const position = keyPosition(column);
    return { label: keyNames[position], cell: g => g.key[position] };
  });

  const groups = new Map<string, Group>();
  for (const row of relation.rows) {
    const key = keyIndices.map(index => row[index]);
    const id = JSON.stringify(key);
    const existing = groups.get(id);
    if (existing) {
      existing.rows.push(row);
    } else {
      groups.set(id, { key, rows: [row] });
    }
  }

  let ordered = [...groups.values()];
  if (orderBy && orderBy.length > 0) {
    const keys = orderBy.map((item): SortKey<Group> => {
      const parameter = item.parameter;
      if (isAggregation(parameter)) {
        return { value: g => evaluateAggregation(relation, parameter, g.rows), direction: item.direction };
      }
      // `#N` names the N-th selected column of the grouped result
      if (parameter.type === 'index') {
        const output = outputs[parameter.index];
        if (!Number.isInteger(parameter.index) || output === undefined) {
          throw new ColumnIndexOutOfRangeError(parameter.index, outputs.length);
        }
        return { value: output.cell, direction: item.direction };
      }
      const position = keyPosition(parameter);
      return { value: g => g.key[position], direction: item.direction };
    });
    ordered = sortRows(ordered, keys);
  }

  return new Relation(
    outputs.map(output => output.label),
    ordered.map(g => outputs.map(output => output.cell(g))),
  );
}

function distinct(relation: Relation): Relation {
  const seen = new Set<string>();
  const rows = relation.rows.filter(row => {
    const id = JSON.stringify(row);
    if (seen.has(id)) return false;
    seen.add(id);
    return true;
  });
  return relation.withRows(rows);
}

function limit(relation: Relation, clause: LimitClause): Relation {
  const { kind, count } = clause;
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidLimitError(kind, count);
  }
  if (count === 0) {
    return relation.withRows([]);
  }
  return relation.withRows(kind === 'limit' ? relation.rows.slice(0, count) : relation.rows.slice(-count));
}
