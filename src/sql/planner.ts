/**
 * Plan Builder
 * ============
 *
 * Lowers a parsed statement into a structured plan: a tagged, ordered list
 * of steps that the executor interprets directly.
 *
 * SELECT lowers to, in order:
 *   1. one `extract` per datasource, FROM first (`source_0`), then each
 *      JOIN source in clause order (`source_1..n`)
 *   2. one `join` per JOIN clause, folding left to right (`join_0..`)
 *   3. one `transform` carrying the SELECT criteria
 *   4. a `load` when INTO is present
 *
 * INSERT lowers to a `values` step followed by a `load` that appends.
 *
 * @module
 */

import {
  formatColumnRef,
  isAggregation,
  type Cell,
  type ColumnRef,
  type Datasource,
  type InsertStatement,
  type JoinCondition,
  type JoinEquality,
  type JoinKind,
  type SelectStatement,
  type Statement,
  type TableSource,
  type WhereCondition,
} from './ast-types';
import type { TransformCriteria } from '../internals/transform';
import type { LoadMode } from '../adapters/types';
import {
  DuplicateAliasError,
  UnknownAliasError,
  UnsupportedJoinConditionError,
  UnsupportedStatementError,
} from '../errors';
import { MEMORY_SOURCE_TYPE } from './parser';

// ============ STEP TYPES ============

export interface ExtractStep {
  type: 'extract';
  id: string;
  datasource: Datasource;
  alias?: string;
}

/** One equality of an ON clause, oriented so `left` belongs to the accumulated relation */
export interface JoinKeyPair {
  left: ColumnRef;
  right: ColumnRef;
}

export interface JoinStep {
  type: 'join';
  id: string;
  left: string;
  right: string;
  kind: JoinKind;
  on: JoinKeyPair[];
}

export interface TransformStep {
  type: 'transform';
  id: 'transform';
  input: string;
  criteria: TransformCriteria;
}

export interface ValuesStep {
  type: 'values';
  id: 'values';
  columns: string[];
  rows: Cell[][];
}

export interface LoadStep {
  type: 'load';
  id: 'load';
  input: string;
  destination: Datasource;
  mode: LoadMode;
  /** INSERT without a column list appends values by position */
  byPosition?: boolean;
}

export type PlanStep = ExtractStep | JoinStep | TransformStep | ValuesStep | LoadStep;

export interface Plan {
  steps: PlanStep[];
  /** Table alias → id of the extract step it names */
  aliases: Record<string, string>;
  /** Id of the step whose relation is the statement's result */
  output: string;
}

// ============ ENTRY POINTS ============

export function planStatement(statement: Statement): Plan {
  switch (statement.type) {
    case 'SELECT':
      return buildPlan(statement);
    case 'INSERT':
      return buildInsertPlan(statement);
    case 'UPDATE':
    case 'DELETE':
      throw new UnsupportedStatementError(statement.type);
  }
}

export function buildPlan(select: SelectStatement): Plan {
  const sources: TableSource[] = [select.from, ...select.joins.map(clause => clause.source)];
  const aliasOf = assignAliases(sources);

  const aliases: Record<string, string> = {};
  const steps: PlanStep[] = sources.map((source, index): ExtractStep => {
    const step: ExtractStep = { type: 'extract', id: `source_${index}`, datasource: source.datasource };
    const alias = aliasOf[index];
    if (alias !== undefined) {
      step.alias = alias;
      aliases[alias] = step.id;
    }
    return step;
  });

  validateQualifiers(select, Object.keys(aliases));

  let current = 'source_0';
  select.joins.forEach((clause, index) => {
    const step: JoinStep = {
      type: 'join',
      id: `join_${index}`,
      left: current,
      right: `source_${index + 1}`,
      kind: clause.joinType,
      on: flattenJoinCondition(clause.on, index, {
        joined: aliasOf[index + 1],
        accumulated: aliasOf.slice(0, index + 1).filter((alias): alias is string => alias !== undefined),
      }),
    };
    steps.push(step);
    current = step.id;
  });

  const criteria: TransformCriteria = { columns: select.columns, distinct: select.distinct };
  if (select.where) criteria.filter = select.where;
  if (select.groupBy) criteria.groupBy = select.groupBy;
  if (select.orderBy) criteria.orderBy = select.orderBy;
  if (select.limitOrTail) criteria.limitOrTail = select.limitOrTail;
  steps.push({ type: 'transform', id: 'transform', input: current, criteria });

  if (select.into) {
    steps.push({ type: 'load', id: 'load', input: 'transform', destination: select.into, mode: 'replace' });
    return { steps, aliases, output: 'load' };
  }
  return { steps, aliases, output: 'transform' };
}

function buildInsertPlan(insert: InsertStatement): Plan {
  const width = insert.values[0]?.length ?? 0;
  const columns = insert.columns ?? Array.from({ length: width }, (_, index) => `column_${index}`);
  return {
    steps: [
      { type: 'values', id: 'values', columns, rows: insert.values },
      {
        type: 'load',
        id: 'load',
        input: 'values',
        destination: insert.target,
        mode: 'append',
        byPosition: insert.columns === undefined,
      },
    ],
    aliases: {},
    output: 'load',
  };
}

// ============ ALIASES ============

const IMPLICIT_ALIAS = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Alias per source position. Explicit aliases must be unique; a bare-name
 * source takes its own name as alias when no other source claims it.
 */
function assignAliases(sources: readonly TableSource[]): Array<string | undefined> {
  const taken = new Set<string>();
  for (const source of sources) {
    if (source.alias === undefined) continue;
    if (taken.has(source.alias)) {
      throw new DuplicateAliasError(source.alias);
    }
    taken.add(source.alias);
  }

  return sources.map(source => {
    if (source.alias !== undefined) return source.alias;
    const { datasource } = source;
    if (datasource.sourceType !== MEMORY_SOURCE_TYPE || !IMPLICIT_ALIAS.test(datasource.path)) return undefined;
    if (taken.has(datasource.path)) return undefined;
    taken.add(datasource.path);
    return datasource.path;
  });
}

function* whereRefs(condition: WhereCondition): Generator<ColumnRef> {
  switch (condition.type) {
    case 'COMPARISON':
      if (condition.left.type !== 'literal') yield condition.left;
      if (condition.right.type !== 'literal') yield condition.right;
      return;
    case 'LIKE':
      yield condition.column;
      return;
    case 'AND':
    case 'OR':
      yield* whereRefs(condition.left);
      yield* whereRefs(condition.right);
      return;
    case 'NOT':
      yield* whereRefs(condition.operand);
  }
}

function* joinRefs(condition: JoinCondition): Generator<ColumnRef> {
  if (condition.type === 'EQUALS') {
    yield condition.left;
    yield condition.right;
    return;
  }
  yield* joinRefs(condition.left);
  yield* joinRefs(condition.right);
}

function* selectRefs(select: SelectStatement): Generator<ColumnRef> {
  if (select.columns !== '*') {
    for (const column of select.columns) {
      if (!isAggregation(column)) {
        yield column;
      } else if (column.column !== '*') {
        yield column.column;
      }
    }
  }
  for (const clause of select.joins) yield* joinRefs(clause.on);
  if (select.where) yield* whereRefs(select.where);
  if (select.groupBy) yield* select.groupBy;
  for (const item of select.orderBy ?? []) {
    const parameter = item.parameter;
    if (!isAggregation(parameter)) {
      yield parameter;
    } else if (parameter.column !== '*') {
      yield parameter.column;
    }
  }
}

function validateQualifiers(select: SelectStatement, declared: readonly string[]): void {
  for (const ref of selectRefs(select)) {
    if (ref.type === 'column' && ref.table !== undefined && !declared.includes(ref.table)) {
      throw new UnknownAliasError(ref.table, declared);
    }
  }
}

// ============ JOIN CONDITIONS ============

type Side = 'accumulated' | 'joined';

/** Aliases visible to one ON clause */
interface JoinScope {
  joined: string | undefined;
  accumulated: readonly string[];
}

function sideOf(ref: ColumnRef, scope: JoinScope): Side | undefined {
  if (ref.type !== 'column' || ref.table === undefined) return undefined;
  if (ref.table === scope.joined) return 'joined';
  if (scope.accumulated.includes(ref.table)) return 'accumulated';
  const visible = scope.joined === undefined ? scope.accumulated : [...scope.accumulated, scope.joined];
  throw new UnknownAliasError(ref.table, visible);
}

function formatEquality(leaf: JoinEquality): string {
  return `${formatColumnRef(leaf.left)} = ${formatColumnRef(leaf.right)}`;
}

/**
 * Flatten an ON clause into oriented key pairs. Only conjunctions of
 * equalities are accepted; unqualified leaves keep their written order.
 * A qualifier must name the joined source or one joined before it.
 */
function flattenJoinCondition(condition: JoinCondition, joinIndex: number, scope: JoinScope): JoinKeyPair[] {
  switch (condition.type) {
    case 'OR':
      throw new UnsupportedJoinConditionError('OR is not supported in ON clauses', joinIndex);
    case 'AND':
      return [
        ...flattenJoinCondition(condition.left, joinIndex, scope),
        ...flattenJoinCondition(condition.right, joinIndex, scope),
      ];
    case 'EQUALS': {
      const leftSide = sideOf(condition.left, scope);
      const rightSide = sideOf(condition.right, scope);
      if (leftSide !== undefined && leftSide === rightSide) {
        const which = leftSide === 'joined' ? 'joined source' : 'preceding sources';
        throw new UnsupportedJoinConditionError(
          `both sides of '${formatEquality(condition)}' reference the ${which}`,
          joinIndex,
        );
      }
      if (leftSide === 'joined' || rightSide === 'accumulated') {
        return [{ left: condition.right, right: condition.left }];
      }
      return [{ left: condition.left, right: condition.right }];
    }
  }
}
