/**
 * Plan Executor
 * =============
 *
 * Interprets a plan's steps in order. Every call keeps its own environment
 * of step results, so concurrent executions share nothing.
 *
 * Qualified columns (`c.name`) are rewritten to concrete column names
 * through an alias scope kept alongside each intermediate relation: an
 * extract step opens the scope of its alias, and a join step carries both
 * input scopes through the join's column renames.
 *
 * @module
 */

import {
  formatColumnRef,
  isAggregation,
  type Aggregation,
  type ColumnRef,
  type OrderByItem,
  type SelectColumn,
  type WhereCondition,
} from '../sql/ast-types';
import type { JoinStep, Plan, PlanStep } from '../sql/planner';
import { ColumnNotFoundError } from '../errors';
import { Relation } from '../internals/relation';
import { joinWithLayout } from '../internals/join';
import { transform, type TransformCriteria } from '../internals/transform';
import type { AdapterRegistry } from '../adapters/AdapterRegistry';

// ============ TYPES ============

/** alias → (original column name → current column name) */
type AliasScope = ReadonlyMap<string, ReadonlyMap<string, string>>;

interface StepResult {
  relation: Relation;
  scope: AliasScope;
}

export interface ExecuteOptions {
  /** Log every step's output shape */
  debug?: boolean;
}

// ============ EXECUTION ============

export async function executePlan(
  plan: Plan,
  adapters: AdapterRegistry,
  options: ExecuteOptions = {},
): Promise<Relation> {
  const env = new Map<string, StepResult>();

  const input = (id: string): StepResult => {
    const result = env.get(id);
    if (!result) {
      throw new Error(`Plan step '${id}' is used before it has run`);
    }
    return result;
  };

  for (const step of plan.steps) {
    const result = await runStep(step, input, adapters);
    env.set(step.id, result);
    if (options.debug) {
      console.log(
        `[QueryEngine] ${step.id} (${step.type}): ${result.relation.rowCount} rows, columns [${result.relation.columns.join(', ')}]`,
      );
    }
  }

  return input(plan.output).relation;
}

async function runStep(
  step: PlanStep,
  input: (id: string) => StepResult,
  adapters: AdapterRegistry,
): Promise<StepResult> {
  switch (step.type) {
    case 'extract': {
      const relation = await adapters.extract(step.datasource.sourceType, step.datasource.path);
      const scope = new Map<string, ReadonlyMap<string, string>>();
      if (step.alias !== undefined) {
        scope.set(step.alias, new Map(relation.columns.map(name => [name, name])));
      }
      return { relation, scope };
    }
    case 'join':
      return runJoin(step, input(step.left), input(step.right));
    case 'transform': {
      const source = input(step.input);
      return {
        relation: transform(source.relation, rewriteCriteria(step.criteria, source)),
        scope: new Map(),
      };
    }
    case 'values':
      return { relation: new Relation(step.columns, step.rows), scope: new Map() };
    case 'load': {
      const source = input(step.input);
      await adapters.load(source.relation, step.destination.sourceType, step.destination.path, {
        mode: step.mode,
        byPosition: step.byPosition,
      });
      return source;
    }
  }
}

// ============ JOIN ============

/**
 * Concrete key name. Unknown unqualified names pass through so the join
 * reports them; a qualified name must resolve through its alias scope
 * unless the relation is empty, where the join's empty-input rules apply.
 */
function keyName(ref: ColumnRef, source: StepResult): string {
  if (ref.type === 'index') {
    return source.relation.columns[ref.index] ?? formatColumnRef(ref);
  }
  if (ref.table === undefined) return ref.name;
  const name = source.scope.get(ref.table)?.get(ref.name);
  if (name !== undefined) return name;
  if (source.relation.isEmpty) return ref.name;
  throw new ColumnNotFoundError(formatColumnRef(ref), source.relation.columns);
}

function remapScope(
  scope: AliasScope,
  layout: ReadonlyMap<string, string> | undefined,
  into: Map<string, ReadonlyMap<string, string>>,
): void {
  for (const [alias, columns] of scope) {
    const renamed = new Map<string, string>();
    for (const [original, current] of columns) {
      const next = layout?.get(current);
      if (next !== undefined) renamed.set(original, next);
    }
    into.set(alias, renamed);
  }
}

function runJoin(step: JoinStep, left: StepResult, right: StepResult): StepResult {
  const { relation, layout } = joinWithLayout(
    left.relation,
    right.relation,
    step.on.map(pair => keyName(pair.left, left)),
    step.on.map(pair => keyName(pair.right, right)),
    step.kind,
  );

  const scope = new Map<string, ReadonlyMap<string, string>>();
  remapScope(left.scope, layout.left, scope);
  remapScope(right.scope, layout.right, scope);
  return { relation, scope };
}

// ============ QUALIFIED COLUMNS ============

function rewriteRef(ref: ColumnRef, source: StepResult): ColumnRef {
  if (ref.type !== 'column' || ref.table === undefined) return ref;
  const name = source.scope.get(ref.table)?.get(ref.name);
  if (name === undefined) {
    throw new ColumnNotFoundError(formatColumnRef(ref), source.relation.columns);
  }
  return { type: 'column', name };
}

function rewriteAggregation(aggregation: Aggregation, source: StepResult): Aggregation {
  if (aggregation.column === '*') return aggregation;
  return { ...aggregation, column: rewriteRef(aggregation.column, source) };
}

function rewriteSelectColumn(column: SelectColumn, source: StepResult): SelectColumn {
  return isAggregation(column) ? rewriteAggregation(column, source) : rewriteRef(column, source);
}

function rewriteCondition(condition: WhereCondition, source: StepResult): WhereCondition {
  switch (condition.type) {
    case 'COMPARISON':
      return {
        ...condition,
        left: condition.left.type === 'literal' ? condition.left : rewriteRef(condition.left, source),
        right: condition.right.type === 'literal' ? condition.right : rewriteRef(condition.right, source),
      };
    case 'LIKE':
      return { ...condition, column: rewriteRef(condition.column, source) };
    case 'AND':
    case 'OR':
      return {
        ...condition,
        left: rewriteCondition(condition.left, source),
        right: rewriteCondition(condition.right, source),
      };
    case 'NOT':
      return { ...condition, operand: rewriteCondition(condition.operand, source) };
  }
}

function rewriteOrderItem(item: OrderByItem, source: StepResult): OrderByItem {
  return { ...item, parameter: rewriteSelectColumn(item.parameter, source) };
}

function rewriteCriteria(criteria: TransformCriteria, source: StepResult): TransformCriteria {
  const rewritten: TransformCriteria = {
    ...criteria,
    columns: criteria.columns === '*' ? '*' : criteria.columns.map(column => rewriteSelectColumn(column, source)),
  };
  if (criteria.filter) rewritten.filter = rewriteCondition(criteria.filter, source);
  if (criteria.groupBy) rewritten.groupBy = criteria.groupBy.map(ref => rewriteRef(ref, source));
  if (criteria.orderBy) rewritten.orderBy = criteria.orderBy.map(item => rewriteOrderItem(item, source));
  return rewritten;
}
