/**
 * Compiles WHERE conditions into row predicates.
 *
 * Columns are resolved once against the relation's schema. Any comparison
 * involving NULL is false (three-valued logic collapsed for filtering), and
 * relational comparisons between values of different types are false.
 */

import type {
  Cell,
  ComparisonCondition,
  ComparisonOperator,
  LikeCondition,
  Operand,
  WhereCondition,
} from '../sql/ast-types';
import { resolveColumnIndex } from './columns';
import { compareCells } from './ordering';
import type { Relation, Row } from './relation';

export type RowPredicate = (row: Row) => boolean;

export function compileCondition(condition: WhereCondition, relation: Relation): RowPredicate {
  switch (condition.type) {
    case 'COMPARISON':
      return compileComparison(condition, relation);
    case 'LIKE':
      return compileLike(condition, relation);
    case 'AND': {
      const left = compileCondition(condition.left, relation);
      const right = compileCondition(condition.right, relation);
      return row => left(row) && right(row);
    }
    case 'OR': {
      const left = compileCondition(condition.left, relation);
      const right = compileCondition(condition.right, relation);
      return row => left(row) || right(row);
    }
    case 'NOT': {
      const operand = compileCondition(condition.operand, relation);
      return row => !operand(row);
    }
  }
}

export function evaluateComparison(left: Cell, operator: ComparisonOperator, right: Cell): boolean {
  if (left === null || right === null) {
    return false;
  }

  const sameType = typeof left === typeof right;
  switch (operator) {
    case '=': return left === right;
    case '!=':
    case '<>': return left !== right;
    case '<': return sameType && compareCells(left, right) < 0;
    case '>': return sameType && compareCells(left, right) > 0;
    case '<=': return sameType && compareCells(left, right) <= 0;
    case '>=': return sameType && compareCells(left, right) >= 0;
  }
}

function compileOperand(operand: Operand, relation: Relation): (row: Row) => Cell {
  if (operand.type === 'literal') {
    const value = operand.value;
    return () => value;
  }
  const index = resolveColumnIndex(relation, operand);
  return row => row[index];
}

function compileComparison(condition: ComparisonCondition, relation: Relation): RowPredicate {
  const left = compileOperand(condition.left, relation);
  const right = compileOperand(condition.right, relation);
  return row => evaluateComparison(left(row), condition.operator, right(row));
}

/** Convert a LIKE pattern (`%` any run, `_` any character) to an anchored regex */
export function likeToRegExp(pattern: string): RegExp {
  let source = '';
  for (const char of pattern) {
    if (char === '%') {
      source += '.*';
    } else if (char === '_') {
      source += '.';
    } else {
      source += char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`, 'isu');
}

function compileLike(condition: LikeCondition, relation: Relation): RowPredicate {
  const index = resolveColumnIndex(relation, condition.column);
  const regex = likeToRegExp(condition.pattern);
  return row => {
    const value = row[index];
    if (value === null) return false;
    return regex.test(String(value));
  };
}
