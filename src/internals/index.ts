/**
 * Relational operators the executor is built from.
 *
 * @module
 */

export { Relation, type Row, type RecordRow } from './relation';
export { join, joinWithLayout, type JoinLayout, type JoinResult } from './join';
export { transform, type TransformCriteria } from './transform';
export { aggregate, aggregationLabel } from './aggregates';
export { compareCells, sortRows, type SortKey } from './ordering';
export { compileCondition, evaluateComparison, likeToRegExp, type RowPredicate } from './predicates';
export { resolveColumn, resolveColumnIndex } from './columns';
