/**
 * Query AST Type Definitions
 * ===========================
 *
 * Type definitions for the statement tree produced by the parser. Every
 * grammar nonterminal has its own tagged variant; nodes are plain immutable
 * values and carry no source positions, so parsing the same text twice
 * yields structurally equal trees.
 *
 * @module
 */

// ============ VALUES ============

/** A dynamically typed cell of a relation */
export type Cell = string | number | boolean | null;

// ============ COLUMN TYPES ============

/** Column referenced by name, optionally qualified by a table alias (`t.name`, `t.[long name]`) */
export interface NamedColumn {
  type: 'column';
  name: string;
  table?: string;
}

/** Column referenced by 0-based position (`#2`), resolved against the schema at execution time */
export interface IndexedColumn {
  type: 'index';
  index: number;
}

export type ColumnRef = NamedColumn | IndexedColumn;

export const AGGREGATE_FUNCTIONS = [
  'sum',
  'avg',
  'mean',
  'median',
  'min',
  'max',
  'count',
  'size',
  'nunique',
  'first',
  'last',
  'std',
  'var',
  'prod',
] as const;

export type AggregateFunction = (typeof AGGREGATE_FUNCTIONS)[number];

/** Functions that may be applied to `*` */
export const COUNTING_FUNCTIONS: readonly AggregateFunction[] = ['count', 'size'];

export interface Aggregation {
  type: 'aggregate';
  function: AggregateFunction;
  column: ColumnRef | '*';
}

export type SelectColumn = ColumnRef | Aggregation;

export type SelectColumns = '*' | SelectColumn[];

// ============ DATASOURCES ============

/** Seven-field descriptor of a remote earth-observation source */
export interface RemoteDescriptor {
  project: string;
  dataset: string;
  startDate: string;
  endDate: string;
  longitude: number;
  latitude: number;
  scale: number;
}

export interface PathDatasource {
  kind: 'path';
  sourceType: string;
  path: string;
}

export interface RemoteDatasource {
  kind: 'remote';
  sourceType: string;
  path: string;
  descriptor: RemoteDescriptor;
}

export type Datasource = PathDatasource | RemoteDatasource;

export interface TableSource {
  datasource: Datasource;
  alias?: string;
}

// ============ WHERE CONDITION TYPES ============

export type ComparisonOperator = '=' | '!=' | '<>' | '<' | '>' | '<=' | '>=';

export interface LiteralOperand {
  type: 'literal';
  value: Cell;
}

export type Operand = ColumnRef | LiteralOperand;

export interface ComparisonCondition {
  type: 'COMPARISON';
  left: Operand;
  operator: ComparisonOperator;
  right: Operand;
}

export interface LikeCondition {
  type: 'LIKE';
  column: ColumnRef;
  pattern: string;
}

export interface AndCondition {
  type: 'AND';
  left: WhereCondition;
  right: WhereCondition;
}

export interface OrCondition {
  type: 'OR';
  left: WhereCondition;
  right: WhereCondition;
}

export interface NotCondition {
  type: 'NOT';
  operand: WhereCondition;
}

export type WhereCondition =
  | ComparisonCondition
  | LikeCondition
  | AndCondition
  | OrCondition
  | NotCondition;

// ============ JOIN TYPES ============

export type JoinKind = 'inner' | 'left' | 'right' | 'outer';

export const JOIN_KINDS: readonly JoinKind[] = ['inner', 'left', 'right', 'outer'];

/** Equality between two (possibly qualified) columns */
export interface JoinEquality {
  type: 'EQUALS';
  left: ColumnRef;
  right: ColumnRef;
}

export interface JoinConjunction {
  type: 'AND' | 'OR';
  left: JoinCondition;
  right: JoinCondition;
}

export type JoinCondition = JoinEquality | JoinConjunction;

export interface JoinClause {
  joinType: JoinKind;
  source: TableSource;
  on: JoinCondition;
}

// ============ ORDER / LIMIT ============

export type SortDirection = 'ASC' | 'DESC';

export interface OrderByItem {
  parameter: ColumnRef | Aggregation;
  direction: SortDirection;
}

export type LimitKind = 'limit' | 'tail';

export interface LimitClause {
  kind: LimitKind;
  count: number;
}

// ============ STATEMENT TYPES ============

export interface SelectStatement {
  type: 'SELECT';
  distinct: boolean;
  columns: SelectColumns;
  into?: Datasource;
  from: TableSource;
  joins: JoinClause[];
  where?: WhereCondition;
  groupBy?: ColumnRef[];
  orderBy?: OrderByItem[];
  limitOrTail?: LimitClause;
}

export interface InsertStatement {
  type: 'INSERT';
  target: Datasource;
  columns?: string[];
  values: Cell[][];
}

export interface Assignment {
  column: string;
  value: Cell;
}

export interface UpdateStatement {
  type: 'UPDATE';
  target: Datasource;
  assignments: Assignment[];
  where?: WhereCondition;
}

export interface DeleteStatement {
  type: 'DELETE';
  target: Datasource;
  where?: WhereCondition;
}

export type Statement = SelectStatement | InsertStatement | UpdateStatement | DeleteStatement;

// ============ HELPERS ============

export function isAggregation(column: SelectColumn | ColumnRef | Aggregation): column is Aggregation {
  return column.type === 'aggregate';
}

export function isAggregateFunction(name: string): name is AggregateFunction {
  return AGGREGATE_FUNCTIONS.some(fn => fn === name);
}

/** Render a column reference the way it is written in a query */
export function formatColumnRef(ref: ColumnRef): string {
  if (ref.type === 'index') return `#${ref.index}`;
  return ref.table ? `${ref.table}.${ref.name}` : ref.name;
}

export function formatDatasource(datasource: Datasource): string {
  return `${datasource.sourceType}:${datasource.path}`;
}
