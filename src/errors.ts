/**
 * Query Errors
 * ============
 *
 * Every failure raised while compiling or executing a statement is a
 * `QueryError` carrying a discriminated `kind` plus the context needed to
 * render a precise diagnostic. Errors are terminal for the statement.
 *
 * @module
 */

export type QueryErrorKind =
  | 'SyntaxError'
  | 'AggregationOnWildcardDisallowed'
  | 'ColumnNotInGroupBy'
  | 'MixedAggregationWithoutGroup'
  | 'AggregationOrderWithoutGroup'
  | 'ColumnIndexOutOfRange'
  | 'ColumnNotFound'
  | 'DuplicateColumn'
  | 'RowArityMismatch'
  | 'InvalidJoinKind'
  | 'MissingJoinColumn'
  | 'JoinFailed'
  | 'InvalidLimit'
  | 'NullInput'
  | 'UnknownSourceType'
  | 'ExtractFailed'
  | 'LoadFailed'
  | 'DuplicateAlias'
  | 'UnknownAlias'
  | 'UnsupportedJoinCondition'
  | 'UnsupportedStatement';

export type ErrorDetails = Record<string, string | number | boolean | null | readonly string[]>;

export abstract class QueryError extends Error {
  abstract readonly kind: QueryErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  /** Structured context, serialized into server error messages */
  abstract get details(): ErrorDetails;
}

export function isQueryError(value: unknown): value is QueryError {
  return value instanceof QueryError;
}

// ============ PARSE-TIME ERRORS ============

export class QuerySyntaxError extends QueryError {
  readonly kind = 'SyntaxError' as const;

  constructor(
    message: string,
    public readonly token: string,
    public readonly line: number,
    public readonly column: number,
  ) {
    super(`${message} at token '${token}' on line ${line}, column ${column}`);
  }

  get details(): ErrorDetails {
    return { token: this.token, line: this.line, column: this.column };
  }
}

export class AggregationOnWildcardError extends QueryError {
  readonly kind = 'AggregationOnWildcardDisallowed' as const;

  constructor(
    public readonly functionName: string,
    public readonly line: number,
    public readonly column: number,
  ) {
    super(`Aggregation '${functionName}' cannot be applied to '*' (only counting functions can) on line ${line}, column ${column}`);
  }

  get details(): ErrorDetails {
    return { function: this.functionName, token: '*', line: this.line, column: this.column };
  }
}

// ============ SCHEMA ERRORS ============

export class ColumnNotFoundError extends QueryError {
  readonly kind = 'ColumnNotFound' as const;

  constructor(
    public readonly columnName: string,
    public readonly available: readonly string[],
  ) {
    super(`Column '${columnName}' not found. Available: ${available.join(', ')}`);
  }

  get details(): ErrorDetails {
    return { column: this.columnName, available: this.available };
  }
}

export class ColumnIndexOutOfRangeError extends QueryError {
  readonly kind = 'ColumnIndexOutOfRange' as const;

  constructor(
    public readonly index: number,
    public readonly width: number,
  ) {
    super(`Column index ${index} out of range (relation has ${width} columns)`);
  }

  get details(): ErrorDetails {
    return { index: this.index, width: this.width };
  }
}

export class DuplicateColumnError extends QueryError {
  readonly kind = 'DuplicateColumn' as const;

  constructor(public readonly columnName: string) {
    super(`Duplicate column name '${columnName}'`);
  }

  get details(): ErrorDetails {
    return { column: this.columnName };
  }
}

export class RowArityMismatchError extends QueryError {
  readonly kind = 'RowArityMismatch' as const;

  constructor(
    public readonly rowIndex: number,
    public readonly expected: number,
    public readonly actual: number,
  ) {
    super(`Row ${rowIndex} has ${actual} cells, expected ${expected}`);
  }

  get details(): ErrorDetails {
    return { row: this.rowIndex, expected: this.expected, actual: this.actual };
  }
}

// ============ TRANSFORM ERRORS ============

export class ColumnNotInGroupByError extends QueryError {
  readonly kind = 'ColumnNotInGroupBy' as const;

  constructor(
    public readonly columnName: string,
    public readonly groupKeys: readonly string[],
  ) {
    super(`Column '${columnName}' is neither aggregated nor included in GROUP BY (${groupKeys.join(', ')})`);
  }

  get details(): ErrorDetails {
    return { column: this.columnName, groupKeys: this.groupKeys };
  }
}

export class MixedAggregationWithoutGroupError extends QueryError {
  readonly kind = 'MixedAggregationWithoutGroup' as const;

  constructor(public readonly columns: readonly string[]) {
    super(`Aggregation functions used together with plain columns (${columns.join(', ')}) without GROUP BY`);
  }

  get details(): ErrorDetails {
    return { columns: this.columns };
  }
}

export class AggregationOrderWithoutGroupError extends QueryError {
  readonly kind = 'AggregationOrderWithoutGroup' as const;

  constructor(public readonly expression: string) {
    super(`ORDER BY ${expression} requires a GROUP BY clause`);
  }

  get details(): ErrorDetails {
    return { expression: this.expression };
  }
}

export class InvalidLimitError extends QueryError {
  readonly kind = 'InvalidLimit' as const;

  constructor(
    public readonly limitKind: string,
    public readonly count: number,
  ) {
    super(`${limitKind.toUpperCase()} requires a non-negative integer, got ${count}`);
  }

  get details(): ErrorDetails {
    return { kind: this.limitKind, count: this.count };
  }
}

export class NullInputError extends QueryError {
  readonly kind = 'NullInput' as const;

  constructor(public readonly operation: string) {
    super(`Input relation of ${operation} must not be null`);
  }

  get details(): ErrorDetails {
    return { operation: this.operation };
  }
}

// ============ JOIN ERRORS ============

export class InvalidJoinKindError extends QueryError {
  readonly kind = 'InvalidJoinKind' as const;

  constructor(
    public readonly joinKind: string,
    public readonly valid: readonly string[],
  ) {
    super(`Invalid join type '${joinKind}'. Must be one of ${valid.join(', ')}`);
  }

  get details(): ErrorDetails {
    return { joinKind: this.joinKind, valid: this.valid };
  }
}

export class MissingJoinColumnError extends QueryError {
  readonly kind = 'MissingJoinColumn' as const;

  constructor(
    public readonly side: 'left' | 'right',
    public readonly columnName: string,
    public readonly available: readonly string[],
  ) {
    super(`Column '${columnName}' not found in ${side} relation. Available: ${available.join(', ')}`);
  }

  get details(): ErrorDetails {
    return { side: this.side, column: this.columnName, available: this.available };
  }
}

export class JoinFailedError extends QueryError {
  readonly kind = 'JoinFailed' as const;

  constructor(
    reason: string,
    public readonly leftKeys: readonly string[],
    public readonly rightKeys: readonly string[],
    public readonly leftColumns: readonly string[],
    public readonly rightColumns: readonly string[],
    public readonly joinKind: string,
    cause?: unknown,
  ) {
    super(
      `Error during join: ${reason} (left_col=${leftKeys.join(', ')}, right_col=${rightKeys.join(', ')}, how=${joinKind})`,
      { cause },
    );
  }

  get details(): ErrorDetails {
    return {
      leftKeys: this.leftKeys,
      rightKeys: this.rightKeys,
      leftColumns: this.leftColumns,
      rightColumns: this.rightColumns,
      joinKind: this.joinKind,
    };
  }
}

// ============ PLAN ERRORS ============

export class DuplicateAliasError extends QueryError {
  readonly kind = 'DuplicateAlias' as const;

  constructor(public readonly alias: string) {
    super(`Table alias '${alias}' is declared more than once`);
  }

  get details(): ErrorDetails {
    return { alias: this.alias };
  }
}

export class UnknownAliasError extends QueryError {
  readonly kind = 'UnknownAlias' as const;

  constructor(
    public readonly alias: string,
    public readonly declared: readonly string[],
  ) {
    super(`Unknown table alias '${alias}'. Declared: ${declared.join(', ')}`);
  }

  get details(): ErrorDetails {
    return { alias: this.alias, declared: this.declared };
  }
}

export class UnsupportedJoinConditionError extends QueryError {
  readonly kind = 'UnsupportedJoinCondition' as const;

  constructor(
    public readonly reason: string,
    public readonly joinIndex: number,
  ) {
    super(`Unsupported ON condition in join ${joinIndex}: ${reason}`);
  }

  get details(): ErrorDetails {
    return { reason: this.reason, join: this.joinIndex };
  }
}

export class UnsupportedStatementError extends QueryError {
  readonly kind = 'UnsupportedStatement' as const;

  constructor(public readonly statementType: string) {
    super(`${statementType} statements are parsed but cannot be executed`);
  }

  get details(): ErrorDetails {
    return { statement: this.statementType };
  }
}

// ============ ADAPTER ERRORS ============

export class UnknownSourceTypeError extends QueryError {
  readonly kind = 'UnknownSourceType' as const;

  constructor(
    public readonly sourceType: string,
    public readonly known: readonly string[],
  ) {
    super(`Unknown source type '${sourceType}'. Registered: ${known.join(', ')}`);
  }

  get details(): ErrorDetails {
    return { sourceType: this.sourceType, known: this.known };
  }
}

export class ExtractFailedError extends QueryError {
  readonly kind = 'ExtractFailed' as const;

  constructor(
    public readonly sourceType: string,
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Error extracting data from '${sourceType}:${path}': ${describeCause(cause)}`, { cause });
  }

  get details(): ErrorDetails {
    return { sourceType: this.sourceType, path: this.path };
  }
}

export class LoadFailedError extends QueryError {
  readonly kind = 'LoadFailed' as const;

  constructor(
    public readonly sourceType: string,
    public readonly destination: string,
    cause: unknown,
  ) {
    super(`Error loading data to '${sourceType}:${destination}': ${describeCause(cause)}`, { cause });
  }

  get details(): ErrorDetails {
    return { sourceType: this.sourceType, destination: this.destination };
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
