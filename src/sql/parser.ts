/**
 * Query Parser
 * =============
 *
 * Recursive-descent parser turning the token stream into a typed statement
 * tree. Clause order is fixed:
 *
 * ```
 * SELECT [DISTINCT] columns [INTO datasource] FROM datasource [AS alias]
 *   join_clause* [WHERE condition] [GROUP BY columns]
 *   [ORDER BY params] [LIMIT n | TAIL n] ;
 * ```
 *
 * Parsing is pure: the tree carries no token positions.
 *
 * @module
 */

import {
  COUNTING_FUNCTIONS,
  isAggregateFunction,
  type Aggregation,
  type Assignment,
  type Cell,
  type ColumnRef,
  type ComparisonOperator,
  type Datasource,
  type DeleteStatement,
  type InsertStatement,
  type JoinClause,
  type JoinCondition,
  type JoinKind,
  type LimitClause,
  type Operand,
  type OrderByItem,
  type RemoteDescriptor,
  type SelectColumn,
  type SelectColumns,
  type SelectStatement,
  type Statement,
  type TableSource,
  type UpdateStatement,
  type WhereCondition,
} from './ast-types';
import { tokenize, type Token, type TokenType } from './tokenizer';
import { AggregationOnWildcardError, QuerySyntaxError } from '../errors';

/** Source type of a bare-name datasource (`FROM sales`) */
export const MEMORY_SOURCE_TYPE = 'memory';

/** Source types whose path is a seven-field remote descriptor */
export const REMOTE_SOURCE_TYPES: ReadonlySet<string> = new Set(['gee']);

/**
 * Parse a token stream into a statement.
 * The stream must end with an EOF token, as produced by `tokenize`.
 */
export function parse(tokens: readonly Token[]): Statement {
  return new TokenStream(tokens).parseStatement();
}

/**
 * QueryParser: tokenizes and parses query text
 */
export class QueryParser {
  parse(source: string): Statement {
    return parse(tokenize(source));
  }
}

/**
 * Parse a remote descriptor `project|dataset|start_date|end_date|longitude|latitude|scale`.
 * Returns a reason string when the descriptor is malformed.
 */
export function parseRemoteDescriptor(path: string): RemoteDescriptor | string {
  const parts = path.split('|').map(part => part.trim());
  if (parts.length !== 7) {
    return `expected 7 '|'-separated fields (project|dataset|start_date|end_date|longitude|latitude|scale), got ${parts.length}`;
  }
  const [project, dataset, startDate, endDate, longitude, latitude, scale] = parts;
  if (!project || !dataset) {
    return 'project and dataset must not be empty';
  }
  for (const [label, value] of [['start_date', startDate], ['end_date', endDate]] as const) {
    if (!isIsoDate(value)) return `${label} '${value}' is not an ISO date (YYYY-MM-DD)`;
  }
  const numbers: number[] = [];
  for (const [label, value] of [['longitude', longitude], ['latitude', latitude], ['scale', scale]] as const) {
    const parsed = Number(value);
    if (value === '' || !Number.isFinite(parsed)) return `${label} '${value}' is not a decimal number`;
    numbers.push(parsed);
  }
  return {
    project,
    dataset,
    startDate,
    endDate,
    longitude: numbers[0],
    latitude: numbers[1],
    scale: numbers[2],
  };
}

function isIsoDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return date.toISOString().slice(0, 10) === value;
}

// ============ TOKEN STREAM ============

class TokenStream {
  private position = 0;

  constructor(private readonly tokens: readonly Token[]) {
    const last = tokens[tokens.length - 1];
    if (!last || last.type !== 'EOF') {
      throw new QuerySyntaxError('Token stream must end with an end-of-input token', last?.value ?? '', last?.line ?? 1, last?.column ?? 1);
    }
  }

  // ============ STATEMENTS ============

  parseStatement(): Statement {
    const token = this.peek();
    let statement: Statement;
    if (this.isKeyword('SELECT')) {
      statement = this.parseSelect();
    } else if (this.isKeyword('INSERT')) {
      statement = this.parseInsert();
    } else if (this.isKeyword('UPDATE')) {
      statement = this.parseUpdate();
    } else if (this.isKeyword('DELETE')) {
      statement = this.parseDelete();
    } else {
      throw this.error(token, 'Expected SELECT, INSERT, UPDATE or DELETE');
    }
    this.expectPunctuation(';');
    this.expect('EOF');
    return statement;
  }

  private parseSelect(): SelectStatement {
    this.expectKeyword('SELECT');
    const distinct = this.acceptKeyword('DISTINCT');
    const columns = this.parseSelectColumns();

    let into: Datasource | undefined;
    if (this.acceptKeyword('INTO')) {
      into = this.parseDatasource();
    }

    this.expectKeyword('FROM');
    const from = this.parseTableSource();

    const joins: JoinClause[] = [];
    while (this.isJoinStart()) {
      joins.push(this.parseJoinClause());
    }

    let where: WhereCondition | undefined;
    if (this.acceptKeyword('WHERE')) {
      where = this.parseCondition();
    }

    let groupBy: ColumnRef[] | undefined;
    if (this.acceptKeyword('GROUP')) {
      this.expectKeyword('BY');
      groupBy = this.parseList(() => this.parseColumn());
    }

    let orderBy: OrderByItem[] | undefined;
    if (this.acceptKeyword('ORDER')) {
      this.expectKeyword('BY');
      orderBy = this.parseList(() => this.parseOrderByItem());
    }

    let limitOrTail: LimitClause | undefined;
    if (this.isKeyword('LIMIT') || this.isKeyword('TAIL')) {
      const kind = this.next().value === 'LIMIT' ? 'limit' : 'tail';
      const count = this.expect('NUMBER');
      limitOrTail = { kind, count: Number(count.value) };
    }

    const statement: SelectStatement = { type: 'SELECT', distinct, columns, from, joins };
    if (into) statement.into = into;
    if (where) statement.where = where;
    if (groupBy) statement.groupBy = groupBy;
    if (orderBy) statement.orderBy = orderBy;
    if (limitOrTail) statement.limitOrTail = limitOrTail;
    return statement;
  }

  private parseInsert(): InsertStatement {
    this.expectKeyword('INSERT');
    this.expectKeyword('INTO');
    const target = this.parseDatasource();

    let columns: string[] | undefined;
    if (this.acceptPunctuation('(')) {
      columns = this.parseList(() => this.parseColumnName());
      this.expectPunctuation(')');
    }

    this.expectKeyword('VALUES');
    const values: Cell[][] = [];
    let width = columns?.length;
    do {
      const open = this.expectPunctuation('(');
      const row = this.parseList(() => this.parseLiteral());
      this.expectPunctuation(')');
      if (width === undefined) {
        width = row.length;
      } else if (row.length !== width) {
        throw this.error(open, `Row has ${row.length} values, expected ${width}`);
      }
      values.push(row);
    } while (this.acceptPunctuation(','));

    const statement: InsertStatement = { type: 'INSERT', target, values };
    if (columns) statement.columns = columns;
    return statement;
  }

  private parseUpdate(): UpdateStatement {
    this.expectKeyword('UPDATE');
    const target = this.parseDatasource();
    this.expectKeyword('SET');
    const assignments = this.parseList((): Assignment => {
      const column = this.parseColumnName();
      this.expectOperator('=');
      return { column, value: this.parseLiteral() };
    });

    const statement: UpdateStatement = { type: 'UPDATE', target, assignments };
    if (this.acceptKeyword('WHERE')) {
      statement.where = this.parseCondition();
    }
    return statement;
  }

  private parseDelete(): DeleteStatement {
    this.expectKeyword('DELETE');
    this.expectKeyword('FROM');
    const target = this.parseDatasource();

    const statement: DeleteStatement = { type: 'DELETE', target };
    if (this.acceptKeyword('WHERE')) {
      statement.where = this.parseCondition();
    }
    return statement;
  }

  // ============ COLUMNS ============

  private parseSelectColumns(): SelectColumns {
    if (this.acceptPunctuation('*')) {
      return '*';
    }
    return this.parseList((): SelectColumn => this.parseAggregationOrColumn());
  }

  private parseAggregationOrColumn(): ColumnRef | Aggregation {
    const token = this.peek();
    const following = this.peek(1);
    if (token.type === 'IDENTIFIER' && following.type === 'PUNCTUATION' && following.value === '(') {
      return this.parseAggregation();
    }
    return this.parseColumn();
  }

  private parseAggregation(): Aggregation {
    const nameToken = this.expect('IDENTIFIER');
    const name = nameToken.value.toLowerCase();
    if (!isAggregateFunction(name)) {
      throw this.error(nameToken, `Unknown aggregation function '${nameToken.value}'`);
    }
    this.expectPunctuation('(');

    let column: ColumnRef | '*';
    const star = this.peek();
    if (this.acceptPunctuation('*')) {
      if (!COUNTING_FUNCTIONS.includes(name)) {
        throw new AggregationOnWildcardError(name, star.line, star.column);
      }
      column = '*';
    } else {
      column = this.parseColumn();
    }

    this.expectPunctuation(')');
    return { type: 'aggregate', function: name, column };
  }

  private parseColumn(): ColumnRef {
    const token = this.next();
    switch (token.type) {
      case 'INDEX':
        return { type: 'index', index: Number(token.value) };
      case 'BRACKETED':
        return { type: 'column', name: token.value };
      case 'IDENTIFIER': {
        if (this.acceptPunctuation('.')) {
          const column = this.next();
          if (column.type !== 'IDENTIFIER' && column.type !== 'BRACKETED') {
            throw this.error(column, 'Expected a column name after table alias');
          }
          return { type: 'column', name: column.value, table: token.value };
        }
        return { type: 'column', name: token.value };
      }
      default:
        throw this.error(token, 'Expected a column');
    }
  }

  private parseColumnName(): string {
    const token = this.next();
    if (token.type !== 'IDENTIFIER' && token.type !== 'BRACKETED') {
      throw this.error(token, 'Expected a column name');
    }
    return token.value;
  }

  private parseOrderByItem(): OrderByItem {
    const parameter = this.parseAggregationOrColumn();
    if (this.acceptKeyword('DESC')) {
      return { parameter, direction: 'DESC' };
    }
    this.acceptKeyword('ASC');
    return { parameter, direction: 'ASC' };
  }

  // ============ DATASOURCES ============

  private parseTableSource(): TableSource {
    const datasource = this.parseDatasource();
    if (this.acceptKeyword('AS')) {
      const alias = this.expect('IDENTIFIER');
      return { datasource, alias: alias.value };
    }
    return { datasource };
  }

  private parseDatasource(): Datasource {
    const token = this.next();
    if (token.type === 'IDENTIFIER') {
      return { kind: 'path', sourceType: MEMORY_SOURCE_TYPE, path: token.value };
    }
    if (token.type !== 'DATASOURCE') {
      throw this.error(token, 'Expected a datasource');
    }

    const separator = token.value.indexOf(':');
    if (separator <= 0 || separator === token.value.length - 1) {
      throw this.error(token, "Datasource must have the form 'type:path'");
    }
    const sourceType = token.value.slice(0, separator).trim().toLowerCase();
    const path = token.value.slice(separator + 1).trim();

    if (REMOTE_SOURCE_TYPES.has(sourceType)) {
      const descriptor = parseRemoteDescriptor(path);
      if (typeof descriptor === 'string') {
        throw this.error(token, `Invalid remote descriptor: ${descriptor}`);
      }
      return { kind: 'remote', sourceType, path, descriptor };
    }
    return { kind: 'path', sourceType, path };
  }

  // ============ JOINS ============

  private isJoinStart(): boolean {
    return ['JOIN', 'INNER', 'LEFT', 'RIGHT', 'FULL'].some(keyword => this.isKeyword(keyword));
  }

  private parseJoinClause(): JoinClause {
    let joinType: JoinKind = 'inner';
    if (this.acceptKeyword('INNER')) {
      joinType = 'inner';
    } else if (this.acceptKeyword('LEFT')) {
      joinType = 'left';
      this.acceptKeyword('OUTER');
    } else if (this.acceptKeyword('RIGHT')) {
      joinType = 'right';
      this.acceptKeyword('OUTER');
    } else if (this.acceptKeyword('FULL')) {
      joinType = 'outer';
      this.acceptKeyword('OUTER');
    }
    this.expectKeyword('JOIN');
    const source = this.parseTableSource();
    this.expectKeyword('ON');
    return { joinType, source, on: this.parseJoinCondition() };
  }

  /** join_cond := join_and (OR join_and)* */
  private parseJoinCondition(): JoinCondition {
    let condition = this.parseJoinConjunction();
    while (this.acceptKeyword('OR')) {
      condition = { type: 'OR', left: condition, right: this.parseJoinConjunction() };
    }
    return condition;
  }

  /** join_and := equality (AND equality)* */
  private parseJoinConjunction(): JoinCondition {
    let condition: JoinCondition = this.parseJoinEquality();
    while (this.acceptKeyword('AND')) {
      condition = { type: 'AND', left: condition, right: this.parseJoinEquality() };
    }
    return condition;
  }

  private parseJoinEquality(): JoinCondition {
    const left = this.parseColumn();
    this.expectOperator('=');
    const right = this.parseColumn();
    return { type: 'EQUALS', left, right };
  }

  // ============ WHERE CONDITIONS ============

  private parseCondition(): WhereCondition {
    let condition = this.parseAnd();
    while (this.acceptKeyword('OR')) {
      condition = { type: 'OR', left: condition, right: this.parseAnd() };
    }
    return condition;
  }

  private parseAnd(): WhereCondition {
    let condition = this.parseNot();
    while (this.acceptKeyword('AND')) {
      condition = { type: 'AND', left: condition, right: this.parseNot() };
    }
    return condition;
  }

  private parseNot(): WhereCondition {
    if (this.acceptKeyword('NOT')) {
      return { type: 'NOT', operand: this.parseNot() };
    }
    if (this.acceptPunctuation('(')) {
      const inner = this.parseCondition();
      this.expectPunctuation(')');
      return inner;
    }
    return this.parsePredicate();
  }

  private parsePredicate(): WhereCondition {
    const start = this.peek();
    const left = this.parseOperand();

    if (this.acceptKeyword('LIKE')) {
      if (left.type === 'literal') {
        throw this.error(start, 'LIKE requires a column on its left');
      }
      const pattern = this.expect('STRING');
      return { type: 'LIKE', column: left, pattern: pattern.value };
    }

    const token = this.next();
    const operator = token.type === 'OPERATOR' ? asComparisonOperator(token.value) : undefined;
    if (!operator) {
      throw this.error(token, 'Expected a comparison operator or LIKE');
    }
    return { type: 'COMPARISON', left, operator, right: this.parseOperand() };
  }

  private parseOperand(): Operand {
    const token = this.peek();
    if (token.type === 'STRING' || token.type === 'NUMBER' || this.isLiteralKeyword()) {
      return { type: 'literal', value: this.parseLiteral() };
    }
    return this.parseColumn();
  }

  private isLiteralKeyword(): boolean {
    return this.isKeyword('NULL') || this.isKeyword('TRUE') || this.isKeyword('FALSE');
  }

  private parseLiteral(): Cell {
    const token = this.next();
    switch (token.type) {
      case 'STRING':
        return token.value;
      case 'NUMBER':
        return Number(token.value);
      case 'KEYWORD':
        if (token.value === 'NULL') return null;
        if (token.value === 'TRUE') return true;
        if (token.value === 'FALSE') return false;
        break;
    }
    throw this.error(token, 'Expected a literal value');
  }

  // ============ HELPERS ============

  private parseList<T>(parseItem: () => T): T[] {
    const items = [parseItem()];
    while (this.acceptPunctuation(',')) {
      items.push(parseItem());
    }
    return items;
  }

  private peek(offset = 0): Token {
    const index = Math.min(this.position + offset, this.tokens.length - 1);
    return this.tokens[index];
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== 'EOF') {
      this.position++;
    }
    return token;
  }

  private isKeyword(keyword: string): boolean {
    const token = this.peek();
    return token.type === 'KEYWORD' && token.value === keyword;
  }

  private acceptKeyword(keyword: string): boolean {
    if (!this.isKeyword(keyword)) return false;
    this.position++;
    return true;
  }

  private expectKeyword(keyword: string): Token {
    const token = this.peek();
    if (!this.acceptKeyword(keyword)) {
      throw this.error(token, `Expected ${keyword}`);
    }
    return token;
  }

  private acceptPunctuation(value: string): boolean {
    const token = this.peek();
    if (token.type !== 'PUNCTUATION' || token.value !== value) return false;
    this.position++;
    return true;
  }

  private expectPunctuation(value: string): Token {
    const token = this.peek();
    if (!this.acceptPunctuation(value)) {
      throw this.error(token, `Expected '${value}'`);
    }
    return token;
  }

  private expectOperator(value: string): Token {
    const token = this.next();
    if (token.type !== 'OPERATOR' || token.value !== value) {
      throw this.error(token, `Expected '${value}'`);
    }
    return token;
  }

  private expect(type: TokenType): Token {
    const token = this.next();
    if (token.type !== type) {
      throw this.error(token, `Expected ${describeTokenType(type)}`);
    }
    return token;
  }

  private error(token: Token, message: string): QuerySyntaxError {
    return new QuerySyntaxError(`Syntax error: ${message}`, token.value, token.line, token.column);
  }
}

function asComparisonOperator(value: string): ComparisonOperator | undefined {
  switch (value) {
    case '=':
    case '!=':
    case '<>':
    case '<':
    case '>':
    case '<=':
    case '>=':
      return value;
    default:
      return undefined;
  }
}

function describeTokenType(type: TokenType): string {
  switch (type) {
    case 'EOF':
      return 'end of input';
    case 'NUMBER':
      return 'a number';
    case 'STRING':
      return 'a string literal';
    case 'IDENTIFIER':
      return 'an identifier';
    default:
      return type.toLowerCase();
  }
}
