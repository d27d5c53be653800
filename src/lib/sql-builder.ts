import { createHash } from 'node:crypto';

import { QueryError, ValidationError } from './errors.js';
import type { QueryExecutor, QueryParameters, RowRecord } from './model-types.js';
import { SqlColumn, SqlId, SqlIdentifier, SqlTable } from './sql-identifiers.js';

interface ParamRef {
  param: number;
}

type Segment = string | ParamRef;

interface ClauseLine {
  keyword: string;
  separator: string | null;
  items: Array<{ joiner: string; segments: Segment[] }>;
}

export interface SqlBuilderOptions {
  schema?: string | null;
  executor?: QueryExecutor | null;
}

export type SortDirection = 'ASC' | 'DESC';

export const COMPARISON_OPERATORS = [
  '=',
  '!=',
  '<>',
  '<',
  '<=',
  '>',
  '>=',
  'LIKE',
  'NOT LIKE',
  'ILIKE',
  'NOT ILIKE',
  'IN',
  'NOT IN',
  'IS',
  'IS NOT',
] as const;

export type ComparisonOperator = (typeof COMPARISON_OPERATORS)[number];

function isComparisonOperator(value: unknown): value is ComparisonOperator {
  if (typeof value !== 'string') return false;
  const upper = value.trim().toUpperCase();
  return COMPARISON_OPERATORS.some(op => op === upper);
}

const PLACEHOLDER = /\{\{|\}\}|\{(\d+)\}/g;
const HAS_PLACEHOLDER = /\{\d+\}/;
const PLAIN_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;
const TABLE_NAME = /^(?:([A-Za-z_][A-Za-z0-9_]*)\.)?([A-Za-z_][A-Za-z0-9_]*)$/;

// Word separators (AND, OR) are padded on both sides, punctuation only after.
const separatorJoiner = (separator: string): string =>
  /^\w/.test(separator) ? ` ${separator} ` : `${separator} `;

const hasPlaceholders = (format: string): boolean => HAS_PLACEHOLDER.test(format);

const isParamRef = (segment: Segment): segment is ParamRef => typeof segment !== 'string';

function normalizeDirection(direction: string): SortDirection {
  const upper = direction.trim().toUpperCase();
  if (upper !== 'ASC' && upper !== 'DESC') {
    throw new ValidationError(`Invalid sort direction '${direction}'`, 'direction');
  }
  return upper;
}

function describeValue(value: unknown): string {
  if (value instanceof Date) return `date:${value.toISOString()}`;
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'bigint') return `bigint:${value.toString()}`;
  if (typeof value === 'object') return `json:${JSON.stringify(value)}`;
  return `${typeof value}:${String(value)}`;
}

/**
 * Incremental, parameterized SQL assembler.
 *
 * Each clause method either continues the current clause (joined by its
 * separator) or starts a new line. Placeholders `{0}`, `{1}` ... in a
 * fragment are replaced by bound parameters, by the quoted text of an
 * identifier wrapper, or by the statement of a nested builder whose
 * parameters are merged into this one.
 *
 * ```ts
 * const qb = new SqlBuilder({ schema: 'public' })
 *   .SELECT('*')
 *   .FROM('Users')
 *   .WHERE('Name', 'Ada');
 * qb.sql; // SELECT *\nFROM "public"."Users"\nWHERE "Name" = $1
 * ```
 */
export class SqlBuilder {
  readonly schema: string | null;
  executor: QueryExecutor | null;
  private lines: ClauseLine[];
  private values: unknown[];
  private rendered: { sql: string; values: unknown[] } | null;

  constructor(options: SqlBuilderOptions = {}) {
    this.schema = options.schema ?? null;
    this.executor = options.executor ?? null;
    this.lines = [];
    this.values = [];
    this.rendered = null;
  }

  /**
   * Table wrapper qualified with this builder's schema.
   */
  table(name: string): SqlTable {
    const match = TABLE_NAME.exec(name);
    if (match?.[1] && match[2]) {
      return new SqlTable(match[2], match[1]);
    }
    return new SqlTable(name, this.schema);
  }

  column(table: string, column: string): SqlColumn {
    return new SqlColumn(this.table(table), column);
  }

  get isEmpty(): boolean {
    return this.lines.length === 0;
  }

  get sql(): string {
    return this.render().sql;
  }

  /**
   * Bound values in placeholder order, as handed to the driver.
   */
  get parameterValues(): unknown[] {
    return [...this.render().values];
  }

  /**
   * Bound values keyed by their placeholder token (`$1`, `$2`, ...).
   */
  get parameters(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    this.render().values.forEach((value, index) => {
      result[`$${index + 1}`] = value;
    });
    return result;
  }

  /**
   * Fingerprint of the statement text and the bound values.
   */
  get hash(): string {
    const { sql, values } = this.render();
    const digest = createHash('sha256');
    digest.update(sql);
    values.forEach((value, index) => {
      digest.update(`\n$${index + 1} => ${describeValue(value)}`);
    });
    return digest.digest('hex');
  }

  toString(): string {
    return this.sql;
  }

  // ----- clause assembly -----

  private get current(): ClauseLine | undefined {
    return this.lines[this.lines.length - 1];
  }

  protected appendClause(
    keyword: string,
    separator: string | null,
    format?: string,
    args: unknown[] = []
  ): this {
    this.rendered = null;
    const current = this.current;
    let line: ClauseLine;

    if (keyword === '') {
      // Continuation of whatever line we are on (COLS after INSERT INTO).
      if (!current) {
        line = { keyword: '', separator: null, items: [] };
        this.lines.push(line);
      } else {
        line = current;
      }
      if (format) {
        line.items.push({ joiner: ' ', segments: this.compile(format, args) });
      }
      return this;
    }

    if (current && current.keyword === keyword && separator !== null) {
      line = current;
    } else {
      line = { keyword, separator, items: [] };
      this.lines.push(line);
    }

    if (format) {
      const joiner = line.separator === null ? ' ' : separatorJoiner(line.separator);
      line.items.push({ joiner, segments: this.compile(format, args) });
    }
    return this;
  }

  private addValue(value: unknown): ParamRef {
    this.values.push(value === undefined ? null : value);
    return { param: this.values.length - 1 };
  }

  private argumentSegments(value: unknown): Segment[] {
    if (value instanceof SqlIdentifier) {
      return [value.toSql()];
    }

    if (value instanceof SqlBuilder) {
      const offset = this.values.length;
      const nested = value.segments();
      this.values.push(...value.values);
      return nested.map(segment =>
        isParamRef(segment) ? { param: segment.param + offset } : segment
      );
    }

    if (Array.isArray(value)) {
      const items: unknown[] = value;
      const segments: Segment[] = [];
      items.forEach((item, index) => {
        if (index > 0) segments.push(', ');
        if (item instanceof SqlIdentifier) {
          segments.push(item.toSql());
        } else {
          segments.push(this.addValue(item));
        }
      });
      return segments;
    }

    return [this.addValue(value)];
  }

  private compile(format: string, args: unknown[]): Segment[] {
    const segments: Segment[] = [];
    const resolved = new Map<number, Segment[]>();
    let lastIndex = 0;

    for (const match of format.matchAll(PLACEHOLDER)) {
      const index = match.index ?? 0;
      segments.push(format.slice(lastIndex, index));
      lastIndex = index + match[0].length;

      if (match[0] === '{{') {
        segments.push('{');
        continue;
      }
      if (match[0] === '}}') {
        segments.push('}');
        continue;
      }

      const position = Number(match[1]);
      if (position >= args.length) {
        throw new QueryError(`Placeholder {${position}} has no matching argument in '${format}'`);
      }

      let argumentSegments = resolved.get(position);
      if (!argumentSegments) {
        argumentSegments = this.argumentSegments(args[position]);
        resolved.set(position, argumentSegments);
      }
      segments.push(...argumentSegments);
    }

    segments.push(format.slice(lastIndex));
    return segments.filter(segment => segment !== '');
  }

  /**
   * The statement as text and parameter references, lines joined by newlines.
   */
  private segments(): Segment[] {
    const result: Segment[] = [];
    let first = true;

    for (const line of this.lines) {
      // A clause opened without fragments (WHERE() followed by no _IF hits).
      if (line.items.length === 0) {
        continue;
      }
      if (!first) result.push('\n');
      first = false;

      if (line.keyword !== '') {
        result.push(line.keyword);
      }
      line.items.forEach((item, index) => {
        if (index === 0) {
          if (line.keyword !== '') result.push(' ');
        } else {
          result.push(item.joiner);
        }
        result.push(...item.segments);
      });
    }

    return result;
  }

  private render(): { sql: string; values: unknown[] } {
    if (this.rendered) {
      return this.rendered;
    }

    const tokens = new Map<number, number>();
    const values: unknown[] = [];
    let sql = '';

    for (const segment of this.segments()) {
      if (!isParamRef(segment)) {
        sql += segment;
        continue;
      }
      let token = tokens.get(segment.param);
      if (token === undefined) {
        values.push(this.values[segment.param]);
        token = values.length;
        tokens.set(segment.param, token);
      }
      sql += `$${token}`;
    }

    this.rendered = { sql, values };
    return this.rendered;
  }

  // ----- generic appends -----

  /**
   * Append to the current clause.
   */
  _(format: string, ...args: unknown[]): this {
    const current = this.current;
    return this.appendClause(current?.keyword ?? '', current?.separator ?? null, format, args);
  }

  /**
   * Append to the current clause only when the condition holds.
   */
  _IF(condition: boolean, format: string, ...args: unknown[]): this {
    if (condition) {
      this._(format, ...args);
    }
    return this;
  }

  // ----- clauses -----

  WITH(format?: string, ...args: unknown[]): this;
  WITH(alias: string | SqlId, subQuery: SqlBuilder): this;
  WITH(first?: string | SqlId, ...args: unknown[]): this {
    const [subQuery] = args;
    if (subQuery instanceof SqlBuilder && args.length === 1) {
      if (typeof first === 'string' && hasPlaceholders(first)) {
        return this.appendClause('WITH', ',', first, args);
      }
      const alias = typeof first === 'string' ? new SqlId(first) : first;
      return this.appendClause('WITH', ',', '{0} AS ({1})', [alias, subQuery]);
    }
    if (first instanceof SqlId) {
      return this.appendClause('WITH', ',', '{0}', [first]);
    }
    return this.appendClause('WITH', ',', first, args);
  }

  SELECT(format?: string, ...args: unknown[]): this {
    return this.appendClause('SELECT', ',', format, args);
  }

  /**
   * A lone table name is wrapped as a schema-qualified table; a nested
   * builder becomes an aliased sub-select.
   */
  FROM(format?: string | SqlTable, ...args: unknown[]): this;
  FROM(subQuery: SqlBuilder, alias?: string): this;
  FROM(first?: string | SqlTable | SqlBuilder, ...args: unknown[]): this {
    if (first instanceof SqlBuilder) {
      const [alias] = args;
      const aliasId = new SqlId(typeof alias === 'string' && alias ? alias : 'subQuery');
      return this.appendClause('FROM', ',', '({0}) AS {1}', [first, aliasId]);
    }
    if (first instanceof SqlTable) {
      return this.appendClause('FROM', ',', '{0}', [first]);
    }
    if (typeof first === 'string' && args.length === 0 && TABLE_NAME.test(first)) {
      return this.appendClause('FROM', ',', '{0}', [this.table(first)]);
    }
    return this.appendClause('FROM', ',', first, args);
  }

  JOIN(format: string, ...args: unknown[]): this {
    return this.appendClause('JOIN', null, format, args);
  }

  LEFT_JOIN(format: string, ...args: unknown[]): this {
    return this.appendClause('LEFT JOIN', null, format, args);
  }

  RIGHT_JOIN(format: string, ...args: unknown[]): this {
    return this.appendClause('RIGHT JOIN', null, format, args);
  }

  INNER_JOIN(format: string, ...args: unknown[]): this {
    return this.appendClause('INNER JOIN', null, format, args);
  }

  /**
   * `WHERE(format, ...args)`, `WHERE(column, value)` or
   * `WHERE(column, operator, value)`. A null value in the two-argument form
   * renders `IS NULL`.
   */
  WHERE(format?: string, ...args: unknown[]): this;
  WHERE(column: string | SqlIdentifier, value: unknown): this;
  WHERE(column: string | SqlIdentifier, operator: ComparisonOperator, value: unknown): this;
  WHERE(first?: string | SqlIdentifier, ...args: unknown[]): this {
    return this.conditional('WHERE', first, args);
  }

  HAVING(format?: string, ...args: unknown[]): this {
    return this.appendClause('HAVING', 'AND', format, args);
  }

  private conditional(
    keyword: 'WHERE',
    first: string | SqlIdentifier | undefined,
    args: unknown[]
  ): this {
    if (first === undefined) {
      return this.appendClause(keyword, 'AND');
    }

    const isShortcut =
      first instanceof SqlIdentifier || (!hasPlaceholders(first) && args.length > 0);

    if (!isShortcut) {
      return this.appendClause(keyword, 'AND', first, args);
    }

    const column = first instanceof SqlIdentifier ? first : new SqlId(first);

    if (args.length === 1) {
      const [value] = args;
      if (value === null || value === undefined) {
        return this.appendClause(keyword, 'AND', '{0} IS NULL', [column]);
      }
      return this.appendClause(keyword, 'AND', '{0} = {1}', [column, value]);
    }

    const [operator, value] = args;
    if (args.length !== 2 || !isComparisonOperator(operator)) {
      throw new ValidationError(`Unsupported ${keyword} operator '${String(operator)}'`, 'operator');
    }

    const op = operator.trim().toUpperCase();
    if (value === null || value === undefined) {
      if (op === 'IS' || op === '=') {
        return this.appendClause(keyword, 'AND', '{0} IS NULL', [column]);
      }
      if (op === 'IS NOT' || op === '!=' || op === '<>') {
        return this.appendClause(keyword, 'AND', '{0} IS NOT NULL', [column]);
      }
    }
    if (op === 'IN' || op === 'NOT IN') {
      const list = Array.isArray(value) ? value : [value];
      if (list.length === 0) {
        return this.appendClause(keyword, 'AND', op === 'IN' ? 'FALSE' : 'TRUE');
      }
      return this.appendClause(keyword, 'AND', `{0} ${op} ({1})`, [column, list]);
    }
    return this.appendClause(keyword, 'AND', `{0} ${op} {1}`, [column, value]);
  }

  GROUP_BY(format?: string | SqlIdentifier, ...args: unknown[]): this {
    if (format instanceof SqlIdentifier) {
      return this.appendClause('GROUP BY', ',', '{0}', [format]);
    }
    if (typeof format === 'string' && args.length === 0 && PLAIN_IDENTIFIER.test(format)) {
      return this.appendClause('GROUP BY', ',', '{0}', [new SqlId(format)]);
    }
    return this.appendClause('GROUP BY', ',', format, args);
  }

  /**
   * `ORDER_BY(column, direction?)` quotes a plain column name; anything
   * else is taken as a fragment.
   */
  ORDER_BY(format?: string | SqlIdentifier, ...args: unknown[]): this {
    const [direction] = args;
    const columnShortcut =
      format instanceof SqlIdentifier ||
      (typeof format === 'string' && PLAIN_IDENTIFIER.test(format) && args.length <= 1);

    if (columnShortcut && (args.length === 0 || typeof direction === 'string')) {
      const column = format instanceof SqlIdentifier ? format : new SqlId(format ?? '');
      const suffix = typeof direction === 'string' ? ` ${normalizeDirection(direction)}` : '';
      return this.appendClause('ORDER BY', ',', `{0}${suffix}`, [column]);
    }

    return this.appendClause(
      'ORDER BY',
      ',',
      typeof format === 'string' ? format : undefined,
      args
    );
  }

  LIMIT(count: number): this {
    if (!Number.isInteger(count) || count < 0) {
      throw new ValidationError(`LIMIT must be a non-negative integer, got ${count}`, 'limit');
    }
    return this.appendClause('LIMIT', null, '{0}', [count]);
  }

  OFFSET(count: number): this {
    if (!Number.isInteger(count) || count < 0) {
      throw new ValidationError(`OFFSET must be a non-negative integer, got ${count}`, 'offset');
    }
    return this.appendClause('OFFSET', null, '{0}', [count]);
  }

  INSERT_INTO(format: string | SqlTable, ...args: unknown[]): this {
    return this.tableClause('INSERT INTO', format, args);
  }

  /**
   * Column list for INSERT INTO, continuing the current line.
   */
  COLS(...columns: Array<string | SqlId>): this {
    if (columns.length === 0) {
      throw new ValidationError('COLS needs at least one column', 'columns');
    }
    const ids = columns.map(column => (typeof column === 'string' ? new SqlId(column) : column));
    return this.appendClause('', null, '({0})', [ids]);
  }

  /**
   * One row of values. Consecutive calls add rows to the same VALUES list.
   */
  VALUES(...values: unknown[]): this {
    if (values.length === 0) {
      throw new ValidationError('VALUES needs at least one value', 'values');
    }
    return this.appendClause('VALUES', ',', '({0})', [values]);
  }

  ON_CONFLICT(format = 'DO NOTHING', ...args: unknown[]): this {
    return this.appendClause('ON CONFLICT', null, format, args);
  }

  RETURNING(format: string | SqlIdentifier = '*', ...args: unknown[]): this {
    if (format instanceof SqlIdentifier) {
      return this.appendClause('RETURNING', ',', '{0}', [format]);
    }
    if (args.length === 0 && PLAIN_IDENTIFIER.test(format)) {
      return this.appendClause('RETURNING', ',', '{0}', [new SqlId(format)]);
    }
    return this.appendClause('RETURNING', ',', format, args);
  }

  UPDATE(format: string | SqlTable, ...args: unknown[]): this {
    return this.tableClause('UPDATE', format, args);
  }

  /**
   * `SET(format, ...args)`, `SET(column, value)` or `SET({ column: value })`.
   */
  SET(format: string, ...args: unknown[]): this;
  SET(column: SqlIdentifier, value: unknown): this;
  SET(assignments: Record<string, unknown>): this;
  SET(first: string | SqlIdentifier | Record<string, unknown>, ...args: unknown[]): this {
    if (first instanceof SqlIdentifier) {
      return this.appendClause('SET', ',', '{0} = {1}', [first, args[0]]);
    }
    if (typeof first !== 'string') {
      for (const [column, value] of Object.entries(first)) {
        this.appendClause('SET', ',', '{0} = {1}', [new SqlId(column), value]);
      }
      return this;
    }
    if (!hasPlaceholders(first) && args.length === 1) {
      return this.appendClause('SET', ',', '{0} = {1}', [new SqlId(first), args[0]]);
    }
    return this.appendClause('SET', ',', first, args);
  }

  DELETE_FROM(format: string | SqlTable, ...args: unknown[]): this {
    return this.tableClause('DELETE FROM', format, args);
  }

  private tableClause(keyword: string, format: string | SqlTable, args: unknown[]): this {
    if (format instanceof SqlTable) {
      return this.appendClause(keyword, null, '{0}', [format]);
    }
    if (args.length === 0 && TABLE_NAME.test(format)) {
      return this.appendClause(keyword, null, '{0}', [this.table(format)]);
    }
    return this.appendClause(keyword, null, format, args);
  }

  // ----- execution -----

  private requireExecutor(): QueryExecutor {
    if (!this.executor) {
      throw new QueryError('No query executor is attached to this builder');
    }
    return this.executor;
  }

  private statement(): [string, QueryParameters] {
    const { sql, values } = this.render();
    return [sql, [...values]];
  }

  async rows(): Promise<RowRecord[]> {
    const executor = this.requireExecutor();
    return executor.rows(...this.statement());
  }

  async row(): Promise<RowRecord | null> {
    const rows = await this.rows();
    return rows[0] ?? null;
  }

  async scalar(): Promise<unknown> {
    const executor = this.requireExecutor();
    return executor.scalar(...this.statement());
  }

  async execute(): Promise<number> {
    const executor = this.requireExecutor();
    return executor.execute(...this.statement());
  }

  stream(): AsyncIterable<RowRecord> {
    const executor = this.requireExecutor();
    return executor.stream(...this.statement());
  }
}

export default SqlBuilder;
