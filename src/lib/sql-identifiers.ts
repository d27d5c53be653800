/**
 * Identifier wrappers. PostgreSQL cannot bind identifiers as parameters, so
 * these are inlined into the statement text already quoted.
 */

export const quoteIdentifier = (name: string): string => `"${name.replace(/"/g, '""')}"`;

const quotePath = (path: string): string =>
  path
    .split('.')
    .filter(segment => segment.length > 0)
    .map(quoteIdentifier)
    .join('.');

export abstract class SqlIdentifier {
  abstract toSql(): string;

  toString(): string {
    return this.toSql();
  }
}

/**
 * A bare identifier. Dotted names are quoted segment by segment.
 */
export class SqlId extends SqlIdentifier {
  readonly name: string;

  constructor(name: string) {
    super();
    this.name = name;
  }

  toSql(): string {
    return quotePath(this.name);
  }
}

/**
 * A table reference, qualified by schema when one is set.
 */
export class SqlTable extends SqlIdentifier {
  readonly table: string;
  readonly schema: string | null;

  constructor(table: string, schema: string | null = null) {
    super();
    this.table = table;
    this.schema = schema;
  }

  toSql(): string {
    const table = quoteIdentifier(this.table);
    return this.schema ? `${quoteIdentifier(this.schema)}.${table}` : table;
  }
}

/**
 * A column qualified by its table (and the table's schema).
 */
export class SqlColumn extends SqlIdentifier {
  readonly table: SqlTable;
  readonly column: string;

  constructor(table: SqlTable | string, column: string, schema: string | null = null) {
    super();
    this.table = typeof table === 'string' ? new SqlTable(table, schema) : table;
    this.column = column;
  }

  toSql(): string {
    return `${this.table.toSql()}.${quoteIdentifier(this.column)}`;
  }
}
