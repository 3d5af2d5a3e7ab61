/**
 * Query builder utilities for constructing dynamic SQL queries.
 *
 * Column names are always supplied by our own code; only values are bound
 * as parameters.
 */

export type SqlValue = string | number | bigint | null;

/**
 * Result from building a filter query
 */
export interface FilterResult {
  /** WHERE clause (empty string if no conditions) */
  whereClause: string;
  /** Ordered parameter values for binding */
  params: SqlValue[];
}

/**
 * Fluent builder for constructing dynamic WHERE clauses.
 *
 * @example
 * const { whereClause, params } = filter()
 *   .equals('ip_address', ipAddress)
 *   .like('name', search ? `%${escapeLike(search)}%` : undefined)
 *   .build();
 *
 * db.prepare(`SELECT * FROM servers ${whereClause}`).all(...params);
 */
export class FilterBuilder {
  private conditions: string[] = [];
  private params: SqlValue[] = [];

  /**
   * Add an equality condition: field = ?
   * Undefined values are skipped.
   */
  equals(field: string, value: SqlValue | undefined): this {
    if (value !== undefined) {
      this.conditions.push(`${field} = ?`);
      this.params.push(value);
    }
    return this;
  }

  /**
   * Add a LIKE condition: field LIKE ? ESCAPE '\'
   * @param pattern LIKE pattern (caller should include % wildcards)
   */
  like(field: string, pattern: string | undefined): this {
    if (pattern) {
      this.conditions.push(`${field} LIKE ? ESCAPE '\\'`);
      this.params.push(pattern);
    }
    return this;
  }

  /**
   * Build the WHERE clause and parameters.
   * Returns empty whereClause if no conditions were added.
   */
  build(): FilterResult {
    if (this.conditions.length === 0) {
      return { whereClause: '', params: [] };
    }
    return {
      whereClause: `WHERE ${this.conditions.join(' AND ')}`,
      params: [...this.params],
    };
  }
}

export function filter(): FilterBuilder {
  return new FilterBuilder();
}

/**
 * Escape LIKE wildcards so user input matches literally.
 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * Builder for constructing UPDATE SET clauses.
 *
 * @example
 * const builder = update().set('name', name);
 * if (builder.hasUpdates) {
 *   const { setClause, params } = builder.setRaw('updated_at', 'CURRENT_TIMESTAMP').build();
 * }
 */
export class UpdateBuilder {
  private fields: string[] = [];
  private params: SqlValue[] = [];

  /**
   * Add a field to update: field = ?
   * Undefined values are skipped.
   */
  set(field: string, value: SqlValue | undefined): this {
    if (value !== undefined) {
      this.fields.push(`${field} = ?`);
      this.params.push(value);
    }
    return this;
  }

  /**
   * Add a raw field update without parameter binding.
   * Use for SQL functions like CURRENT_TIMESTAMP.
   */
  setRaw(field: string, rawValue: string): this {
    this.fields.push(`${field} = ${rawValue}`);
    return this;
  }

  get hasUpdates(): boolean {
    return this.fields.length > 0;
  }

  build(): { setClause: string; params: SqlValue[] } {
    return {
      setClause: this.fields.join(', '),
      params: [...this.params],
    };
  }
}

export function update(): UpdateBuilder {
  return new UpdateBuilder();
}
