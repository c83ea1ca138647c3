import type { SqlValue } from '../utils/types.js';

/** Wraps a value for a case-insensitive substring LIKE, escaping `%`, `_` and `\`. */
export function containsPattern(value: string): string {
  return `%${value.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
}

/**
 * Collects conjunctive predicates with their positional parameters. Each
 * method appends the predicate and its values together, so placeholders and
 * parameters always line up.
 */
export class FilterBuilder {
  private readonly predicates: string[] = [];
  readonly params: SqlValue[] = [];

  /** Exact match; skipped when the value is absent. */
  equals(column: string, value: string | number | undefined): this {
    if (value !== undefined) {
      this.predicates.push(`${column} = ?`);
      this.params.push(value);
    }
    return this;
  }

  /** Substring match against any of the columns; skipped when absent. */
  contains(columns: string | string[], value: string | undefined): this {
    if (value !== undefined) {
      const list = Array.isArray(columns) ? columns : [columns];
      const pattern = containsPattern(value);
      const predicate = list.map((column) => `${column} LIKE ? ESCAPE '\\'`).join(' OR ');
      this.predicates.push(list.length > 1 ? `(${predicate})` : predicate);
      for (let i = 0; i < list.length; i++) {
        this.params.push(pattern);
      }
    }
    return this;
  }

  atLeast(column: string, value: number | undefined): this {
    if (value !== undefined) {
      this.predicates.push(`${column} >= ?`);
      this.params.push(value);
    }
    return this;
  }

  atMost(column: string, value: number | undefined): this {
    if (value !== undefined) {
      this.predicates.push(`${column} <= ?`);
      this.params.push(value);
    }
    return this;
  }

  /** `WHERE a AND b`, or an empty string when nothing was added. */
  where(): string {
    return this.predicates.length > 0 ? `WHERE ${this.predicates.join(' AND ')}` : '';
  }
}
