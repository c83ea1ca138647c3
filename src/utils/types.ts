/**
 * Shared value types for tool results and store rows
 */

export type SqlValue = string | number | null;

/** One result row, columns in select order. */
export type Row = Record<string, SqlValue>;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

// Tool response interfaces
export type ToolResult = { [key: string]: JsonValue };

export function isSqlValue(value: unknown): value is SqlValue {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

export function isRow(value: unknown): value is Row {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isSqlValue);
}
