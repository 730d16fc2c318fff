import type {
  InfoMap,
  InfoValue,
  Metric,
  StatementRow,
  StatementTable,
} from '@/types/metrics';

export interface ResolvedRow {
  /** Matched line item, or null when the zero row was substituted. */
  key: string | null;
  values: StatementRow;
}

const ZERO_ROW: StatementRow = Object.freeze([0]);

export function isAvailable(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Returns the first line item present in the table, trying aliases in order.
 * A table without any of them yields a single-period zero row, so a missing
 * line item reads as 0 rather than as unavailable.
 */
export function resolveRow(table: StatementTable, aliases: readonly string[]): ResolvedRow {
  for (const alias of aliases) {
    if (Object.prototype.hasOwnProperty.call(table.rows, alias)) {
      return { key: alias, values: table.rows[alias] };
    }
  }
  return { key: null, values: ZERO_ROW };
}

/**
 * Most recent usable value of a row, or the scalar itself.
 */
export function latest(input: StatementRow | InfoValue | undefined): Metric {
  if (Array.isArray(input)) {
    for (const value of input) {
      if (isAvailable(value)) return value;
    }
    return null;
  }
  return isAvailable(input) ? input : null;
}

export function latestOf(table: StatementTable, aliases: readonly string[]): Metric {
  return latest(resolveRow(table, aliases).values);
}

export function infoNumber(info: InfoMap, keys: readonly string[]): Metric {
  for (const key of keys) {
    const value = latest(info[key]);
    if (value !== null) return value;
  }
  return null;
}

export function infoText(info: InfoMap, keys: readonly string[]): string | null {
  for (const key of keys) {
    const value = info[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return null;
}

export function isEmptyTable(table: StatementTable): boolean {
  return table.periods.length === 0 || Object.keys(table.rows).length === 0;
}
