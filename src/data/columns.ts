import type { DatasetColumn } from '../types';

export type RawValue = number | string | null;

// Tokens read as missing values
const MISSING_TOKENS = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

const NUMERIC_PATTERN = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;
const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:\d{2})?)?$/;

export function isMissingToken(cell: string): boolean {
  return MISSING_TOKENS.has(cell.trim());
}

/**
 * Numeric-looking text cells become numbers when the whole column is numeric.
 */
export function coerceTextCells(cells: (string | null)[]): RawValue[] {
  const numeric = cells.every((cell) => cell === null || NUMERIC_PATTERN.test(cell.trim()));
  if (!numeric) {
    return cells;
  }
  return cells.map((cell) => (cell === null ? null : Number(cell.trim())));
}

/**
 * Parse an ISO-8601 date or datetime. Naive datetimes are read as UTC.
 */
export function parseIsoDate(text: string): Date | null {
  if (!ISO_DATE_PATTERN.test(text)) {
    return null;
  }
  let normalized = text.replace(' ', 'T');
  if (normalized.includes('T') && !/(?:Z|[+-]\d{2}:\d{2})$/.test(normalized)) {
    normalized += 'Z';
  }
  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Classify a column once, at load time. The kind travels with the dataset
 * and is never re-derived.
 */
export function buildColumn(name: string, values: RawValue[]): DatasetColumn {
  const present = values.filter((value): value is number | string => value !== null);

  if (present.every((value) => typeof value === 'number')) {
    return {
      name,
      kind: 'numeric',
      values: values.map((value) => (typeof value === 'number' ? value : null)),
    };
  }

  if (present.every((value) => typeof value === 'string')) {
    const dates = values.map((value) => (typeof value === 'string' ? parseIsoDate(value) : null));
    const temporal = dates.every((date, index) => date !== null || values[index] === null);
    if (temporal) {
      return { name, kind: 'temporal', values: dates };
    }
    return {
      name,
      kind: 'textual',
      values: values.map((value) => (typeof value === 'string' ? value : null)),
    };
  }

  return { name, kind: 'mixed', values };
}
