import type { CellValue } from './table.types.js';

const NUMERIC_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?$/;

export const isBlankCell = (value: CellValue | undefined): boolean =>
  value === null || value === undefined || (typeof value === 'string' && value.trim() === '');

/**
 * Converts a cell to a number, or `null` when the value is blank or not numeric.
 * Strings are trimmed first, so `" 12 "` becomes `12`.
 */
export const toNullableNumber = (value: CellValue | undefined): number | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
};

export const toNullableInteger = (value: CellValue | undefined): number | null => {
  const parsed = toNullableNumber(value);
  return parsed === null ? null : Math.trunc(parsed);
};

export const cellToText = (value: CellValue | undefined): string => {
  if (value === null || value === undefined) {
    return '';
  }
  return typeof value === 'number' ? `${value}` : value;
};
