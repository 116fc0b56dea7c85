import { COLUMN_MAP, REQUIRED_FIELDS } from '../constants';
import { NormalizationResult, RawRow, RawTable } from '../types';

/**
 * Rename long question headers to canonical field names.
 * Columns not found in the map keep their original header.
 */
export const renameColumns = (table: RawTable, map: Readonly<Record<string, string>> = COLUMN_MAP): RawTable => {
  const rename = (col: string): string =>
    Object.prototype.hasOwnProperty.call(map, col) ? map[col] : col;

  const columns = table.columns.map(rename);
  const rows = table.rows.map(row => {
    const renamed: RawRow = {};
    table.columns.forEach(col => {
      renamed[rename(col)] = col in row ? row[col] : null;
    });
    return renamed;
  });

  return { columns, rows };
};

export const findMissingFields = (columns: string[], required: readonly string[] = REQUIRED_FIELDS): string[] => {
  const present = new Set(columns);
  return required.filter(field => !present.has(field));
};

export const normalizeColumns = (
  table: RawTable,
  map: Readonly<Record<string, string>> = COLUMN_MAP,
  required: readonly string[] = REQUIRED_FIELDS
): NormalizationResult => {
  const normalized = renameColumns(table, map);
  return {
    table: normalized,
    missing: findMissingFields(normalized.columns, required),
  };
};

export const isValid = (result: NormalizationResult): boolean => result.missing.length === 0;
