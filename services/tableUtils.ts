import { CellValue, RawTable } from '../types';

export const toCell = (value: unknown): CellValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (value instanceof Date) return value;
  return String(value);
};

// Trimmed text of a cell, null when there is nothing in it
export const cellText = (value: CellValue | undefined): string | null => {
  if (value === null || value === undefined) return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'number' && Number.isNaN(value)) return null;

  const text = String(value).trim();
  return text.length > 0 ? text : null;
};

export const isBlankRow = (values: unknown[]): boolean =>
  values.every(v => cellText(toCell(v)) === null);

/**
 * Build a table from a header row followed by data rows, as returned by
 * spreadsheet readers. Short rows are padded with nulls; blank rows are skipped.
 */
export const tableFromMatrix = (matrix: unknown[][]): RawTable => {
  if (matrix.length === 0) return { columns: [], rows: [] };

  const [header, ...body] = matrix;
  const columns = header.map(h => (h === null || h === undefined ? '' : String(h)));

  const rows = body
    .filter(values => !isBlankRow(values))
    .map(values => {
      const row: Record<string, CellValue> = {};
      columns.forEach((col, idx) => {
        row[col] = toCell(values[idx]);
      });
      return row;
    });

  return { columns, rows };
};
