import { readFile } from 'fs/promises';
import * as path from 'path';
import Papa from 'papaparse';
import * as XLSX from 'xlsx';
import { RawTable } from '../types';
import { LoadError, describeCause } from './errors';
import { isBlankRow, tableFromMatrix, toCell } from './tableUtils';

export type CsvSeparator = ',' | ';';

/** Decode as UTF-8, falling back to Latin-1 for exports from older spreadsheet tools. */
export const decodeCsvBuffer = (buffer: Buffer): string => {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(buffer);
  } catch {
    console.warn('CSV is not valid UTF-8, decoding as Latin-1');
    return buffer.toString('latin1');
  }
};

const countOf = (text: string, char: string): number => text.split(char).length - 1;

export const detectSeparator = (text: string): CsvSeparator =>
  countOf(text, ',') > countOf(text, ';') ? ',' : ';';

export const parseCsvText = (text: string, delimiter: CsvSeparator = detectSeparator(text)): RawTable => {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    delimiter,
    skipEmptyLines: 'greedy',
  });

  const fatal = result.errors.filter(e => e.type !== 'FieldMismatch');
  if (fatal.length > 0) {
    const first = fatal[0];
    throw new LoadError(`CSV parse error on row ${first.row ?? '?'}: ${first.message}`);
  }
  result.errors.forEach(e => {
    console.warn(`CSV row ${e.row ?? '?'}: ${e.message}`);
  });

  const columns = result.meta.fields ?? [];
  // Delimiter-only lines are blank rows, as in workbooks
  const rows = result.data
    .filter(record => !isBlankRow(columns.map(col => record[col])))
    .map(record => {
      const row: RawTable['rows'][number] = {};
      columns.forEach(col => {
        row[col] = toCell(record[col]);
      });
      return row;
    });

  return { columns, rows };
};

export const parseCsvBuffer = (buffer: Buffer): RawTable => parseCsvText(decodeCsvBuffer(buffer));

export const parseWorkbookBuffer = (buffer: Buffer): RawTable => {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const sheetName = workbook.SheetNames[0];
  if (!sheetName) {
    throw new LoadError('Workbook has no worksheets');
  }

  const matrix = XLSX.utils.sheet_to_json<unknown[]>(workbook.Sheets[sheetName], {
    header: 1,
    defval: null,
    blankrows: false,
  });
  return tableFromMatrix(matrix);
};

/** Read a .csv, .xlsx or .xls survey export into a raw table. */
export const loadSurveyFile = async (filePath: string): Promise<RawTable> => {
  const ext = path.extname(filePath).toLowerCase();
  if (ext !== '.csv' && ext !== '.xlsx' && ext !== '.xls') {
    throw new LoadError(`Unsupported file type "${ext || filePath}". Use a CSV or Excel file.`);
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    throw new LoadError(`Could not read ${filePath}: ${describeCause(error)}`, { cause: error });
  }

  try {
    return ext === '.csv' ? parseCsvBuffer(buffer) : parseWorkbookBuffer(buffer);
  } catch (error) {
    if (error instanceof LoadError) throw error;
    console.error('Survey file parse error:', error);
    throw new LoadError(`Could not parse ${path.basename(filePath)}: ${describeCause(error)}`, { cause: error });
  }
};
