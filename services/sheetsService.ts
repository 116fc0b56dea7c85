import { google } from 'googleapis';
import { DEFAULT_SHEET_RANGE } from '../constants';
import { RawTable, SheetConnection } from '../types';
import { LoadError, describeCause } from './errors';
import { tableFromMatrix } from './tableUtils';

export type SheetValuesReader = (spreadsheetId: string, range: string) => Promise<unknown[][]>;

const envPrefix = (name: string): string => `SHEETS_${name.toUpperCase().replace(/[^A-Z0-9]/g, '_')}`;

/**
 * Look up a named sheet connection in the environment:
 * SHEETS_<NAME>_ID (required) and SHEETS_<NAME>_RANGE.
 */
export const resolveSheetConnection = (
  name: string,
  env: Record<string, string | undefined> = process.env
): SheetConnection => {
  const prefix = envPrefix(name);
  const spreadsheetId = env[`${prefix}_ID`]?.trim();
  if (!spreadsheetId) {
    throw new LoadError(`Sheet connection "${name}" is not configured. Set ${prefix}_ID.`);
  }

  return {
    name,
    spreadsheetId,
    range: env[`${prefix}_RANGE`]?.trim() || DEFAULT_SHEET_RANGE,
  };
};

// Credentials come from Application Default Credentials (GOOGLE_APPLICATION_CREDENTIALS)
export const readSheetValues: SheetValuesReader = async (spreadsheetId, range) => {
  const auth = new google.auth.GoogleAuth({
    scopes: ['https://www.googleapis.com/auth/spreadsheets.readonly'],
  });
  const sheets = google.sheets({ version: 'v4', auth });
  const res = await sheets.spreadsheets.values.get({ spreadsheetId, range });
  return res.data.values ?? [];
};

export const fetchSheetTable = async (
  connection: SheetConnection,
  readValues: SheetValuesReader = readSheetValues
): Promise<RawTable> => {
  let values: unknown[][];
  try {
    values = await readValues(connection.spreadsheetId, connection.range);
  } catch (error) {
    console.error(`[sheets:${connection.name}]`, error);
    throw new LoadError(`Could not fetch sheet "${connection.name}": ${describeCause(error)}`, { cause: error });
  }

  return tableFromMatrix(values);
};
