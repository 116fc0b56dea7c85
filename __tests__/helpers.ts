import Papa from 'papaparse';
import { COLUMN_MAP, FIELD } from '../constants';
import { CellValue, RawTable } from '../types';

export const headerFor = (field: string): string => {
  const entry = Object.entries(COLUMN_MAP).find(([, name]) => name === field);
  if (!entry) throw new Error(`No form header for ${field}`);
  return entry[0];
};

export interface Respondent {
  course?: CellValue;
  enrollmentId?: CellValue;
  choices: CellValue[];
  availability?: CellValue;
  motivation?: CellValue;
}

const SURVEY_FIELDS = [
  FIELD.course,
  FIELD.enrollmentId,
  FIELD.priority1,
  FIELD.priority2,
  FIELD.priority3,
  FIELD.availability,
  FIELD.motivation,
];

/** A raw table with the form's own question headers. */
export const rawSurvey = (respondents: Respondent[]): RawTable => {
  const columns = SURVEY_FIELDS.map(headerFor);
  const rows = respondents.map(r => {
    const values: CellValue[] = [
      r.course ?? null,
      r.enrollmentId ?? null,
      r.choices[0] ?? null,
      r.choices[1] ?? null,
      r.choices[2] ?? null,
      r.availability ?? null,
      r.motivation ?? null,
    ];
    const row: Record<string, CellValue> = {};
    columns.forEach((col, idx) => {
      row[col] = values[idx];
    });
    return row;
  });
  return { columns, rows };
};

export const surveyCsv = (table: RawTable): string =>
  Papa.unparse({
    fields: table.columns,
    data: table.rows.map(row => table.columns.map(col => row[col] ?? '')),
  });

export const scenarioRespondents: Respondent[] = [
  {
    course: 'Engineering',
    enrollmentId: '1',
    choices: ['Calculus', 'Physics', '-'],
    availability: 'Morning, Evening',
    motivation: 'Failed before, Outros',
  },
  {
    course: 'Medicine',
    enrollmentId: '2',
    choices: ['Physics', 'Calculus', ''],
    availability: 'Evening',
    motivation: 'Graduate sooner',
  },
  {
    course: 'Engineering',
    enrollmentId: '3',
    choices: ['Calculus', null, null],
    availability: '',
    motivation: 'outros',
  },
];
