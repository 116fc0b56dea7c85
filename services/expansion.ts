import { MOTIVATION_DENYLIST } from '../constants';
import { LongRow, PackedField } from '../types';

const SELECTION_DELIMITER = /,\s*/;

export const splitSelections = (value: string | null): string[] => {
  if (value === null) return [];
  return value
    .split(SELECTION_DELIMITER)
    .map(label => label.trim())
    .filter(label => label.length > 0);
};

const withField = (row: LongRow, field: PackedField, label: string): LongRow =>
  field === 'availability' ? { ...row, availability: label } : { ...row, motivation: label };

/** One output row per label packed into `field`, with the field replaced by that label. */
export const expandField = (rows: LongRow[], field: PackedField): LongRow[] =>
  rows.flatMap(row => splitSelections(row[field]).map(label => withField(row, field, label)));

export const excludeDenylisted = (
  rows: LongRow[],
  field: PackedField = 'motivation',
  denylist: readonly string[] = MOTIVATION_DENYLIST
): LongRow[] => {
  const blocked = new Set(denylist.map(entry => entry.toLowerCase()));
  return rows.filter(row => {
    const value = row[field];
    return value === null || !blocked.has(value.toLowerCase());
  });
};
