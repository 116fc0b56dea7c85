import { EMPTY_CHOICE_MARKERS, FIELD, RANK_FIELDS } from '../constants';
import { LongRow, RawTable } from '../types';
import { cellText } from './tableUtils';

/**
 * Stack the three ranked choice columns into one `choice` column.
 * Output is grouped by rank (all rank 1 rows, then rank 2, then rank 3) and keeps
 * input order within each group. Empty choices produce no row.
 */
export const toLongFormat = (table: RawTable): LongRow[] => {
  const result: LongRow[] = [];

  RANK_FIELDS.forEach(rank => {
    table.rows.forEach(row => {
      const choice = cellText(row[rank]);
      if (choice === null || EMPTY_CHOICE_MARKERS.includes(choice)) return;

      result.push({
        course: cellText(row[FIELD.course]),
        enrollmentId: cellText(row[FIELD.enrollmentId]),
        availability: cellText(row[FIELD.availability]),
        motivation: cellText(row[FIELD.motivation]),
        rank,
        choice,
      });
    });
  });

  return result;
};
