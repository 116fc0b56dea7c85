import { ALL_COURSES, FIELD, RANK_FIELDS, SORT_LOCALE } from '../constants';
import { ChoiceTotal, Count, DemandRow, DistributionRow, LongRow, RankLabel, RawTable } from '../types';
import { excludeDenylisted, expandField } from './expansion';
import { cellText } from './tableUtils';

/**
 * Count rows per key. Sorted by descending count; equal counts keep the order in
 * which their key first appeared. Rows whose key is null are not counted.
 */
export const countBy = <T>(rows: T[], key: (row: T) => string | null): Count[] => {
  const counts = new Map<string, number>();

  rows.forEach(row => {
    const k = key(row);
    if (k === null) return;
    counts.set(k, (counts.get(k) ?? 0) + 1);
  });

  return Array.from(counts, ([k, count]) => ({ key: k, count })).sort((a, b) => b.count - a.count);
};

export const toDistribution = (counts: Count[]): DistributionRow[] => {
  const total = counts.reduce((acc, c) => acc + c.count, 0);
  if (total === 0) return [];

  return counts.map(c => ({
    label: c.key,
    count: c.count,
    percentage: (100 * c.count) / total,
  }));
};

export const choiceTotals = (rows: LongRow[]): ChoiceTotal[] =>
  countBy(rows, row => row.choice).map(c => ({ choice: c.key, count: c.count }));

/** Demand per (choice, rank), ordered by the choice's total demand and then by rank. */
export const demandByChoice = (rows: LongRow[]): DemandRow[] => {
  const byChoice = new Map<string, Map<RankLabel, number>>();

  rows.forEach(row => {
    let ranks = byChoice.get(row.choice);
    if (!ranks) {
      ranks = new Map<RankLabel, number>();
      byChoice.set(row.choice, ranks);
    }
    ranks.set(row.rank, (ranks.get(row.rank) ?? 0) + 1);
  });

  const result: DemandRow[] = [];
  choiceTotals(rows).forEach(({ choice }) => {
    const ranks = byChoice.get(choice);
    if (!ranks) return;
    RANK_FIELDS.forEach(rank => {
      const count = ranks.get(rank);
      if (count !== undefined) result.push({ choice, rank, count });
    });
  });

  return result;
};

export const availabilityDistribution = (rows: LongRow[]): DistributionRow[] =>
  toDistribution(countBy(expandField(rows, 'availability'), row => row.availability));

export const motivationDistribution = (rows: LongRow[]): DistributionRow[] =>
  toDistribution(countBy(excludeDenylisted(expandField(rows, 'motivation')), row => row.motivation));

export const filterByCourse = (rows: LongRow[], course: string = ALL_COURSES): LongRow[] =>
  course === ALL_COURSES ? rows : rows.filter(row => row.course === course);

export const filterByChoice = (rows: LongRow[], choice: string): LongRow[] =>
  rows.filter(row => row.choice === choice);

const sortedUnique = (values: Array<string | null>): string[] => {
  const unique = new Set<string>();
  values.forEach(v => {
    if (v !== null) unique.add(v);
  });
  return Array.from(unique).sort((a, b) => a.localeCompare(b, SORT_LOCALE));
};

export const courseOptions = (table: RawTable): string[] => [
  ALL_COURSES,
  ...sortedUnique(table.rows.map(row => cellText(row[FIELD.course]))),
];

export const topicOptions = (rows: LongRow[]): string[] => sortedUnique(rows.map(row => row.choice));
