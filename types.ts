import { RANK_FIELDS } from './constants';

export type CellValue = string | number | boolean | Date | null;

export type RawRow = Record<string, CellValue>;

export interface RawTable {
  columns: string[]; // header order of the source
  rows: RawRow[];
}

export type RankLabel = typeof RANK_FIELDS[number];

export interface NormalizationResult {
  table: RawTable;
  missing: string[];
}

export interface LongRow {
  course: string | null;
  enrollmentId: string | null;
  availability: string | null;
  motivation: string | null;
  rank: RankLabel;
  choice: string;
}

export type PackedField = 'availability' | 'motivation';

export interface ProcessedSurvey {
  normalized: RawTable;
  long: LongRow[];
}

export interface Count {
  key: string;
  count: number;
}

export interface DemandRow {
  choice: string;
  rank: RankLabel;
  count: number;
}

export interface ChoiceTotal {
  choice: string;
  count: number;
}

export interface DistributionRow {
  label: string;
  count: number;
  percentage: number; // 0-100
}

export enum SectionStatus {
  READY = 'READY',
  EMPTY = 'EMPTY',
}

export interface ReportSection<T> {
  status: SectionStatus;
  rows: T[];
  notice?: string;
}

export interface ReportFilter {
  course: string;
  topic: string | null;
}

export interface SurveySummary {
  respondents: number;
  manifestations: number;
  topics: number;
  courses: number;
}

export interface SurveyReport {
  filter: ReportFilter;
  summary: SurveySummary;
  demand: ReportSection<DemandRow>;
  totals: ChoiceTotal[];
  availability: ReportSection<DistributionRow>;
  motivation: ReportSection<DistributionRow>;
}

export interface SheetConnection {
  name: string;
  spreadsheetId: string;
  range: string;
}
