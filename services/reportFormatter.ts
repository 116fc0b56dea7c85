import Papa from 'papaparse';
import { DistributionRow, ReportSection, SurveyReport } from '../types';

const REPORT_TITLE = 'Course demand report';
const BOM = '\uFEFF';

export const formatTable = (headers: string[], rows: string[][]): string[] => {
  const widths = headers.map((h, idx) => Math.max(h.length, ...rows.map(r => (r[idx] ?? '').length)));
  const line = (cells: string[]) =>
    cells
      .map((cell, idx) => (idx === cells.length - 1 ? cell : cell.padEnd(widths[idx])))
      .join('  ');

  return [line(headers), ...rows.map(line)];
};

const formatPercentage = (value: number): string => `${value.toFixed(1)}%`;

const distributionLines = (title: string, labelHeader: string, part: ReportSection<DistributionRow>): string[] => {
  if (part.rows.length === 0) {
    return [title, part.notice ?? 'Nothing to show.'];
  }
  return [
    title,
    ...formatTable(
      [labelHeader, 'Count', 'Share'],
      part.rows.map(r => [r.label, String(r.count), formatPercentage(r.percentage)])
    ),
  ];
};

/** Plain-text rendition of a report, one table per section. */
export const formatReport = (report: SurveyReport): string => {
  const { filter, summary, demand } = report;
  const topic = filter.topic ?? '-';

  const demandLines =
    demand.rows.length === 0
      ? [demand.notice ?? 'Nothing to show.']
      : formatTable(
          ['Topic', 'Priority', 'Count'],
          demand.rows.map(r => [r.choice, r.rank, String(r.count)])
        );

  const lines = [
    REPORT_TITLE,
    `Course: ${filter.course} | Topic: ${topic}`,
    `Respondents: ${summary.respondents} | Manifestations: ${summary.manifestations} | Topics: ${summary.topics} | Courses: ${summary.courses}`,
    '',
    '1. Demand by topic and priority',
    ...demandLines,
    '',
    ...distributionLines(`2. Availability for ${topic}`, 'Shift', report.availability),
    '',
    ...distributionLines(`3. Motivations for ${topic}`, 'Motivation', report.motivation),
  ];

  return lines.join('\n');
};

/** CSV export with a UTF-8 BOM so spreadsheet tools pick up the encoding. */
export const reportToCsv = (report: SurveyReport): string => {
  const unparse = (rows: Array<Array<string | number>>) => Papa.unparse(rows, { newline: '\n' });
  const topic = report.filter.topic ?? '';

  const summary = unparse([
    ['Course', report.filter.course],
    ['Topic', topic],
    ['Respondents', report.summary.respondents],
    ['Manifestations', report.summary.manifestations],
    ['Topics', report.summary.topics],
    ['Courses', report.summary.courses],
  ]);
  const demand = unparse([
    ['Topic', 'Priority', 'Count'],
    ...report.demand.rows.map(r => [r.choice, r.rank, r.count]),
  ]);
  const distribution = (labelHeader: string, rows: DistributionRow[]) =>
    unparse([[labelHeader, 'Count', 'Percentage'], ...rows.map(r => [r.label, r.count, r.percentage.toFixed(2)])]);

  return [
    BOM + REPORT_TITLE,
    '',
    '1. Summary',
    summary,
    '',
    '2. Demand by topic and priority',
    demand,
    '',
    '3. Availability',
    distribution('Shift', report.availability.rows),
    '',
    '4. Motivations',
    distribution('Motivation', report.motivation.rows),
    '',
  ].join('\n');
};
