#!/usr/bin/env node
import 'dotenv/config';
import { RawTable } from './types';
import { courseOptions, topicOptions } from './services/aggregation';
import { LoadError, SchemaError } from './services/errors';
import { loadSurveyFile } from './services/fileLoader';
import { formatReport, reportToCsv } from './services/reportFormatter';
import { buildSurveyReport } from './services/reportService';
import { fetchSheetTable, resolveSheetConnection } from './services/sheetsService';
import { SurveyPipeline } from './services/surveyPipeline';

export type OutputFormat = 'text' | 'csv';

export interface CliOptions {
  file?: string;
  sheet?: string;
  course?: string;
  topic?: string;
  format: OutputFormat;
  listOptions: boolean;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const USAGE = `Usage: course-demand-report (--file=<survey.csv|survey.xlsx> | --sheet=<connection>) [options]

Options:
  --course=<name>      Restrict the demand table to one course (default: all courses)
  --topic=<name>       Topic for the availability and motivation details (default: first topic)
  --format=text|csv    Output format (default: text)
  --list               Print the available courses and topics instead of the report
  --help               Show this message`;

const FLAGS = new Set(['list', 'help']);
const VALUE_OPTIONS = new Set(['file', 'sheet', 'course', 'topic', 'format']);

export const parseCliArgs = (argv: string[]): CliOptions | 'help' => {
  const values = new Map<string, string>();
  const flags = new Set<string>();

  argv.forEach(arg => {
    if (!arg.startsWith('--')) {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
    const eq = arg.indexOf('=');
    const key = eq === -1 ? arg.slice(2) : arg.slice(2, eq);

    if (FLAGS.has(key) && eq === -1) {
      flags.add(key);
    } else if (VALUE_OPTIONS.has(key) && eq !== -1) {
      values.set(key, arg.slice(eq + 1));
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  });

  if (flags.has('help')) return 'help';

  const file = values.get('file');
  const sheet = values.get('sheet');
  if (!file && !sheet) throw new UsageError('Provide a survey with --file or --sheet.');
  if (file && sheet) throw new UsageError('Use either --file or --sheet, not both.');

  const format = values.get('format') ?? 'text';
  if (format !== 'text' && format !== 'csv') {
    throw new UsageError(`Unknown format "${format}". Use text or csv.`);
  }

  return {
    file,
    sheet,
    course: values.get('course'),
    topic: values.get('topic'),
    format,
    listOptions: flags.has('list'),
  };
};

const loadRawTable = (options: CliOptions): Promise<RawTable> => {
  if (options.file) return loadSurveyFile(options.file);
  if (options.sheet) return fetchSheetTable(resolveSheetConnection(options.sheet));
  return Promise.reject(new UsageError('Provide a survey with --file or --sheet.'));
};

/** Runs one report and returns the text to print. */
export const runReport = async (options: CliOptions, pipeline: SurveyPipeline = new SurveyPipeline()): Promise<string> => {
  const verbose = options.format === 'text' && !options.listOptions;
  if (verbose) console.info(`Loading survey from ${options.file ?? `sheet connection "${options.sheet}"`}...`);

  const raw = await loadRawTable(options);
  const survey = pipeline.process(raw);
  if (verbose) console.info(`Loaded ${raw.rows.length} responses, ${survey.long.length} course choices.`);

  if (options.listOptions) {
    return [
      'Courses:',
      ...courseOptions(survey.normalized).map(c => `  ${c}`),
      'Topics:',
      ...topicOptions(survey.long).map(t => `  ${t}`),
    ].join('\n');
  }

  const report = buildSurveyReport(survey, { course: options.course, topic: options.topic });
  return options.format === 'csv' ? reportToCsv(report) : formatReport(report);
};

export const exitCodeFor = (error: unknown): number => {
  if (error instanceof UsageError) return 64;
  if (error instanceof SchemaError) return 2;
  return 1;
};

export const reportError = (error: unknown): void => {
  if (error instanceof UsageError) {
    console.error(error.message);
    console.error(USAGE);
  } else if (error instanceof SchemaError) {
    console.error(`Column mapping error. Missing required fields: ${error.missing.join(', ')}`);
  } else if (error instanceof LoadError) {
    console.error(`Could not read or process the input: ${error.message}`);
    if (error.cause) console.error('Cause:', error.cause);
  } else {
    console.error('Unexpected error:', error);
  }
};

const main = async (): Promise<void> => {
  const options = parseCliArgs(process.argv.slice(2));
  if (options === 'help') {
    console.log(USAGE);
    return;
  }
  console.log(await runReport(options));
};

export const handleFailure = (error: unknown): void => {
  reportError(error);
  process.exitCode = exitCodeFor(error);
};

if (require.main === module) {
  main().catch(handleFailure);
}
