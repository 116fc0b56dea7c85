import { mkdtemp, rm, writeFile } from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { exitCodeFor, handleFailure, parseCliArgs, runReport, USAGE, UsageError } from '../cli';
import { FIELD } from '../constants';
import { LoadError, SchemaError } from '../services/errors';
import { headerFor, rawSurvey, scenarioRespondents, surveyCsv } from './helpers';

describe('parseCliArgs', () => {
  it('parses a file report', () => {
    expect(parseCliArgs(['--file=responses.csv', '--course=Engineering'])).toEqual({
      file: 'responses.csv',
      sheet: undefined,
      course: 'Engineering',
      topic: undefined,
      format: 'text',
      listOptions: false,
    });
  });

  it('parses a sheet report in CSV', () => {
    expect(parseCliArgs(['--sheet=responses', '--format=csv', '--topic=Physics', '--list'])).toEqual({
      file: undefined,
      sheet: 'responses',
      course: undefined,
      topic: 'Physics',
      format: 'csv',
      listOptions: true,
    });
  });

  it('returns help before validating inputs', () => {
    expect(parseCliArgs(['--help'])).toBe('help');
  });

  it.each<[string[]]>([
    [[]],
    [['--file=a.csv', '--sheet=responses']],
    [['--file=a.csv', '--format=json']],
    [['--file=a.csv', '--verbose']],
    [['a.csv']],
    [['--file']],
  ])('rejects %j', argv => {
    expect(() => parseCliArgs(argv)).toThrow(UsageError);
  });
});

describe('exitCodeFor', () => {
  it('maps errors to exit codes', () => {
    expect(exitCodeFor(new UsageError('bad'))).toBe(64);
    expect(exitCodeFor(new SchemaError(['Course']))).toBe(2);
    expect(exitCodeFor(new LoadError('unreadable'))).toBe(1);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
  });
});

describe('handleFailure', () => {
  let error: jest.SpyInstance;

  beforeEach(() => {
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    error.mockRestore();
    process.exitCode = undefined;
  });

  it('prints usage for argument errors', () => {
    const failure = new UsageError('Unknown option: --verbose');

    handleFailure(failure);

    expect(error.mock.calls).toEqual([['Unknown option: --verbose'], [USAGE]]);
    expect(process.exitCode).toBe(64);
  });

  it('lists missing fields for column mapping errors', () => {
    handleFailure(new SchemaError([FIELD.course, FIELD.enrollmentId]));

    expect(error.mock.calls).toEqual([
      ['Column mapping error. Missing required fields: Course, EnrollmentId'],
    ]);
    expect(process.exitCode).toBe(2);
  });

  it('prints the message and cause of load errors', () => {
    const cause = new Error('ENOENT: no such file');

    handleFailure(new LoadError('Could not read missing.csv: ENOENT: no such file', { cause }));

    expect(error.mock.calls).toEqual([
      ['Could not read or process the input: Could not read missing.csv: ENOENT: no such file'],
      ['Cause:', cause],
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('omits the cause line when there is none', () => {
    handleFailure(new LoadError('Workbook has no worksheets'));

    expect(error.mock.calls).toEqual([['Could not read or process the input: Workbook has no worksheets']]);
    expect(process.exitCode).toBe(1);
  });

  it('reports anything else as unexpected', () => {
    const failure = new Error('boom');

    handleFailure(failure);

    expect(error.mock.calls).toEqual([['Unexpected error:', failure]]);
    expect(process.exitCode).toBe(1);
  });
});

describe('runReport', () => {
  let dir: string;
  let info: jest.SpyInstance;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'survey-cli-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    info.mockRestore();
  });

  it('lists courses and topics of a CSV export', async () => {
    const file = path.join(dir, 'responses.csv');
    await writeFile(file, surveyCsv(rawSurvey(scenarioRespondents)), 'utf8');

    const output = await runReport({ file, format: 'text', listOptions: true });

    expect(output).toBe(['Courses:', '  All courses', '  Engineering', '  Medicine', 'Topics:', '  Calculus', '  Physics'].join('\n'));
  });

  it('prints the demand report for a course', async () => {
    const file = path.join(dir, 'responses.csv');
    await writeFile(file, surveyCsv(rawSurvey(scenarioRespondents)), 'utf8');

    const output = await runReport({ file, course: 'Engineering', format: 'text', listOptions: false });
    const lines = output.split('\n');

    expect(lines[1]).toBe('Course: Engineering | Topic: Calculus');
    expect(lines).toContain('Physics   Priority 2  1');
    expect(info).toHaveBeenCalledWith('Loaded 3 responses, 5 course choices.');
  });

  it('rejects exports without the required questions', async () => {
    const raw = rawSurvey(scenarioRespondents);
    const columns = raw.columns.filter(col => col !== headerFor(FIELD.course));
    const file = path.join(dir, 'partial.csv');
    await writeFile(file, surveyCsv({ columns, rows: raw.rows }), 'utf8');

    await expect(runReport({ file, format: 'csv', listOptions: false })).rejects.toThrow(SchemaError);
  });
});
