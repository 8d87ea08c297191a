import { describe, it, expect } from 'vitest';
import { importUsage, parseImportArgs } from '../src/lib/args';
import { UsageError } from '../src/lib/errors';

const defaults = { logFile: 'import_backblasts.log' };

describe('parseImportArgs', () => {
  it('should apply defaults for everything but the input file', () => {
    expect(parseImportArgs(['--input-csv', 'data.csv'], defaults)).toEqual({
      inputCsv: 'data.csv',
      environment: 'staging',
      commit: false,
      logFile: 'import_backblasts.log',
      outputDir: '.',
      help: false,
    });
  });

  it('should accept inline values and underscore spellings', () => {
    const args = parseImportArgs([
      '--input_csv=data.csv',
      '--environment', 'prod',
      '--commit',
      '--log_file=run.log',
      '--output-dir', 'out',
    ], defaults);

    expect(args).toEqual({
      inputCsv: 'data.csv',
      environment: 'prod',
      commit: true,
      logFile: 'run.log',
      outputDir: 'out',
      help: false,
    });
  });

  it('should require an input file', () => {
    expect(() => parseImportArgs(['--commit'], defaults)).toThrow(new UsageError('--input-csv is required'));
  });

  it('should only accept known environments', () => {
    expect(() => parseImportArgs(['--input-csv', 'a.csv', '--environment', 'dev'], defaults))
      .toThrow('--environment must be one of: staging, prod');
  });

  it('should reject unknown flags and missing values', () => {
    expect(() => parseImportArgs(['--input-csv', 'a.csv', '--force'], defaults)).toThrow('Unknown argument: --force');
    expect(() => parseImportArgs(['--input-csv', 'a.csv', '--log-file'], defaults)).toThrow('--log-file needs a value');
    expect(() => parseImportArgs(['--input-csv', '--commit'], defaults)).toThrow('--input-csv needs a value');
  });

  it('should reject a value on --commit and --help', () => {
    expect(() => parseImportArgs(['--input-csv', 'a.csv', '--commit=false'], defaults))
      .toThrow(new UsageError('--commit takes no value'));
    expect(() => parseImportArgs(['--input-csv', 'a.csv', '--commit=no'], defaults))
      .toThrow('--commit takes no value');
    expect(() => parseImportArgs(['--help=yes'], defaults)).toThrow('--help takes no value');
  });

  it('should allow --help without an input file', () => {
    expect(parseImportArgs(['--help'], defaults).help).toBe(true);
  });

  it('should list every option in the usage text', () => {
    const usage = importUsage('src/imports/backblasts.ts', 'import_backblasts.log');
    for (const flag of ['--input-csv', '--environment', '--commit', '--log-file', '--output-dir']) {
      expect(usage).toContain(flag);
    }
  });
});
