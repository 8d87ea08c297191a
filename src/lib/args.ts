import { z } from 'zod';
import { ENVIRONMENTS, type Environment } from '../config';
import { UsageError } from './errors';

export interface ImportArgs {
  inputCsv: string;
  environment: Environment;
  commit: boolean;
  logFile: string;
  outputDir: string;
  help: boolean;
}

const VALUE_FLAGS: Record<string, 'inputCsv' | 'environment' | 'logFile' | 'outputDir'> = {
  '--input-csv': 'inputCsv',
  '--input_csv': 'inputCsv',
  '--environment': 'environment',
  '--log-file': 'logFile',
  '--log_file': 'logFile',
  '--output-dir': 'outputDir',
  '--output_dir': 'outputDir',
};

const argsSchema = z.object({
  inputCsv: z.string({ required_error: '--input-csv is required' }).min(1, '--input-csv is required'),
  environment: z.enum(ENVIRONMENTS, {
    errorMap: () => ({ message: `--environment must be one of: ${ENVIRONMENTS.join(', ')}` }),
  }).default('staging'),
  commit: z.boolean(),
  logFile: z.string().min(1),
  outputDir: z.string().min(1),
  help: z.boolean(),
});

/**
 * Parse the flags shared by the import scripts.
 *
 * Accepts `--flag value` and `--flag=value`, dashed or underscored names.
 */
export function parseImportArgs(argv: string[], defaults: { logFile: string }): ImportArgs {
  const raw: Record<string, string | boolean> = {
    commit: false,
    help: false,
    logFile: defaults.logFile,
    outputDir: '.',
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const [flag, inlineValue] = arg.includes('=') ? splitOnce(arg) : [arg, undefined];

    if (flag === '--commit' || flag === '--help' || flag === '-h') {
      if (inlineValue !== undefined) {
        throw new UsageError(`${flag} takes no value`);
      }
      if (flag === '--commit') raw.commit = true;
      else raw.help = true;
      continue;
    }

    const field = VALUE_FLAGS[flag];
    if (!field) {
      throw new UsageError(`Unknown argument: ${arg}`);
    }

    const value = inlineValue ?? argv[++i];
    if (value === undefined || value.startsWith('--')) {
      throw new UsageError(`${flag} needs a value`);
    }
    raw[field] = value;
  }

  if (raw.help) {
    // Let `--help` through without an input file
    raw.inputCsv ??= '-';
  }

  const parsed = argsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

function splitOnce(arg: string): [string, string] {
  const at = arg.indexOf('=');
  return [arg.slice(0, at), arg.slice(at + 1)];
}

export function importUsage(script: string, defaultLogFile: string): string {
  return [
    `Usage: npx tsx ${script} --input-csv <path> [options]`,
    '',
    'Options:',
    '  --input-csv <path>        CSV file to import (required)',
    `  --environment <env>       ${ENVIRONMENTS.join(' | ')} (default: staging)`,
    '  --commit                  Commit changes (default is dry-run/rollback)',
    `  --log-file <path>         Log file (default: ${defaultLogFile})`,
    '  --output-dir <dir>        Where generated files are written (default: .)',
    '  --help                    Show this message',
  ].join('\n');
}
