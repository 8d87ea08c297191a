#!/usr/bin/env npx tsx
/**
 * Backblast Import Script
 *
 * Imports historical backblast/attendance rows into event_instances,
 * attendance and attendance_x_attendance_types:
 * - Rows grouped into events by (org, location, series, date, time, name,
 *   description, backblast)
 * - Every event must have exactly 1 Q; a PAX may appear once per event
 * - All referenced org/location/series/user IDs must already exist
 * - One transaction; rolled back unless --commit is given
 * - Backout SQL written on every run (even dry runs and failures)
 *
 * Usage:
 *   npx tsx src/imports/backblasts.ts --input-csv backblasts.csv
 *   npx tsx src/imports/backblasts.ts --input-csv backblasts.csv --environment prod --commit
 */

import { createDb } from '../client';
import { describeDatabase, loadEnvironment, type DatabaseConfig } from '../config';
import { importUsage, parseImportArgs, type ImportArgs } from '../lib/args';
import { UsageError } from '../lib/errors';
import { openRunLog, type RunLog } from '../lib/run-log';
import { runBackblastImport } from '../backblasts/run';
import { createBackblastDatabase } from '../backblasts/store';

const SCRIPT = 'src/imports/backblasts.ts';
const DEFAULT_LOG_FILE = 'import_backblasts.log';

async function main(): Promise<number> {
  let args: ImportArgs;
  try {
    args = parseImportArgs(process.argv.slice(2), { logFile: DEFAULT_LOG_FILE });
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(`ERROR: ${error.message}\n`);
    console.error(importUsage(SCRIPT, DEFAULT_LOG_FILE));
    return 1;
  }

  if (args.help) {
    console.log(importUsage(SCRIPT, DEFAULT_LOG_FILE));
    return 0;
  }

  let log: RunLog;
  try {
    log = await openRunLog(args.logFile);
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(`ERROR: ${error.message}`);
    return 1;
  }

  let config: DatabaseConfig;
  try {
    config = loadEnvironment(args.environment);
  } catch (error) {
    await log.close();
    throw error;
  }
  const client = createDb(config);

  try {
    const result = await runBackblastImport(args, {
      database: createBackblastDatabase(client.db),
      log,
      target: describeDatabase(config),
    });
    return result.exitCode;
  } finally {
    await client.close();
    await log.close();
  }
}

// Run
main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('Import failed:', error);
    process.exit(1);
  });
