#!/usr/bin/env npx tsx
/**
 * Bulk User Import Script
 *
 * Creates or updates users from a CSV (f3_name, email, home_region_id,
 * optional first_name/last_name):
 * - Upsert on email; blank values never overwrite stored ones
 * - home_region_id must be an existing org of type 'region'
 * - Writes <input>_output.csv into --output-dir with the assigned user ids
 *
 * Usage:
 *   npx tsx src/imports/users.ts --input-csv users.csv
 *   npx tsx src/imports/users.ts --input-csv users.csv --environment prod --commit
 */

import { createDb } from '../client';
import { describeDatabase, loadEnvironment, type DatabaseConfig } from '../config';
import { importUsage, parseImportArgs, type ImportArgs } from '../lib/args';
import { UsageError } from '../lib/errors';
import { openRunLog, type RunLog } from '../lib/run-log';
import { runUserImport } from '../users/run';
import { createUserDatabase } from '../users/store';

const SCRIPT = 'src/imports/users.ts';
const DEFAULT_LOG_FILE = 'import_users.log';

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
    const result = await runUserImport(args, {
      database: createUserDatabase(client.db),
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
