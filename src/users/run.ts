import type { ImportArgs } from '../lib/args';
import { loadCsv } from '../lib/csv';
import { ImportValidationError } from '../lib/errors';
import { banner, type Logger } from '../lib/run-log';
import { applyUserImport, planUserImport } from './import';
import { writeOutputCsv } from './output';
import type { UserDatabase } from './store';

export interface UserRunDeps {
  database: UserDatabase;
  log: Logger;
  target?: string;
}

export interface UserRunResult {
  exitCode: 0 | 1;
  imported: number;
  outputFile: string | null;
}

/**
 * Bulk user import: validate → check regions → upsert by email → output CSV.
 *
 * The output CSV (input columns + id) is written after a successful run,
 * including dry runs, where the ids are the ones the rolled-back upsert saw.
 */
export async function runUserImport(args: ImportArgs, deps: UserRunDeps): Promise<UserRunResult> {
  const { database, log } = deps;

  banner(log, 'F3 NATION USER IMPORT');
  log.info(`Environment: ${args.environment}`);
  log.info(`Mode: ${args.commit ? 'COMMIT MODE' : 'DRY RUN (will rollback)'}`);
  log.info(`CSV File: ${args.inputCsv}`);
  if (deps.target) log.info(`Database: ${deps.target}`);

  try {
    log.info('\n[1/4] Reading CSV file...');
    const csv = await loadCsv(args.inputCsv);
    log.info(`  Found ${csv.rows.length} row(s) in CSV.`);

    log.info('\n[2/4] Validating rows and home_region_ids...');
    const plan = await planUserImport(csv.header, csv.rows, database.lookup);
    log.info(`  ✓ All rows validated; ${plan.regionIds.length} home region(s) found.`);

    log.info(`\n[3/4] Processing ${plan.rows.length} user(s)...`);
    const result = await applyUserImport(database, plan, { commit: args.commit, log });
    if (result.status === 'failed') {
      log.error(`\n✗ Database error: ${result.error.message}`);
      log.error('Transaction rolled back.');
      return { exitCode: 1, imported: 0, outputFile: null };
    }
    log.info(result.status === 'committed'
      ? '  ✓ Transaction committed.'
      : '  ✓ DRY RUN: transaction rolled back. Use --commit to persist.');

    log.info('\n[4/4] Writing output CSV...');
    const outputFile = await writeOutputCsv(args.inputCsv, args.outputDir, csv.header, result.users);
    log.info(`  ✓ Output written to ${outputFile}`);

    banner(log, 'Import Complete');
    log.info(`${result.status === 'committed' ? 'Imported' : 'Validated'} ${result.users.length} user(s).`);
    return { exitCode: 0, imported: result.users.length, outputFile };
  } catch (error) {
    if (!(error instanceof ImportValidationError)) throw error;
    log.error(`\n[ERROR] ${error.message}:`);
    for (const issue of error.issues) {
      log.error(`  ✗ ${issue}`);
    }
    return { exitCode: 1, imported: 0, outputFile: null };
  }
}
