import type { ImportArgs } from '../lib/args';
import { loadCsv } from '../lib/csv';
import { ImportValidationError, ImportWriteError } from '../lib/errors';
import { banner, type Logger } from '../lib/run-log';
import { writeBackoutFile } from './backout';
import type { EventGroup } from './event-key';
import { applyBackblastImport, planBackblastImport, type ApplyResult } from './import';
import type { BackblastDatabase } from './store';
import { buildImportSummary, formatImportSummary, type ImportSummary } from './summary';
import { createIdTracker, type IdTracker } from './writer';

export interface BackblastRunDeps {
  database: BackblastDatabase;
  log: Logger;
  /** Printable target, e.g. host/dbname */
  target?: string;
  now?: () => Date;
}

export interface BackblastRunResult {
  exitCode: 0 | 1;
  status: ApplyResult['status'] | 'invalid';
  summary: ImportSummary;
  backoutFile: string;
}

/**
 * Backblast import, start to finish: load → validate → write → summarize.
 *
 * The IMPORT SUMMARY and the backout file are produced on every path,
 * including validation failures (the backout is then empty).
 */
export async function runBackblastImport(args: ImportArgs, deps: BackblastRunDeps): Promise<BackblastRunResult> {
  const { database, log } = deps;
  const now = deps.now ?? (() => new Date());
  const startTotal = Date.now();
  const timers: Record<string, number> = {};

  banner(log, 'BACKBLAST IMPORT SCRIPT');
  log.info(`Environment: ${args.environment.toUpperCase()}`);
  log.info(`Mode: ${args.commit ? 'COMMIT MODE' : 'DRY RUN (will rollback)'}`);
  log.info(`CSV File: ${args.inputCsv}`);
  if (deps.target) log.info(`Database: ${deps.target}`);
  log.info('='.repeat(80));

  let rowsProcessed = 0;
  let groups: EventGroup[] = [];
  let tracker: IdTracker = createIdTracker();
  let status: BackblastRunResult['status'] = 'invalid';

  try {
    const startIngest = Date.now();
    log.info('\n[1/5] Loading CSV...');
    const csv = await loadCsv(args.inputCsv);
    rowsProcessed = csv.rows.length;
    log.info(`  Loaded ${rowsProcessed} row(s) from ${args.inputCsv}`);

    const plan = await planBackblastImport(csv.header, csv.rows, database.lookup, log);
    groups = plan.groups;
    timers['Ingest & Validate'] = Date.now() - startIngest;

    log.info(`\n[4/5] Writing ${plan.groups.length} event(s) and ${plan.rows.length} attendance row(s)...`);
    const startWrite = Date.now();
    const result = await applyBackblastImport(database, plan, { commit: args.commit, log });
    timers['Write'] = Date.now() - startWrite;
    tracker = result.tracker;
    status = result.status;

    if (result.status === 'failed') {
      log.error(`\n[ERROR] Import failed: ${result.error.message}`);
      if (result.error instanceof ImportWriteError) {
        log.error(`  Step: ${result.error.step}`);
        log.error(`  Context: ${result.error.context}`);
      }
      log.error('  Transaction rolled back; nothing was persisted.');
    } else if (result.status === 'committed') {
      log.info('\n✓ SUCCESS: Import completed and COMMITTED to database.');
    } else {
      log.info('\n✓ DRY RUN: Import completed successfully (transaction rolled back).');
      log.info('  Use the --commit flag to persist these changes to the database.');
    }
  } catch (error) {
    if (error instanceof ImportValidationError) {
      log.error(`\n[ERROR] ${error.message}:`);
      for (const issue of error.issues) {
        log.error(`  ✗ ${issue}`);
      }
      log.error('\nAbort: nothing was written. Fix the CSV and retry.');
    } else {
      status = 'failed';
      log.error(`\n[ERROR] Import failed with exception: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  const summary = buildImportSummary(rowsProcessed, groups, tracker);
  log.info('');
  banner(log, 'IMPORT SUMMARY');
  for (const line of formatImportSummary(summary)) {
    log.info(line);
  }

  log.info('\nPERFORMANCE METRICS');
  log.info('-'.repeat(80));
  for (const [label, ms] of Object.entries(timers)) {
    log.info(`${`${label}:`.padEnd(22)}${(ms / 1000).toFixed(2).padStart(8)}s`);
  }
  log.info(`${'TOTAL:'.padEnd(22)}${((Date.now() - startTotal) / 1000).toFixed(2).padStart(8)}s`);
  log.info('='.repeat(80));

  log.info('\n[5/5] Generating backout SQL...');
  const backoutFile = await writeBackoutFile(
    tracker,
    { csvFile: args.inputCsv, environment: args.environment, generatedAt: now() },
    args.outputDir
  );
  log.info(`[BACKOUT] SQL rollback file generated: ${backoutFile}`);
  log.info(`  To rollback this import, execute: psql -f ${backoutFile}`);

  const ok = status === 'committed' || status === 'rolled-back';
  return { exitCode: ok ? 0 : 1, status, summary, backoutFile };
}
