import { ImportValidationError } from '../lib/errors';
import type { CsvRecord } from '../lib/csv';
import type { Logger } from '../lib/run-log';
import { checkAttendanceConstraints } from './checks';
import { groupByEventKey, type EventGroup } from './event-key';
import {
  collectReferenceIds,
  describeMissingReferences,
  describeReferenceIds,
  findMissingReferences,
  type ReferenceIds,
  type ReferenceLookup,
} from './references';
import { validateHeader, validateRows, type ImportRow } from './rows';
import type { BackblastDatabase } from './store';
import { createIdTracker, writeBackblasts, type IdTracker } from './writer';

/** Validated, grouped input ready to be written. Building one never writes. */
export interface ImportPlan {
  rows: ImportRow[];
  groups: EventGroup[];
  references: ReferenceIds;
}

export interface ApplyOptions {
  commit: boolean;
  log?: Logger;
}

export type ApplyResult =
  | { status: 'committed' | 'rolled-back'; tracker: IdTracker }
  | { status: 'failed'; tracker: IdTracker; error: Error };

/**
 * Checks that need only the CSV: header, per-row values, then duplicate
 * attendance and the one-Q rule across every event.
 *
 * @throws ImportValidationError (`input` or `consistency`)
 */
export function prepareBackblastImport(header: readonly string[], records: CsvRecord[]): Omit<ImportPlan, 'references'> {
  const headerIssues = validateHeader(header);
  if (headerIssues.length > 0) {
    throw new ImportValidationError('input', headerIssues);
  }

  const { rows, issues } = validateRows(records);
  if (issues.length > 0) {
    throw new ImportValidationError('input', issues);
  }
  if (rows.length === 0) {
    throw new ImportValidationError('input', ['CSV contains no data rows']);
  }

  const groups = groupByEventKey(rows);
  const consistencyIssues = checkAttendanceConstraints(groups);
  if (consistencyIssues.length > 0) {
    throw new ImportValidationError('consistency', consistencyIssues);
  }

  return { rows, groups };
}

/**
 * First phase: validate everything, including that every referenced ID
 * exists, and return the plan. Nothing is written.
 *
 * @throws ImportValidationError
 */
export async function planBackblastImport(
  header: readonly string[],
  records: CsvRecord[],
  lookup: ReferenceLookup,
  log?: Logger
): Promise<ImportPlan> {
  log?.info(`\n[2/5] Validating ${records.length} row(s)...`);
  const { rows, groups } = prepareBackblastImport(header, records);
  log?.info(`  ✓ All ${rows.length} row(s) passed validation`);
  log?.info(`  ✓ ${groups.length} event(s), no duplicate attendance, exactly 1 Q each`);

  log?.info('\n[3/5] Checking referenced IDs exist...');
  const references = collectReferenceIds(rows);
  for (const line of describeReferenceIds(references)) {
    log?.info(`  ${line}`);
  }
  const missing = describeMissingReferences(await findMissingReferences(lookup, references));
  if (missing.length > 0) {
    throw new ImportValidationError('reference', missing);
  }
  log?.info('  ✓ All IDs validated successfully');

  return { rows, groups, references };
}

/**
 * Second phase: write the plan in one transaction, then commit or roll back.
 *
 * Never throws for database failures; they come back as `status: 'failed'`
 * together with whatever IDs were handed out before the failure.
 */
export async function applyBackblastImport(
  database: BackblastDatabase,
  plan: ImportPlan,
  options: ApplyOptions
): Promise<ApplyResult> {
  const tracker = createIdTracker();

  try {
    await database.transaction(
      (store) => writeBackblasts(store, plan.groups, tracker, options.log),
      { commit: options.commit }
    );
  } catch (error) {
    return { status: 'failed', tracker, error: error instanceof Error ? error : new Error(String(error)) };
  }

  return { status: options.commit ? 'committed' : 'rolled-back', tracker };
}
