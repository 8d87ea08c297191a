import { ImportValidationError, ImportWriteError } from '../lib/errors';
import type { CsvRecord } from '../lib/csv';
import type { Logger } from '../lib/run-log';
import { validateUserRows, type UserImportRow } from './rows';
import type { RegionLookup, UserDatabase } from './store';

export interface UserImportPlan {
  rows: UserImportRow[];
  regionIds: number[];
}

export interface UpsertedUser {
  row: UserImportRow;
  id: number;
}

export type UserApplyResult =
  | { status: 'committed' | 'rolled-back'; users: UpsertedUser[] }
  | { status: 'failed'; users: UpsertedUser[]; error: Error };

/**
 * Validate the CSV and confirm every home region exists.
 *
 * @throws ImportValidationError
 */
export async function planUserImport(
  header: readonly string[],
  records: CsvRecord[],
  lookup: RegionLookup
): Promise<UserImportPlan> {
  if (records.length === 0) {
    throw new ImportValidationError('input', ['CSV contains no data rows']);
  }

  const { rows, issues } = validateUserRows(header, records);
  if (issues.length > 0) {
    throw new ImportValidationError('input', issues);
  }

  const regionIds = [...new Set(rows.map((row) => row.homeRegionId))].sort((a, b) => a - b);
  const found = await lookup.findRegionIds(regionIds);
  const missing = regionIds.filter((id) => !found.has(id));
  if (missing.length > 0) {
    throw new ImportValidationError('reference', [`Missing home_region_id(s): [${missing.join(', ')}]`]);
  }

  return { rows, regionIds };
}

/**
 * Upsert every user in one transaction. Failures come back as
 * `status: 'failed'` with the users processed before the error.
 */
export async function applyUserImport(
  database: UserDatabase,
  plan: UserImportPlan,
  options: { commit: boolean; log?: Logger }
): Promise<UserApplyResult> {
  const upserted: UpsertedUser[] = [];
  const total = plan.rows.length;

  try {
    await database.transaction(async (store) => {
      for (const [index, row] of plan.rows.entries()) {
        let id: number;
        try {
          id = await store.upsertUser({
            f3Name: row.f3Name,
            firstName: row.firstName,
            lastName: row.lastName,
            email: row.email,
            homeRegionId: row.homeRegionId,
          });
        } catch (error) {
          throw new ImportWriteError('users', `row ${row.rowNumber}, ${row.email}`, error);
        }
        upserted.push({ row, id });
        options.log?.info(`  [${index + 1}/${total}] ${row.f3Name} (${row.email}) ✓ (ID: ${id})`);
      }
    }, { commit: options.commit });
  } catch (error) {
    return { status: 'failed', users: upserted, error: error instanceof Error ? error : new Error(String(error)) };
  }

  return { status: options.commit ? 'committed' : 'rolled-back', users: upserted };
}
