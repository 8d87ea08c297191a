import { z } from 'zod';
import { requiredStr, str, type CsvRecord } from '../lib/csv';

export const USER_REQUIRED_COLUMNS = ['f3_name', 'email', 'home_region_id'] as const;

export interface UserImportRow {
  rowNumber: number;
  f3Name: string;
  firstName: string | null;
  lastName: string | null;
  email: string;
  homeRegionId: number;
  /** Original CSV values, echoed into the output file */
  source: CsvRecord;
}

const emailSchema = z.string().email();

/**
 * Header and per-row checks for the bulk user CSV. All issues are
 * collected before returning.
 */
export function validateUserRows(header: readonly string[], records: CsvRecord[]): { rows: UserImportRow[]; issues: string[] } {
  const present = new Set(header);
  const headerIssues = USER_REQUIRED_COLUMNS
    .filter((col) => !present.has(col))
    .map((col) => `Missing required column in header: ${col}`);
  if (headerIssues.length > 0) {
    return { rows: [], issues: headerIssues };
  }

  const rows: UserImportRow[] = [];
  const issues: string[] = [];

  records.forEach((record, index) => {
    const rowNumber = index + 1;
    const rowIssues: string[] = [];

    for (const col of USER_REQUIRED_COLUMNS) {
      if (requiredStr(record[col]) === null) {
        rowIssues.push(`Row ${rowNumber}: missing or empty required column ${col}`);
      }
    }

    const f3Name = requiredStr(record.f3_name);
    const email = requiredStr(record.email);
    const region = requiredStr(record.home_region_id);

    if (email !== null && !emailSchema.safeParse(email).success) {
      rowIssues.push(`Row ${rowNumber}: email is not a valid address (value: '${email}')`);
    }
    const homeRegionId = region !== null && /^\d+$/.test(region) ? Number(region) : NaN;
    if (region !== null && (!Number.isSafeInteger(homeRegionId) || homeRegionId <= 0)) {
      rowIssues.push(`Row ${rowNumber}: home_region_id must be a positive integer (value: '${region}')`);
    }

    if (rowIssues.length > 0 || f3Name === null || email === null) {
      issues.push(...rowIssues);
      return;
    }

    rows.push({
      rowNumber,
      f3Name,
      firstName: str(record.first_name),
      lastName: str(record.last_name),
      email,
      homeRegionId,
      source: record,
    });
  });

  return { rows, issues };
}
