import { requiredStr, str, type CsvRecord } from '../lib/csv';

export const BACKBLAST_COLUMNS = [
  'org_id',
  'location_id',
  'series_id',
  'start_date',
  'start_time',
  'name',
  'description',
  'backblast',
  'user_id',
  'post_type',
] as const;

export type BackblastColumn = (typeof BACKBLAST_COLUMNS)[number];

export const REQUIRED_COLUMNS = ['org_id', 'location_id', 'start_date', 'user_id'] as const satisfies readonly BackblastColumn[];

/** Name given to events whose CSV row leaves `name` blank */
export const DEFAULT_EVENT_NAME = 'Imported Event';

export const POST_TYPES = ['Q', 'Co-Q'] as const;
export type PostType = (typeof POST_TYPES)[number];

/**
 * One validated CSV line. Optional text fields are trimmed, and blank or
 * missing values are null (`#N/A` is only treated as missing in required columns), so equal rows compare equal however they were written.
 */
export interface ImportRow {
  /** 1-based position among the data rows */
  rowNumber: number;
  orgId: number;
  locationId: number;
  seriesId: number | null;
  startDate: string;
  startTime: string | null;
  name: string;
  description: string | null;
  backblast: string | null;
  userId: number;
  /** null = plain attendance */
  postType: PostType | null;
}

export interface RowValidation {
  rows: ImportRow[];
  issues: string[];
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^([01]\d|2[0-3])[0-5]\d$/;
const ID_PATTERN = /^\d+$/;

/**
 * Check the header carries every required column. Optional columns may be
 * left out entirely; names are case-sensitive.
 */
export function validateHeader(header: readonly string[]): string[] {
  const present = new Set(header);
  return REQUIRED_COLUMNS
    .filter((col) => !present.has(col))
    .map((col) => `Missing required column in header: ${col}`);
}

export function isValidDate(val: string): boolean {
  const match = DATE_PATTERN.exec(val);
  if (!match) return false;
  const [, y, m, d] = match;
  const date = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return date.getUTCFullYear() === Number(y)
    && date.getUTCMonth() === Number(m) - 1
    && date.getUTCDate() === Number(d);
}

export function isValidTime(val: string): boolean {
  return TIME_PATTERN.test(val);
}

export function toPostType(val: string | null): PostType | null {
  return val === 'Q' || val === 'Co-Q' ? val : null;
}

/**
 * Validate every row and convert the good ones. Problems are collected for
 * all rows, so the operator sees the whole list at once.
 */
export function validateRows(records: CsvRecord[]): RowValidation {
  const rows: ImportRow[] = [];
  const issues: string[] = [];

  records.forEach((record, index) => {
    const rowNumber = index + 1;
    const rowIssues: string[] = [];

    const required = (col: BackblastColumn): string | null => {
      const value = requiredStr(record[col]);
      if (value === null) {
        rowIssues.push(`Row ${rowNumber}: missing or invalid required column ${col} (value: '${record[col] ?? ''}')`);
      }
      return value;
    };

    const id = (col: BackblastColumn, value: string | null): number | null => {
      if (value === null) return null;
      const parsed = ID_PATTERN.test(value) ? Number(value) : NaN;
      if (!Number.isSafeInteger(parsed) || parsed <= 0) {
        rowIssues.push(`Row ${rowNumber}: ${col} must be a positive integer (value: '${value}')`);
        return null;
      }
      return parsed;
    };

    const orgId = id('org_id', required('org_id'));
    const locationId = id('location_id', required('location_id'));
    const userId = id('user_id', required('user_id'));
    const seriesId = id('series_id', str(record.series_id));

    const startDate = required('start_date');
    if (startDate !== null && !isValidDate(startDate)) {
      rowIssues.push(`Row ${rowNumber}: start_date must be a YYYY-MM-DD date (value: '${startDate}')`);
    }

    const startTime = str(record.start_time);
    if (startTime !== null && !isValidTime(startTime)) {
      rowIssues.push(`Row ${rowNumber}: start_time must be HHMM, 24-hour (value: '${startTime}')`);
    }

    if (rowIssues.length > 0 || orgId === null || locationId === null || userId === null || startDate === null) {
      issues.push(...rowIssues);
      return;
    }

    rows.push({
      rowNumber,
      orgId,
      locationId,
      seriesId,
      startDate,
      startTime,
      name: str(record.name) ?? DEFAULT_EVENT_NAME,
      description: str(record.description),
      backblast: str(record.backblast),
      userId,
      postType: toPostType(str(record.post_type)),
    });
  });

  return { rows, issues };
}
