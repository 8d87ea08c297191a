import { stringify } from 'csv-stringify/sync';
import type { CsvRecord } from '../../src/lib/csv';
import { BACKBLAST_COLUMNS } from '../../src/backblasts/rows';

export const HEADER: string[] = [...BACKBLAST_COLUMNS];

/** A CSV row for the Tuesday 0530 workout at AO 10 / location 20 */
export function backblastRecord(overrides: CsvRecord = {}): CsvRecord {
  return {
    org_id: '10',
    location_id: '20',
    series_id: '',
    start_date: '2024-03-05',
    start_time: '0530',
    name: 'The Grinder',
    description: 'Hill repeats',
    backblast: '12 PAX posted in the gloom.',
    user_id: '1',
    post_type: '',
    ...overrides,
  };
}

export const KNOWN_REFERENCES = {
  orgs: [10, 11],
  locations: [20, 21],
  events: [30],
  users: [1, 2, 3, 4, 5],
};

export function toCsv(header: readonly string[], records: readonly CsvRecord[]): string {
  return stringify(records.map((record) => ({ ...record })), { header: true, columns: [...header] });
}
