import { createReadStream } from 'fs';
import { parse } from 'csv-parse';

export type CsvRecord = Record<string, string | undefined>;

export interface CsvFile {
  header: string[];
  rows: CsvRecord[];
}

/**
 * Parse CSV file and return header plus rows keyed by column name
 */
export async function loadCsv(filePath: string): Promise<CsvFile> {
  return new Promise((resolve, reject) => {
    let header: string[] = [];
    const rows: CsvRecord[] = [];

    createReadStream(filePath)
      .on('error', reject)
      .pipe(parse({
        bom: true,
        // Short rows come back with the trailing columns missing
        relax_column_count: true,
        columns: (names: string[]) => {
          header = names.map((name) => name.trim());
          return header;
        },
        skip_empty_lines: true,
        trim: true,
      }))
      .on('data', (row: CsvRecord) => rows.push(row))
      .on('end', () => resolve({ header, rows }))
      .on('error', reject);
  });
}

/**
 * Helper: trimmed value, or null when empty / missing
 */
export function str(val: string | undefined): string | null {
  if (val === undefined) return null;
  const trimmed = val.trim();
  return trimmed === '' ? null : trimmed;
}

/**
 * Like `str`, but a spreadsheet `#N/A` also counts as missing. Only for
 * required columns; free text keeps a literal `#N/A`.
 */
export function requiredStr(val: string | undefined): string | null {
  const value = str(val);
  return value === '#N/A' ? null : value;
}
