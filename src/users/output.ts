import { writeFile } from 'fs/promises';
import { join, parse } from 'path';
import { stringify } from 'csv-stringify/sync';
import type { UpsertedUser } from './import';

/** data/users.csv -> <outputDir>/users_output.csv */
export function outputFileName(inputFile: string, outputDir: string): string {
  const { name, ext } = parse(inputFile);
  return join(outputDir, `${name}_output${ext}`);
}

/**
 * The input columns in their original order, plus the assigned `id` last.
 */
export function renderOutputCsv(header: readonly string[], results: readonly UpsertedUser[]): string {
  const columns = [...header.filter((col) => col !== 'id'), 'id'];
  const records = results.map(({ row, id }) => ({ ...row.source, id: String(id) }));
  return stringify(records, { header: true, columns });
}

export async function writeOutputCsv(
  inputFile: string,
  outputDir: string,
  header: readonly string[],
  results: readonly UpsertedUser[]
): Promise<string> {
  const path = outputFileName(inputFile, outputDir);
  await writeFile(path, renderOutputCsv(header, results), 'utf-8');
  return path;
}
