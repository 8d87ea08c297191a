import { writeFile } from 'fs/promises';
import { join } from 'path';
import type { Environment } from '../config';
import type { IdTracker } from './writer';

export interface BackoutContext {
  csvFile: string;
  environment: Environment;
  generatedAt: Date;
}

/** `backout_<env>_<YYYYMMDD_HHMMSS>.sql`, UTC */
export function backoutFileName(environment: Environment, at: Date): string {
  const stamp = at.toISOString().slice(0, 19).replace(/[-:]/g, '').replace('T', '_');
  return `backout_${environment}_${stamp}.sql`;
}

function deleteStatement(comment: string, table: string, column: string, ids: readonly number[]): string[] {
  if (ids.length === 0) return [];
  return [
    `-- ${comment}`,
    `DELETE FROM ${table} WHERE ${column} IN (${ids.join(',')});`,
    '',
  ];
}

/**
 * SQL that deletes every row a run inserted, children first so foreign keys
 * hold at each step.
 */
export function renderBackoutSql(tracker: IdTracker, context: BackoutContext): string {
  const lines = [
    `-- Backout SQL for import from ${context.csvFile}`,
    `-- Generated: ${context.generatedAt.toISOString()}`,
    `-- Environment: ${context.environment}`,
    '-- This file will rollback all inserted data',
    '',
    ...deleteStatement(
      'Delete attendance_x_attendance_types records',
      'attendance_x_attendance_types',
      'attendance_id',
      tracker.attendanceWithTypes
    ),
    ...deleteStatement('Delete attendance records', 'attendance', 'id', tracker.attendanceIds),
    ...deleteStatement('Delete event_instances records', 'event_instances', 'id', tracker.eventInstanceIds),
    '-- Summary of deleted records',
    `-- Event instances deleted: ${tracker.eventInstanceIds.length}`,
    `-- Attendance records deleted: ${tracker.attendanceIds.length}`,
    `-- Attendance type assignments deleted: ${tracker.attendanceWithTypes.length}`,
  ];
  return `${lines.join('\n')}\n`;
}

export async function writeBackoutFile(tracker: IdTracker, context: BackoutContext, outputDir: string): Promise<string> {
  const path = join(outputDir, backoutFileName(context.environment, context.generatedAt));
  await writeFile(path, renderBackoutSql(tracker, context), 'utf-8');
  return path;
}
