import type { EventGroup } from './event-key';
import type { IdTracker } from './writer';

export interface ImportSummary {
  rowsProcessed: number;
  uniqueEvents: number;
  attendanceRecords: number;
  qAssignments: number;
  coQAssignments: number;
  uniqueOrgs: number;
  uniqueLocations: number;
  oldestEventDate: string | null;
  newestEventDate: string | null;
}

/**
 * Counts for the IMPORT SUMMARY block.
 *
 * Event-level figures only cover groups that actually got an event_instances
 * row, so a run that failed halfway reports what it had inserted.
 */
export function buildImportSummary(
  rowsProcessed: number,
  groups: readonly EventGroup[],
  tracker: IdTracker
): ImportSummary {
  const written = groups.slice(0, tracker.eventInstanceIds.length);
  const orgIds = new Set(written.map((group) => group.key[0]));
  const locationIds = new Set(written.map((group) => group.key[1]));
  // YYYY-MM-DD sorts lexically
  const dates = written.map((group) => group.key[3]).sort();

  return {
    rowsProcessed,
    uniqueEvents: tracker.eventInstanceIds.length,
    attendanceRecords: tracker.attendanceIds.length,
    qAssignments: tracker.typeAssignments.Q,
    coQAssignments: tracker.typeAssignments['Co-Q'],
    uniqueOrgs: orgIds.size,
    uniqueLocations: locationIds.size,
    oldestEventDate: dates.length > 0 ? dates[0] : null,
    newestEventDate: dates.length > 0 ? dates[dates.length - 1] : null,
  };
}

export function formatImportSummary(summary: ImportSummary): string[] {
  return [
    `Total rows processed: ${summary.rowsProcessed}`,
    `Unique events created: ${summary.uniqueEvents}`,
    `Attendance records created: ${summary.attendanceRecords}`,
    `Q assignments: ${summary.qAssignments}`,
    `Co-Q assignments: ${summary.coQAssignments}`,
    `Unique organizations: ${summary.uniqueOrgs}`,
    `Unique locations: ${summary.uniqueLocations}`,
    `Oldest event date: ${summary.oldestEventDate ?? 'N/A'}`,
    `Most recent event date: ${summary.newestEventDate ?? 'N/A'}`,
  ];
}
