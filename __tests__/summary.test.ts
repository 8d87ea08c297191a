import { describe, it, expect } from 'vitest';
import { groupByEventKey } from '../src/backblasts/event-key';
import { validateRows } from '../src/backblasts/rows';
import { buildImportSummary, formatImportSummary } from '../src/backblasts/summary';
import { createIdTracker } from '../src/backblasts/writer';
import { backblastRecord } from './helpers/fixtures';

const groups = groupByEventKey(validateRows([
  backblastRecord({ user_id: '1', post_type: 'Q', start_date: '2024-03-06' }),
  backblastRecord({ user_id: '2', post_type: 'Q', start_date: '2023-11-30', org_id: '11' }),
  backblastRecord({ user_id: '3', post_type: 'Co-Q', start_date: '2023-11-30', org_id: '11' }),
  backblastRecord({ user_id: '4', post_type: 'Q', start_date: '2024-05-01', location_id: '21' }),
]).rows);

describe('Import summary', () => {
  it('should summarize every written event', () => {
    const tracker = {
      ...createIdTracker(),
      eventInstanceIds: [1, 2, 3],
      attendanceIds: [11, 12, 13, 14],
      typeAssignments: { Q: 3, 'Co-Q': 1 },
    };

    expect(buildImportSummary(4, groups, tracker)).toEqual({
      rowsProcessed: 4,
      uniqueEvents: 3,
      attendanceRecords: 4,
      qAssignments: 3,
      coQAssignments: 1,
      uniqueOrgs: 2,
      uniqueLocations: 2,
      oldestEventDate: '2023-11-30',
      newestEventDate: '2024-05-01',
    });
  });

  it('should only count events inserted before a failure', () => {
    const tracker = { ...createIdTracker(), eventInstanceIds: [1], attendanceIds: [11] };

    const summary = buildImportSummary(4, groups, tracker);

    expect(summary.uniqueEvents).toBe(1);
    expect(summary.uniqueOrgs).toBe(1);
    expect(summary.oldestEventDate).toBe('2024-03-06');
    expect(summary.newestEventDate).toBe('2024-03-06');
  });

  it('should format the IMPORT SUMMARY lines', () => {
    const summary = buildImportSummary(0, [], createIdTracker());

    expect(formatImportSummary(summary)).toEqual([
      'Total rows processed: 0',
      'Unique events created: 0',
      'Attendance records created: 0',
      'Q assignments: 0',
      'Co-Q assignments: 0',
      'Unique organizations: 0',
      'Unique locations: 0',
      'Oldest event date: N/A',
      'Most recent event date: N/A',
    ]);
  });
});
