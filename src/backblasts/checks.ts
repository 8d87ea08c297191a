import { describeEventKey, type EventGroup } from './event-key';

export interface DuplicateAttendance {
  group: EventGroup;
  userId: number;
  rowNumbers: number[];
}

export interface QViolation {
  group: EventGroup;
  /** Rows marked Q; empty when the event has no Q at all */
  qs: Array<{ rowNumber: number; userId: number }>;
}

/**
 * Find PAX listed more than once for the same event.
 */
export function findDuplicateAttendance(groups: readonly EventGroup[]): DuplicateAttendance[] {
  const duplicates: DuplicateAttendance[] = [];

  for (const group of groups) {
    const seen = new Map<number, number[]>();
    for (const row of group.rows) {
      const rowNumbers = seen.get(row.userId) ?? [];
      rowNumbers.push(row.rowNumber);
      seen.set(row.userId, rowNumbers);
    }
    for (const [userId, rowNumbers] of seen) {
      if (rowNumbers.length > 1) {
        duplicates.push({ group, userId, rowNumbers });
      }
    }
  }

  return duplicates;
}

/**
 * Every event needs exactly one Q. Co-Qs are unlimited and don't count.
 */
export function findQViolations(groups: readonly EventGroup[]): QViolation[] {
  const violations: QViolation[] = [];

  for (const group of groups) {
    const qs = group.rows
      .filter((row) => row.postType === 'Q')
      .map((row) => ({ rowNumber: row.rowNumber, userId: row.userId }));
    if (qs.length !== 1) {
      violations.push({ group, qs });
    }
  }

  return violations;
}

/**
 * Run both attendance checks over the whole input and describe every
 * violation. An empty list means the batch can be written.
 */
export function checkAttendanceConstraints(groups: readonly EventGroup[]): string[] {
  const issues: string[] = [];

  for (const dup of findDuplicateAttendance(groups)) {
    issues.push(
      `Duplicate attendance: user ${dup.userId} appears in rows ${dup.rowNumbers.join(', ')} ` +
        `for ${describeEventKey(dup.group.key)}`
    );
  }

  for (const violation of findQViolations(groups)) {
    const event = describeEventKey(violation.group.key);
    if (violation.qs.length === 0) {
      issues.push(`No Q: ${event}`);
    } else {
      const qs = violation.qs.map((q) => `user_id ${q.userId} (row ${q.rowNumber})`).join(', ');
      issues.push(`Multiple Qs: ${event} has ${violation.qs.length}: ${qs}`);
    }
  }

  return issues;
}
