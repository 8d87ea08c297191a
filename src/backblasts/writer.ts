import { ImportWriteError } from '../lib/errors';
import type { Logger } from '../lib/run-log';
import { describeEventKey, type EventGroup } from './event-key';
import type { PostType } from './rows';
import type { BackblastStore } from './store';

/**
 * Primary keys handed out during a run, recorded right after each insert.
 * Feeds the backout script whether the run committed, rolled back or failed.
 */
export interface IdTracker {
  eventInstanceIds: number[];
  attendanceIds: number[];
  /** attendance rows that received a Q / Co-Q assignment */
  attendanceWithTypes: number[];
  typeAssignments: Record<PostType, number>;
}

export function createIdTracker(): IdTracker {
  return {
    eventInstanceIds: [],
    attendanceIds: [],
    attendanceWithTypes: [],
    typeAssignments: { Q: 0, 'Co-Q': 0 },
  };
}

function truncate(text: string, max = 100): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

/**
 * Insert each event group (in order), then its attendance and role rows.
 *
 * Any failed statement is rethrown as ImportWriteError naming the table and
 * the row it was writing; the caller's transaction takes care of undoing it.
 */
export async function writeBackblasts(
  store: BackblastStore,
  groups: readonly EventGroup[],
  tracker: IdTracker,
  log?: Logger
): Promise<IdTracker> {
  const typeIds = await store.findAttendanceTypeIds();
  for (const type of ['Q', 'Co-Q'] as const) {
    if (!typeIds.has(type)) {
      throw new ImportWriteError('attendance_x_attendance_types', `attendance type '${type}'`, new Error(`attendance_types has no '${type}' row`));
    }
  }

  log?.info(`\n[EVENT INSTANCES] Creating ${groups.length} unique event(s):`);

  for (const [index, group] of groups.entries()) {
    const [orgId, locationId, seriesId, startDate, startTime, name, description, backblast] = group.key;
    log?.info(`  [${index + 1}] ${describeEventKey(group.key)}, pax_count=${group.rows.length}`);
    if (description) log?.info(`      description: ${truncate(description)}`);
    if (backblast) log?.info(`      backblast: ${truncate(backblast)}`);

    let eventInstanceId: number;
    try {
      eventInstanceId = await store.insertEventInstance({
        orgId,
        locationId,
        seriesId,
        isActive: true,
        highlight: false,
        startDate,
        startTime,
        name,
        description,
        backblast,
        paxCount: group.rows.length,
      });
    } catch (error) {
      throw new ImportWriteError('event_instances', `event ${index + 1}: ${describeEventKey(group.key)}`, error);
    }
    tracker.eventInstanceIds.push(eventInstanceId);
    log?.info(`      -> event_instance_id: ${eventInstanceId}`);

    for (const row of group.rows) {
      let attendanceId: number;
      try {
        attendanceId = await store.insertAttendance({
          eventInstanceId,
          userId: row.userId,
          isPlanned: false,
        });
      } catch (error) {
        throw new ImportWriteError('attendance', `row ${row.rowNumber}, user_id ${row.userId}`, error);
      }
      tracker.attendanceIds.push(attendanceId);
      log?.info(`      row ${row.rowNumber}: user_id=${row.userId}, post_type=${row.postType ?? 'normal'} -> attendance_id ${attendanceId}`);

      if (row.postType === null) continue;

      const attendanceTypeId = typeIds.get(row.postType);
      if (attendanceTypeId === undefined) continue;
      try {
        await store.insertAttendanceType({ attendanceId, attendanceTypeId });
      } catch (error) {
        throw new ImportWriteError('attendance_x_attendance_types', `row ${row.rowNumber}, ${row.postType}`, error);
      }
      tracker.attendanceWithTypes.push(attendanceId);
      tracker.typeAssignments[row.postType]++;
    }
  }

  return tracker;
}
