import { inArray } from 'drizzle-orm';
import type { Database, Executor, Transaction } from '../client';
import { runInTransaction, type TransactionOptions } from '../lib/transaction';
import {
  orgs,
  locations,
  events,
  users,
  eventInstances,
  attendance,
  attendanceTypes,
  attendanceXAttendanceTypes,
  type NewEventInstance,
  type NewAttendance,
  type NewAttendanceTypeAssignment,
} from '../schema';
import type { ReferenceLookup, ReferenceTable } from './references';
import { POST_TYPES, type PostType } from './rows';

/**
 * Everything the backblast import reads or writes, bound to one executor
 * (a connection or an open transaction).
 */
export interface BackblastStore extends ReferenceLookup {
  /** IDs of the Q / Co-Q rows in attendance_types, keyed by type name */
  findAttendanceTypeIds(): Promise<Map<PostType, number>>;
  insertEventInstance(record: NewEventInstance): Promise<number>;
  insertAttendance(record: NewAttendance): Promise<number>;
  insertAttendanceType(record: NewAttendanceTypeAssignment): Promise<void>;
}

export interface BackblastDatabase {
  /** Read-only lookups outside any write transaction */
  lookup: ReferenceLookup;
  /** Run `work` in one transaction; see runInTransaction for the commit rules */
  transaction<T>(work: (store: BackblastStore) => Promise<T>, options: TransactionOptions): Promise<T>;
}

export function createBackblastStore(db: Executor): BackblastStore {
  return {
    async findExistingIds(table: ReferenceTable, ids: readonly number[]) {
      if (ids.length === 0) return new Set<number>();
      const rows = await selectIds(db, table, [...ids]);
      return new Set(rows.map((row) => row.id));
    },

    async findAttendanceTypeIds() {
      const rows = await db
        .select({ id: attendanceTypes.id, type: attendanceTypes.type })
        .from(attendanceTypes)
        .where(inArray(attendanceTypes.type, [...POST_TYPES]));

      const ids = new Map<PostType, number>();
      for (const row of rows) {
        if (row.type === 'Q' || row.type === 'Co-Q') ids.set(row.type, row.id);
      }
      return ids;
    },

    async insertEventInstance(record) {
      const [row] = await db
        .insert(eventInstances)
        .values(record)
        .returning({ id: eventInstances.id });
      if (!row) throw new Error('INSERT INTO event_instances returned no id');
      return row.id;
    },

    async insertAttendance(record) {
      const [row] = await db
        .insert(attendance)
        .values(record)
        .returning({ id: attendance.id });
      if (!row) throw new Error('INSERT INTO attendance returned no id');
      return row.id;
    },

    async insertAttendanceType(record) {
      await db.insert(attendanceXAttendanceTypes).values(record);
    },
  };
}

async function selectIds(db: Executor, table: ReferenceTable, ids: number[]): Promise<Array<{ id: number }>> {
  switch (table) {
    case 'orgs':
      return db.select({ id: orgs.id }).from(orgs).where(inArray(orgs.id, ids));
    case 'locations':
      return db.select({ id: locations.id }).from(locations).where(inArray(locations.id, ids));
    case 'events':
      return db.select({ id: events.id }).from(events).where(inArray(events.id, ids));
    case 'users':
      return db.select({ id: users.id }).from(users).where(inArray(users.id, ids));
  }
}

export function createBackblastDatabase(db: Database): BackblastDatabase {
  return {
    lookup: createBackblastStore(db),
    transaction<T>(work: (store: BackblastStore) => Promise<T>, options: TransactionOptions) {
      return runInTransaction<Transaction, T>(db, (tx) => work(createBackblastStore(tx)), options);
    },
  };
}
