import { pgTable, serial, integer, varchar, text, boolean, timestamp, primaryKey, unique } from 'drizzle-orm/pg-core';
import { eventInstances } from './event-instances';
import { users } from './users';

/**
 * Attendance - one row per PAX per event instance
 */
export const attendance = pgTable('attendance', {
  id: serial('id').primaryKey(),
  eventInstanceId: integer('event_instance_id')
    .notNull()
    .references(() => eventInstances.id),
  userId: integer('user_id')
    .notNull()
    .references(() => users.id),
  isPlanned: boolean('is_planned').notNull().default(false),
  created: timestamp('created', { withTimezone: true }).defaultNow(),
  updated: timestamp('updated', { withTimezone: true }).defaultNow(),
}, (table) => [
  unique('attendance_event_instance_id_user_id_is_planned_key')
    .on(table.eventInstanceId, table.userId, table.isPlanned),
]);

/**
 * Attendance Types - lookup of roles ('PAX', 'Q', 'Co-Q')
 */
export const attendanceTypes = pgTable('attendance_types', {
  id: serial('id').primaryKey(),
  type: varchar('type').notNull(),
  description: text('description'),
});

/**
 * Role assignments for an attendance row. Plain PAX have no row here.
 */
export const attendanceXAttendanceTypes = pgTable('attendance_x_attendance_types', {
  attendanceId: integer('attendance_id')
    .notNull()
    .references(() => attendance.id),
  attendanceTypeId: integer('attendance_type_id')
    .notNull()
    .references(() => attendanceTypes.id),
}, (table) => [
  primaryKey({ columns: [table.attendanceId, table.attendanceTypeId] }),
]);

export type Attendance = typeof attendance.$inferSelect;
export type NewAttendance = typeof attendance.$inferInsert;
export type AttendanceType = typeof attendanceTypes.$inferSelect;
export type AttendanceTypeAssignment = typeof attendanceXAttendanceTypes.$inferSelect;
export type NewAttendanceTypeAssignment = typeof attendanceXAttendanceTypes.$inferInsert;
