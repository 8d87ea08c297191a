import { pgTable, serial, integer, varchar, text, boolean, date, timestamp } from 'drizzle-orm/pg-core';
import { orgs } from './orgs';
import { locations } from './locations';

/**
 * Events - recurring event series (e.g. "Tuesday Bootcamp at The Yard")
 *
 * A backblast row's series_id points here. Individual occurrences live in
 * event_instances.
 */
export const events = pgTable('events', {
  id: serial('id').primaryKey(),
  orgId: integer('org_id')
    .notNull()
    .references(() => orgs.id),
  locationId: integer('location_id').references(() => locations.id),
  name: varchar('name').notNull(),
  description: text('description'),
  isActive: boolean('is_active').notNull().default(true),
  startDate: date('start_date'),
  endDate: date('end_date'),
  startTime: varchar('start_time'),
  endTime: varchar('end_time'),
  created: timestamp('created', { withTimezone: true }).defaultNow(),
  updated: timestamp('updated', { withTimezone: true }).defaultNow(),
});

export type EventSeries = typeof events.$inferSelect;
export type NewEventSeries = typeof events.$inferInsert;
