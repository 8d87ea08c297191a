import { pgTable, serial, integer, varchar, text, boolean, date, timestamp, index } from 'drizzle-orm/pg-core';
import { orgs } from './orgs';
import { locations } from './locations';
import { events } from './events';

/**
 * Event Instances - a single workout that happened (or will happen)
 *
 * Backblast imports create one row per distinct event key in the CSV.
 */
export const eventInstances = pgTable('event_instances', {
  id: serial('id').primaryKey(),
  orgId: integer('org_id')
    .notNull()
    .references(() => orgs.id),
  locationId: integer('location_id').references(() => locations.id),
  seriesId: integer('series_id').references(() => events.id),
  isActive: boolean('is_active').notNull().default(true),
  highlight: boolean('highlight').notNull().default(false),
  startDate: date('start_date').notNull(),
  startTime: varchar('start_time'),  // HHMM, 24-hour
  name: varchar('name').notNull(),
  description: text('description'),
  backblast: text('backblast'),
  paxCount: integer('pax_count'),
  created: timestamp('created', { withTimezone: true }).defaultNow(),
  updated: timestamp('updated', { withTimezone: true }).defaultNow(),
}, (table) => [
  index('event_instances_org_id_idx').on(table.orgId),
  index('event_instances_start_date_idx').on(table.startDate),
]);

export type EventInstance = typeof eventInstances.$inferSelect;
export type NewEventInstance = typeof eventInstances.$inferInsert;
