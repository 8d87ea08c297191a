import { pgTable, serial, integer, varchar, text, boolean, timestamp } from 'drizzle-orm/pg-core';
import { orgs } from './orgs';

/**
 * Locations - physical workout sites, owned by an org
 */
export const locations = pgTable('locations', {
  id: serial('id').primaryKey(),
  orgId: integer('org_id')
    .notNull()
    .references(() => orgs.id),
  name: varchar('name').notNull(),
  description: text('description'),
  isActive: boolean('is_active').notNull().default(true),
  created: timestamp('created', { withTimezone: true }).defaultNow(),
  updated: timestamp('updated', { withTimezone: true }).defaultNow(),
});

export type Location = typeof locations.$inferSelect;
export type NewLocation = typeof locations.$inferInsert;
