import { pgTable, serial, integer, varchar, timestamp } from 'drizzle-orm/pg-core';
import { orgs } from './orgs';

/**
 * Users - PAX. Email is the natural key used by the bulk user import.
 */
export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  f3Name: varchar('f3_name'),
  firstName: varchar('first_name'),
  lastName: varchar('last_name'),
  email: varchar('email').notNull().unique(),
  homeRegionId: integer('home_region_id').references(() => orgs.id),
  status: varchar('status').notNull().default('active'),
  created: timestamp('created', { withTimezone: true }).defaultNow(),
  updated: timestamp('updated', { withTimezone: true }).defaultNow(),
});

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
