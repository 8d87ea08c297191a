import { pgTable, serial, integer, varchar, text, boolean, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Orgs - Nation, regions, sectors and AOs share this table
 *
 * `org_type` distinguishes the level ('nation', 'region', 'area', 'ao').
 * Read-only for the import tools: they only check that referenced IDs exist.
 */
export const orgs = pgTable('orgs', {
  id: serial('id').primaryKey(),
  parentId: integer('parent_id'),
  orgType: varchar('org_type').notNull(),
  name: varchar('name').notNull(),
  description: text('description'),
  isActive: boolean('is_active').notNull().default(true),
  created: timestamp('created', { withTimezone: true }).defaultNow(),
  updated: timestamp('updated', { withTimezone: true }).defaultNow(),
}, (table) => [
  index('orgs_parent_id_idx').on(table.parentId),
  index('orgs_org_type_idx').on(table.orgType),
]);

export type Org = typeof orgs.$inferSelect;
export type NewOrg = typeof orgs.$inferInsert;
