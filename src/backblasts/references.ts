import type { ImportRow } from './rows';

/** Tables a backblast row points into; `events` holds the series. */
export type ReferenceTable = 'orgs' | 'locations' | 'events' | 'users';

export const REFERENCE_TABLES: readonly ReferenceTable[] = ['orgs', 'locations', 'events', 'users'];

const COLUMN_FOR_TABLE: Record<ReferenceTable, string> = {
  orgs: 'org_id',
  locations: 'location_id',
  events: 'series_id',
  users: 'user_id',
};

export type ReferenceIds = Record<ReferenceTable, number[]>;

export interface ReferenceLookup {
  /** Return the subset of `ids` present in `table` */
  findExistingIds(table: ReferenceTable, ids: readonly number[]): Promise<Set<number>>;
}

/**
 * Distinct IDs per reference table, sorted ascending. Rows without a series
 * contribute nothing to `events`.
 */
export function collectReferenceIds(rows: readonly ImportRow[]): ReferenceIds {
  const sets: Record<ReferenceTable, Set<number>> = {
    orgs: new Set(),
    locations: new Set(),
    events: new Set(),
    users: new Set(),
  };

  for (const row of rows) {
    sets.orgs.add(row.orgId);
    sets.locations.add(row.locationId);
    if (row.seriesId !== null) sets.events.add(row.seriesId);
    sets.users.add(row.userId);
  }

  const sorted = (ids: Set<number>) => [...ids].sort((a, b) => a - b);
  return {
    orgs: sorted(sets.orgs),
    locations: sorted(sets.locations),
    events: sorted(sets.events),
    users: sorted(sets.users),
  };
}

/**
 * Check every table (never stopping at the first gap) and return what is
 * missing from each, sorted.
 */
export async function findMissingReferences(lookup: ReferenceLookup, ids: ReferenceIds): Promise<ReferenceIds> {
  const missing: ReferenceIds = { orgs: [], locations: [], events: [], users: [] };

  for (const table of REFERENCE_TABLES) {
    if (ids[table].length === 0) continue;
    const found = await lookup.findExistingIds(table, ids[table]);
    missing[table] = ids[table].filter((id) => !found.has(id));
  }

  return missing;
}

export function describeMissingReferences(missing: ReferenceIds): string[] {
  return REFERENCE_TABLES
    .filter((table) => missing[table].length > 0)
    .map((table) => `Missing ${COLUMN_FOR_TABLE[table]}(s): [${missing[table].join(', ')}]`);
}

export function describeReferenceIds(ids: ReferenceIds): string[] {
  return REFERENCE_TABLES.map(
    (table) => `Checking ${ids[table].length} unique ${COLUMN_FOR_TABLE[table]}(s): [${ids[table].join(', ')}]`
  );
}
