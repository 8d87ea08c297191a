import type { ImportRow } from './rows';

/**
 * Natural key of an event: rows agreeing on all eight fields are the same
 * workout. Built from the normalized row, so blank and absent optional values
 * (both null) always match each other.
 */
export type EventKey = readonly [
  orgId: number,
  locationId: number,
  seriesId: number | null,
  startDate: string,
  startTime: string | null,
  name: string,
  description: string | null,
  backblast: string | null,
];

export interface EventGroup {
  /** Serialized key, usable as a Map key */
  id: string;
  key: EventKey;
  rows: ImportRow[];
}

export function eventKeyOf(row: ImportRow): EventKey {
  return [
    row.orgId,
    row.locationId,
    row.seriesId,
    row.startDate,
    row.startTime,
    row.name,
    row.description,
    row.backblast,
  ];
}

export function serializeEventKey(key: EventKey): string {
  return JSON.stringify(key);
}

/**
 * Partition rows by event key. Groups come back in the order their key first
 * appears in the input; rows keep their input order within a group.
 */
export function groupByEventKey(rows: readonly ImportRow[]): EventGroup[] {
  const groups = new Map<string, EventGroup>();

  for (const row of rows) {
    const key = eventKeyOf(row);
    const id = serializeEventKey(key);
    const group = groups.get(id);
    if (group) {
      group.rows.push(row);
    } else {
      groups.set(id, { id, key, rows: [row] });
    }
  }

  return [...groups.values()];
}

export function describeEventKey(key: EventKey): string {
  const [orgId, locationId, seriesId, startDate, startTime, name] = key;
  const series = seriesId === null ? '' : `, Series ${seriesId}`;
  return `${startDate} ${startTime ?? 'N/A'} - ${name} (Org ${orgId}, Location ${locationId}${series})`;
}
