import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { runBackblastImport } from '../src/backblasts/run';
import type { ImportArgs } from '../src/lib/args';
import type { CsvRecord } from '../src/lib/csv';
import { createMemoryLog, FakeBackblastDatabase, type MemoryLog } from './helpers/fake-db';
import { backblastRecord, HEADER, KNOWN_REFERENCES, toCsv } from './helpers/fixtures';

const NOW = new Date('2024-04-01T12:00:00Z');

describe('runBackblastImport', () => {
  let dir: string;
  let db: FakeBackblastDatabase;
  let log: MemoryLog;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'backblast-run-'));
    db = new FakeBackblastDatabase(KNOWN_REFERENCES);
    log = createMemoryLog();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function argsFor(records: CsvRecord[], overrides: Partial<ImportArgs> = {}): ImportArgs {
    const inputCsv = join(dir, 'backblasts.csv');
    writeFileSync(inputCsv, toCsv(HEADER, records));
    return {
      inputCsv,
      environment: 'staging',
      commit: false,
      logFile: join(dir, 'import.log'),
      outputDir: dir,
      help: false,
      ...overrides,
    };
  }

  const backoutPath = () => join(dir, 'backout_staging_20240401_120000.sql');

  const TWO_EVENTS = [
    backblastRecord({ user_id: '1', post_type: 'Q' }),
    backblastRecord({ user_id: '2' }),
    backblastRecord({ user_id: '3', post_type: 'Q', description: 'Hill repeats, then more hills' }),
  ];

  it('should dry-run a valid file and still write the backout script', async () => {
    const result = await runBackblastImport(argsFor(TWO_EVENTS), { database: db, log, now: () => NOW });

    expect(result.exitCode).toBe(0);
    expect(result.status).toBe('rolled-back');
    expect(result.summary).toMatchObject({ rowsProcessed: 3, uniqueEvents: 2, attendanceRecords: 3, qAssignments: 2 });
    expect(result.backoutFile).toBe(backoutPath());
    const sql = readFileSync(backoutPath(), 'utf-8');
    expect(sql).toContain('DELETE FROM event_instances WHERE id IN (101,102);');
    expect(log.lines).toContain('IMPORT SUMMARY');
    expect(log.lines).toContain('\n✓ DRY RUN: Import completed successfully (transaction rolled back).');
    expect(db.tables.eventInstances).toEqual([]);
  });

  it('should commit when asked', async () => {
    const result = await runBackblastImport(argsFor(TWO_EVENTS, { commit: true }), { database: db, log, now: () => NOW });

    expect(result.exitCode).toBe(0);
    expect(result.status).toBe('committed');
    expect(db.tables.eventInstances.map((event) => event.description)).toEqual([
      'Hill repeats',
      'Hill repeats, then more hills',
    ]);
  });

  it('should stop on validation errors but still write the summary and an empty backout', async () => {
    const args = argsFor([
      backblastRecord({ user_id: '1', post_type: 'Q' }),
      backblastRecord({ user_id: '2', post_type: 'Q' }),
      backblastRecord({ user_id: '3' }),
    ], { commit: true });

    const result = await runBackblastImport(args, { database: db, log, now: () => NOW });

    expect(result.exitCode).toBe(1);
    expect(result.status).toBe('invalid');
    expect(result.summary.rowsProcessed).toBe(3);
    expect(result.summary.uniqueEvents).toBe(0);
    expect(log.errors).toContain('\n[ERROR] Consistency validation failed with 1 issue(s):');
    expect(readFileSync(backoutPath(), 'utf-8')).not.toContain('DELETE FROM');
    expect(db.transactions).toEqual([]);
  });

  it('should report the rows inserted before a database failure in the backout', async () => {
    db.failure = { table: 'event_instances', onInsert: 2 };

    const result = await runBackblastImport(argsFor(TWO_EVENTS, { commit: true }), { database: db, log, now: () => NOW });

    expect(result.exitCode).toBe(1);
    expect(result.status).toBe('failed');
    expect(result.summary.uniqueEvents).toBe(1);
    expect(log.errors).toContain('  Step: event_instances');
    const sql = readFileSync(backoutPath(), 'utf-8');
    expect(sql).toContain('DELETE FROM event_instances WHERE id IN (101);');
    expect(sql).toContain('DELETE FROM attendance WHERE id IN (501,502);');
    expect(db.tables.eventInstances).toEqual([]);
  });

  it('should fail cleanly when the input file is missing', async () => {
    const args: ImportArgs = {
      inputCsv: join(dir, 'nope.csv'),
      environment: 'prod',
      commit: false,
      logFile: join(dir, 'import.log'),
      outputDir: dir,
      help: false,
    };

    const result = await runBackblastImport(args, { database: db, log, now: () => NOW });

    expect(result.exitCode).toBe(1);
    expect(result.status).toBe('failed');
    expect(result.backoutFile).toBe(join(dir, 'backout_prod_20240401_120000.sql'));
  });
});
