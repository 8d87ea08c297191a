import { describe, it, expect } from 'vitest';
import { TransactionRollbackError } from 'drizzle-orm';
import { runInTransaction, type TransactionHost } from '../src/lib/transaction';

interface FakeTx {
  rollback(): never;
  writes: string[];
}

/** Mimics drizzle: a thrown error (including rollback()) discards the writes */
function fakeHost(): TransactionHost<FakeTx> & { committed: string[] } {
  const host = {
    committed: [] as string[],
    async transaction<R>(work: (tx: FakeTx) => Promise<R>): Promise<R> {
      const tx: FakeTx = {
        writes: [],
        rollback(): never {
          throw new TransactionRollbackError();
        },
      };
      const result = await work(tx);
      host.committed.push(...tx.writes);
      return result;
    },
  };
  return host;
}

describe('runInTransaction', () => {
  it('should commit and return the result', async () => {
    const host = fakeHost();

    const result = await runInTransaction(host, async (tx) => {
      tx.writes.push('event 1');
      return 42;
    }, { commit: true });

    expect(result).toBe(42);
    expect(host.committed).toEqual(['event 1']);
  });

  it('should roll back a dry run and still return the result', async () => {
    const host = fakeHost();

    const result = await runInTransaction(host, async (tx) => {
      tx.writes.push('event 1');
      return [101, 102];
    }, { commit: false });

    expect(result).toEqual([101, 102]);
    expect(host.committed).toEqual([]);
  });

  it('should propagate errors from the work', async () => {
    const host = fakeHost();

    await expect(runInTransaction(host, async () => {
      throw new Error('duplicate key value');
    }, { commit: false })).rejects.toThrow('duplicate key value');
    expect(host.committed).toEqual([]);
  });

  it('should propagate a rollback the caller did not ask for', async () => {
    const host = fakeHost();

    await expect(runInTransaction(host, async (tx) => tx.rollback(), { commit: true }))
      .rejects.toBeInstanceOf(TransactionRollbackError);
  });
});
