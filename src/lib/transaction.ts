import { TransactionRollbackError } from 'drizzle-orm';

export interface TransactionOptions {
  /** false = dry run: do the work, then roll back */
  commit: boolean;
}

/** What runInTransaction needs from a drizzle database */
export interface TransactionHost<Tx extends { rollback(): never }> {
  transaction<R>(work: (tx: Tx) => Promise<R>): Promise<R>;
}

/**
 * Run `work` inside one transaction and commit or roll back afterwards.
 *
 * The result of `work` is returned on both paths, so callers can read back
 * identifiers that a rolled-back transaction will never expose again.
 * Errors thrown by `work` roll back and propagate.
 */
export async function runInTransaction<Tx extends { rollback(): never }, T>(
  db: TransactionHost<Tx>,
  work: (tx: Tx) => Promise<T>,
  options: TransactionOptions
): Promise<T> {
  const holder: { outcome?: { value: T } } = {};

  try {
    await db.transaction(async (tx) => {
      holder.outcome = { value: await work(tx) };
      if (!options.commit) {
        tx.rollback();
      }
    });
  } catch (error) {
    if (options.commit || !(error instanceof TransactionRollbackError) || !holder.outcome) {
      throw error;
    }
  }

  if (!holder.outcome) {
    throw new Error('Transaction finished without a result');
  }
  return holder.outcome.value;
}
