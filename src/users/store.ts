import { and, eq, inArray, sql } from 'drizzle-orm';
import type { Database, Executor, Transaction } from '../client';
import { runInTransaction, type TransactionOptions } from '../lib/transaction';
import { orgs, users } from '../schema';

export interface UserUpsert {
  f3Name: string;
  firstName: string | null;
  lastName: string | null;
  email: string;
  homeRegionId: number;
}

export interface RegionLookup {
  /** Subset of `ids` that are orgs of type 'region' */
  findRegionIds(ids: readonly number[]): Promise<Set<number>>;
}

export interface UserStore extends RegionLookup {
  /** Insert or update by email; returns the user id */
  upsertUser(user: UserUpsert): Promise<number>;
}

export interface UserDatabase {
  lookup: RegionLookup;
  transaction<T>(work: (store: UserStore) => Promise<T>, options: TransactionOptions): Promise<T>;
}

export function createUserStore(db: Executor): UserStore {
  return {
    async findRegionIds(ids) {
      if (ids.length === 0) return new Set<number>();
      const rows = await db
        .select({ id: orgs.id })
        .from(orgs)
        .where(and(inArray(orgs.id, [...ids]), eq(orgs.orgType, 'region')));
      return new Set(rows.map((row) => row.id));
    },

    async upsertUser(user) {
      // Blank CSV values never wipe what is already stored
      const [row] = await db
        .insert(users)
        .values({ ...user, status: 'active' })
        .onConflictDoUpdate({
          target: users.email,
          set: {
            f3Name: sql`coalesce(excluded.f3_name, ${users.f3Name})`,
            firstName: sql`coalesce(excluded.first_name, ${users.firstName})`,
            lastName: sql`coalesce(excluded.last_name, ${users.lastName})`,
            homeRegionId: sql`coalesce(excluded.home_region_id, ${users.homeRegionId})`,
            updated: new Date(),
          },
        })
        .returning({ id: users.id });
      if (!row) throw new Error(`Upsert of ${user.email} returned no id`);
      return row.id;
    },
  };
}

export function createUserDatabase(db: Database): UserDatabase {
  return {
    lookup: createUserStore(db),
    transaction<T>(work: (store: UserStore) => Promise<T>, options: TransactionOptions) {
      return runInTransaction<Transaction, T>(db, (tx) => work(createUserStore(tx)), options);
    },
  };
}
