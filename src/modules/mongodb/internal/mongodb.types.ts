import type { Db } from 'mongodb';

/** Collection holding per-collection sequences for numeric primary keys. */
export const COUNTERS_COLLECTION = 'counters' as const;

/** Signature for a function that returns a Db instance for a given name. */
export type GetDb = (dbName?: string) => Promise<Db>;

