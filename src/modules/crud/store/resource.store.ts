import type { OrderSpec, Predicate } from '../../../lib/query/types';
import type { ResourceShape } from '../../../lib/resources/introspect';
import type { PrimaryKey, Row } from '../../../lib/resources/schema';

export const RESOURCE_STORE_FACTORY = Symbol('RESOURCE_STORE_FACTORY');

/** Passed through to the store client untouched. */
export interface StoreCallOptions {
  readonly signal?: AbortSignal;
}

export interface FindQuery {
  readonly predicates: ReadonlyArray<Predicate>;
  /** Never empty: callers fall back to the primary key. */
  readonly orders: ReadonlyArray<OrderSpec>;
  readonly limit: number;
  readonly offset: number;
}

/**
 * Storage for one resource. Rows are keyed by column name; the primary
 * column holds the key. Every method is a single store request and
 * surfaces failures as StoreActionError.
 */
export interface ResourceStore {
  count(predicates: ReadonlyArray<Predicate>, options?: StoreCallOptions): Promise<number>;
  find(query: FindQuery, options?: StoreCallOptions): Promise<Row[]>;
  /** Inserts a row without primary key; resolves to the key the store assigned. */
  insert(row: Readonly<Row>, options?: StoreCallOptions): Promise<PrimaryKey>;
  /** Resolves to the number of matched rows. */
  update(key: PrimaryKey, changes: Readonly<Row>, options?: StoreCallOptions): Promise<number>;
  /** Resolves to the number of deleted rows. */
  delete(key: PrimaryKey, options?: StoreCallOptions): Promise<number>;
}

export interface ResourceStoreFactory {
  forResource(shape: ResourceShape): ResourceStore;
}
