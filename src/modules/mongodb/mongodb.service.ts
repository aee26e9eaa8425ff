import { Injectable, OnModuleDestroy } from '@nestjs/common';
import type { Collection, Db, Document } from 'mongodb';
import {
  closeMongoClient,
  defaultDbName,
  getDb,
} from './internal/mongodb.client';
import { StoreActionError } from '../../lib/errors/StoreActionError';
import { isNonEmptyString } from '../../lib/utils/strings';

@Injectable()
export class MongodbService implements OnModuleDestroy {
  /**
   * Returns a connected native driver Db handle.
   */
  public async getDb(dbName?: string): Promise<Db> {
    const name = dbName ?? defaultDbName();
    try {
      return await getDb(name);
    } catch (err) {
      throw StoreActionError.wrap(err, { operation: 'getDb', dbName: name });
    }
  }

  /**
   * Returns a native driver Collection<T>. No schema enforcement here.
   */
  public async getCollection<T extends Document = Document>(
    collection: string,
    dbName?: string,
  ): Promise<Collection<T>> {
    const name = dbName ?? defaultDbName();
    if (!isNonEmptyString(collection)) {
      throw new StoreActionError('Collection name must be a non-empty string', {
        operation: 'getCollection',
        dbName: name,
        argsPreview: { collection: String(collection) },
      });
    }

    try {
      const db = await getDb(name);
      return db.collection<T>(collection);
    } catch (err) {
      throw StoreActionError.wrap(err, {
        operation: 'getCollection',
        dbName: name,
        collection,
      });
    }
  }

  public async onModuleDestroy(): Promise<void> {
    await closeMongoClient();
  }
}
