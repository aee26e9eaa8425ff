import { Logger } from '@nestjs/common';
import { MongoClient, type Db, type MongoClientOptions } from 'mongodb';
import {
  buildMongoUri,
  loadMongoConfig,
  maskMongoUri,
  type MongoConfig,
} from '../../../infra/mongo/mongo.config';
import type { GetDb } from './mongodb.types';

/**
 * Lazy singleton for a MongoDB client.
 * - Config is read on first use, after ConfigModule has loaded .env.
 * - Nothing connects until the first getClient() call.
 * - Concurrent first calls share one connect attempt.
 * - A failed attempt is forgotten so the next call retries.
 */
class LazyMongoClient {
  private readonly logger = new Logger('MongoClient');
  private client?: MongoClient;
  private connecting?: Promise<MongoClient>;
  private cfg?: MongoConfig;

  constructor(private readonly load: () => MongoConfig) {}

  private config(): MongoConfig {
    this.cfg ??= this.load();
    return this.cfg;
  }

  public get defaultDbName(): string {
    return this.config().dbName;
  }

  public async getClient(): Promise<MongoClient> {
    if (this.client) return this.client;
    if (this.connecting) return this.connecting;

    const uri = buildMongoUri(this.config());
    const options: MongoClientOptions = { ignoreUndefined: true };

    this.connecting = (async () => {
      const created = new MongoClient(uri, options);
      await created.connect();
      this.logger.log(`Connected to ${maskMongoUri(uri)}`);
      this.client = created;
      this.connecting = undefined;
      return created;
    })();

    try {
      return await this.connecting;
    } catch (err) {
      this.connecting = undefined;
      this.client = undefined;
      if (err instanceof Error) throw err;
      throw new Error('Failed to connect to MongoDB');
    }
  }

  public async getDb(dbName?: string): Promise<Db> {
    const client = await this.getClient();
    return client.db(dbName ?? this.defaultDbName);
  }

  /** Close client if connected (idempotent). */
  public async close(): Promise<void> {
    const current = this.client;
    if (!current) return;
    this.client = undefined;
    this.connecting = undefined;
    await current.close();
  }
}

const lazyClient = new LazyMongoClient(() => loadMongoConfig());

export function defaultDbName(): string {
  return lazyClient.defaultDbName;
}

export const getDb: GetDb = (dbName?: string): Promise<Db> =>
  lazyClient.getDb(dbName);

export async function closeMongoClient(): Promise<void> {
  await lazyClient.close();
}
