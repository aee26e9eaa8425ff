import { randomUUID } from 'node:crypto';
import { Injectable } from '@nestjs/common';
import { ObjectId, type Collection, type Document, type Sort } from 'mongodb';
import { MongodbService } from '../../mongodb/mongodb.service';
import { COUNTERS_COLLECTION } from '../../mongodb/internal/mongodb.types';
import { StoreActionError, type StoreOperation } from '../../../lib/errors/StoreActionError';
import { parseBoolValue } from '../../../lib/query/filter.grammar';
import { LIKE_REGEX_FLAGS, likePatternToRegexSource } from '../../../lib/query/like.pattern';
import type { OrderSpec, Predicate } from '../../../lib/query/types';
import type { ResourceShape } from '../../../lib/resources/introspect';
import type { FieldKind, PrimaryKey, Row } from '../../../lib/resources/schema';
import { isHex24 } from '../../../lib/utils/strings';
import type {
  FindQuery,
  ResourceStore,
  ResourceStoreFactory,
  StoreCallOptions,
} from './resource.store';

/** Documents keep the primary key in `_id`, typed by the key kind. */
interface ResourceDoc extends Document {
  _id: ObjectId | PrimaryKey;
}

interface CounterDoc {
  _id: string;
  seq: number;
}

/* -----------------------------
   Predicate translation
   ----------------------------- */

/**
 * Convert a raw query operand to the column's stored type. Operands that do
 * not parse stay strings and simply match nothing of another type.
 */
export function coerceOperand(kind: FieldKind | undefined, raw: string): unknown {
  switch (kind) {
    case 'number': {
      const n = Number(raw);
      return raw.trim() !== '' && Number.isFinite(n) ? n : raw;
    }
    case 'boolean':
      return parseBoolValue(raw) ?? raw;
    case 'date': {
      const d = new Date(raw);
      return Number.isNaN(d.getTime()) ? raw : d;
    }
    case 'objectId':
      return isHex24(raw) ? new ObjectId(raw) : raw;
    default:
      return raw;
  }
}

function fieldPath(shape: ResourceShape, column: string): string {
  return column === shape.primary.column ? '_id' : column;
}

function predicateToFilter(shape: ResourceShape, p: Predicate): Document {
  const path = fieldPath(shape, p.column);
  const kind = shape.kinds.get(p.column);
  switch (p.kind) {
    case 'compare': {
      const value = coerceOperand(kind, p.value);
      return p.op === 'eq' ? { [path]: value } : { [path]: { [`$${p.op}`]: value } };
    }
    case 'like':
      return {
        [path]: { $regex: likePatternToRegexSource(p.pattern), $options: LIKE_REGEX_FLAGS },
      };
    case 'in':
      return {
        [path]: {
          [p.negated ? '$nin' : '$in']: p.values.map((v) => coerceOperand(kind, v)),
        },
      };
    case 'null':
      // `null` also matches documents where the field is missing
      return p.isNull ? { [path]: null } : { [path]: { $ne: null } };
  }
}

export function toMongoFilter(
  shape: ResourceShape,
  predicates: ReadonlyArray<Predicate>,
): Document {
  if (predicates.length === 0) return {};
  return { $and: predicates.map((p) => predicateToFilter(shape, p)) };
}

export function toMongoSort(shape: ResourceShape, orders: ReadonlyArray<OrderSpec>): Sort {
  const sort: Record<string, 1 | -1> = {};
  for (const o of orders) sort[fieldPath(shape, o.column)] = o.descending ? -1 : 1;
  return sort;
}

/* -----------------------------
   Store
   ----------------------------- */

export class MongoResourceStore implements ResourceStore {
  public constructor(
    private readonly mongo: MongodbService,
    private readonly shape: ResourceShape,
  ) {}

  public async count(
    predicates: ReadonlyArray<Predicate>,
    options: StoreCallOptions = {},
  ): Promise<number> {
    const filter = toMongoFilter(this.shape, predicates);
    return this.run('countDocuments', options, (col) => col.countDocuments(filter), {
      predicates: predicates.length,
    });
  }

  public async find(query: FindQuery, options: StoreCallOptions = {}): Promise<Row[]> {
    const filter = toMongoFilter(this.shape, query.predicates);
    const sort = toMongoSort(this.shape, query.orders);
    const docs = await this.run(
      'find',
      options,
      (col) => col.find(filter).sort(sort).skip(query.offset).limit(query.limit).toArray(),
      { predicates: query.predicates.length, limit: query.limit, offset: query.offset },
    );
    return docs.map((doc) => this.toRow(doc));
  }

  public async insert(row: Readonly<Row>, options: StoreCallOptions = {}): Promise<PrimaryKey> {
    const { id, key } = await this.allocateKey(options);
    const doc: ResourceDoc = { ...this.toDocument(row), _id: id };
    await this.run('insertOne', options, (col) => col.insertOne(doc));
    return key;
  }

  public async update(
    key: PrimaryKey,
    changes: Readonly<Row>,
    options: StoreCallOptions = {},
  ): Promise<number> {
    const set = this.toDocument(changes);
    const res = await this.run(
      'updateOne',
      options,
      (col) => col.updateOne({ _id: this.keyValue(key) }, { $set: set }),
      { columns: Object.keys(set).join(',') },
    );
    return res.matchedCount;
  }

  public async delete(key: PrimaryKey, options: StoreCallOptions = {}): Promise<number> {
    const res = await this.run('deleteOne', options, (col) =>
      col.deleteOne({ _id: this.keyValue(key) }),
    );
    return res.deletedCount;
  }

  /* ---------------- helpers ---------------- */

  private async run<R>(
    operation: StoreOperation,
    options: StoreCallOptions,
    fn: (col: Collection<ResourceDoc>) => Promise<R>,
    argsPreview?: Record<string, unknown>,
  ): Promise<R> {
    options.signal?.throwIfAborted();
    try {
      const col = await this.mongo.getCollection<ResourceDoc>(this.shape.collection);
      return await fn(col);
    } catch (err) {
      throw StoreActionError.wrap(err, {
        operation,
        resource: this.shape.resource,
        collection: this.shape.collection,
        argsPreview,
      });
    }
  }

  private keyValue(key: PrimaryKey): ObjectId | PrimaryKey {
    if (this.shape.primary.kind === 'objectId' && typeof key === 'string' && isHex24(key)) {
      return new ObjectId(key);
    }
    return key;
  }

  private async allocateKey(
    options: StoreCallOptions,
  ): Promise<{ id: ObjectId | string | number; key: PrimaryKey }> {
    switch (this.shape.primary.kind) {
      case 'number': {
        const seq = await this.nextSequence(options);
        return { id: seq, key: seq };
      }
      case 'objectId': {
        const id = new ObjectId();
        return { id, key: id.toHexString() };
      }
      default: {
        const id = randomUUID();
        return { id, key: id };
      }
    }
  }

  private async nextSequence(options: StoreCallOptions): Promise<number> {
    options.signal?.throwIfAborted();
    try {
      const counters = await this.mongo.getCollection<CounterDoc>(COUNTERS_COLLECTION);
      const doc = await counters.findOneAndUpdate(
        { _id: this.shape.collection },
        { $inc: { seq: 1 } },
        { upsert: true, returnDocument: 'after' },
      );
      if (!doc) throw new Error(`No sequence returned for ${this.shape.collection}`);
      return doc.seq;
    } catch (err) {
      throw StoreActionError.wrap(err, {
        operation: 'nextSequence',
        resource: this.shape.resource,
        collection: COUNTERS_COLLECTION,
      });
    }
  }

  private toDocument(row: Readonly<Row>): Document {
    const doc: Document = {};
    for (const [column, value] of Object.entries(row)) {
      if (column === this.shape.primary.column) continue;
      doc[column] =
        this.shape.kinds.get(column) === 'objectId' && typeof value === 'string' && isHex24(value)
          ? new ObjectId(value)
          : value;
    }
    return doc;
  }

  private toRow(doc: Document): Row {
    const row: Row = {};
    for (const [k, v] of Object.entries(doc)) {
      const column = k === '_id' ? this.shape.primary.column : k;
      row[column] = v instanceof ObjectId ? v.toHexString() : v;
    }
    return row;
  }
}

@Injectable()
export class MongoResourceStoreFactory implements ResourceStoreFactory {
  public constructor(private readonly mongo: MongodbService) {}

  public forResource(shape: ResourceShape): ResourceStore {
    return new MongoResourceStore(this.mongo, shape);
  }
}
