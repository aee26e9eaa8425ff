import { Test, TestingModule } from '@nestjs/testing';
import { ObjectId } from 'mongodb';
import { StoreActionError } from '../../../lib/errors/StoreActionError';
import { introspect, type ResourceShape } from '../../../lib/resources/introspect';
import { defineResource, field } from '../../../lib/resources/schema';
import { MongodbService } from '../../mongodb/mongodb.service';
import { CrudService } from '../crud.service';
import { usersResource } from '../../users/users.resource';
import {
  coerceOperand,
  MongoResourceStoreFactory,
  toMongoFilter,
  toMongoSort,
} from '../store/mongo.resource.store';

/* -----------------------------
   Mock builders
   ----------------------------- */

type Sort = Record<string, 1 | -1>;

interface MockCursor {
  sort: jest.Mock<MockCursor, [Sort]>;
  skip: jest.Mock<MockCursor, [number]>;
  limit: jest.Mock<MockCursor, [number]>;
  toArray: jest.Mock<Promise<Record<string, unknown>[]>, []>;
}

function makeCursor(docs: Record<string, unknown>[]): MockCursor {
  const self: MockCursor = {
    sort: jest.fn<MockCursor, [Sort]>(() => self),
    skip: jest.fn<MockCursor, [number]>(() => self),
    limit: jest.fn<MockCursor, [number]>(() => self),
    toArray: jest.fn(async () => {
      await Promise.resolve();
      return docs;
    }),
  };
  return self;
}

interface MockCollection {
  countDocuments: jest.Mock;
  find: jest.Mock;
  insertOne: jest.Mock;
  updateOne: jest.Mock;
  deleteOne: jest.Mock;
  findOneAndUpdate: jest.Mock;
}

function makeCollection(): MockCollection {
  return {
    countDocuments: jest.fn(),
    find: jest.fn(),
    insertOne: jest.fn(),
    updateOne: jest.fn(),
    deleteOne: jest.fn(),
    findOneAndUpdate: jest.fn(),
  };
}

const HEX = '65a000000000000000000001';

const codes = defineResource('codes', {
  code: field.string({ primary: true }),
  label: field.string(),
});

const items = defineResource('items', {
  id: field.number({ primary: true }),
  label: field.string(),
  ownerId: field.objectId({ column: 'owner_id' }),
});

/* -----------------------------
   Translation
   ----------------------------- */

describe('mongo translation', () => {
  const shape: ResourceShape = introspect(usersResource);

  it('returns an empty filter without predicates', () => {
    expect(toMongoFilter(shape, [])).toEqual({});
  });

  it('translates each predicate kind into an $and clause', () => {
    const filter = toMongoFilter(shape, [
      { kind: 'compare', column: 'age', op: 'gte', value: '18' },
      { kind: 'compare', column: 'status', op: 'eq', value: '1' },
      { kind: 'like', column: 'name', pattern: '%jo%' },
      { kind: 'in', column: 'status', values: ['1', '2'], negated: true },
      { kind: 'null', column: 'email_address', isNull: true },
      { kind: 'null', column: 'name', isNull: false },
      { kind: 'compare', column: 'created_at', op: 'lt', value: '2024-01-01T00:00:00.000Z' },
    ]);

    expect(filter).toEqual({
      $and: [
        { age: { $gte: 18 } },
        { status: 1 },
        { name: { $regex: '^.*jo.*$', $options: 'is' } },
        { status: { $nin: [1, 2] } },
        { email_address: null },
        { name: { $ne: null } },
        { created_at: { $lt: new Date('2024-01-01T00:00:00.000Z') } },
      ],
    });
  });

  it('addresses the primary column as _id', () => {
    const filter = toMongoFilter(shape, [{ kind: 'compare', column: 'id', op: 'eq', value: HEX }]);
    expect(filter).toEqual({ $and: [{ _id: new ObjectId(HEX) }] });
    expect(
      toMongoSort(shape, [
        { column: 'created_at', descending: true },
        { column: 'id', descending: false },
      ]),
    ).toEqual({ created_at: -1, _id: 1 });
  });

  it('keeps operands that do not parse as strings', () => {
    expect(coerceOperand('number', 'abc')).toBe('abc');
    expect(coerceOperand('number', ' ')).toBe(' ');
    expect(coerceOperand('boolean', 'yes')).toBe(true);
    expect(coerceOperand('date', 'soon')).toBe('soon');
    expect(coerceOperand('objectId', 'not-hex')).toBe('not-hex');
    expect(coerceOperand(undefined, '5')).toBe('5');
  });
});

/* -----------------------------
   Store
   ----------------------------- */

describe('MongoResourceStore', () => {
  let factory: MongoResourceStoreFactory;
  let col: MockCollection;
  let counters: MockCollection;
  let mongo: { getCollection: jest.Mock };

  beforeEach(async () => {
    col = makeCollection();
    counters = makeCollection();
    mongo = {
      getCollection: jest.fn(async (name: string) => {
        await Promise.resolve();
        return name === 'counters' ? counters : col;
      }),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [MongoResourceStoreFactory, { provide: MongodbService, useValue: mongo }],
    }).compile();

    factory = module.get(MongoResourceStoreFactory);
  });

  it('count → countDocuments with the translated filter', async () => {
    col.countDocuments.mockResolvedValueOnce(7);
    const store = factory.forResource(introspect(usersResource));

    await expect(
      store.count([{ kind: 'compare', column: 'age', op: 'gt', value: '3' }]),
    ).resolves.toBe(7);
    expect(mongo.getCollection).toHaveBeenCalledWith('users');
    expect(col.countDocuments).toHaveBeenCalledWith({ $and: [{ age: { $gt: 3 } }] });
  });

  it('find → sorts, skips, limits and maps _id back to the primary column', async () => {
    const cursor = makeCursor([
      { _id: new ObjectId(HEX), name: 'Ann', created_at: new Date(0) },
    ]);
    col.find.mockReturnValueOnce(cursor);
    const store = factory.forResource(introspect(usersResource));

    const rows = await store.find({
      predicates: [],
      orders: [{ column: 'name', descending: true }],
      limit: 5,
      offset: 10,
    });

    expect(col.find).toHaveBeenCalledWith({});
    expect(cursor.sort).toHaveBeenCalledWith({ name: -1 });
    expect(cursor.skip).toHaveBeenCalledWith(10);
    expect(cursor.limit).toHaveBeenCalledWith(5);
    expect(rows).toEqual([{ id: HEX, name: 'Ann', created_at: new Date(0) }]);
  });

  it('insert → generates an ObjectId key for objectId primaries', async () => {
    col.insertOne.mockResolvedValueOnce({ acknowledged: true });
    const store = factory.forResource(introspect(usersResource));

    const key = await store.insert({ name: 'Ann', age: 30 });

    expect(typeof key).toBe('string');
    expect(col.insertOne).toHaveBeenCalledWith({
      name: 'Ann',
      age: 30,
      _id: new ObjectId(String(key)),
    });
  });

  it('insert → takes numeric keys from the counters collection', async () => {
    counters.findOneAndUpdate.mockResolvedValueOnce({ _id: 'items', seq: 5 });
    col.insertOne.mockResolvedValueOnce({ acknowledged: true });
    const store = factory.forResource(introspect(items));

    await expect(store.insert({ id: 0, label: 'x', owner_id: HEX })).resolves.toBe(5);
    expect(counters.findOneAndUpdate).toHaveBeenCalledWith(
      { _id: 'items' },
      { $inc: { seq: 1 } },
      { upsert: true, returnDocument: 'after' },
    );
    expect(col.insertOne).toHaveBeenCalledWith({
      _id: 5,
      label: 'x',
      owner_id: new ObjectId(HEX),
    });
  });

  it('update → $set by key and resolves to matchedCount', async () => {
    col.updateOne.mockResolvedValueOnce({ matchedCount: 1, modifiedCount: 1 });
    const store = factory.forResource(introspect(usersResource));
    const at = new Date(0);

    await expect(store.update(HEX, { name: 'Bo', updated_at: at })).resolves.toBe(1);
    expect(col.updateOne).toHaveBeenCalledWith(
      { _id: new ObjectId(HEX) },
      { $set: { name: 'Bo', updated_at: at } },
    );
  });

  it('delete → resolves to deletedCount', async () => {
    col.deleteOne.mockResolvedValueOnce({ deletedCount: 0 });
    const store = factory.forResource(introspect(items));

    await expect(store.delete(42)).resolves.toBe(0);
    expect(col.deleteOne).toHaveBeenCalledWith({ _id: 42 });
  });

  it('delete → keeps digit-only string keys as strings', async () => {
    col.deleteOne.mockResolvedValueOnce({ deletedCount: 1 });
    const shape = introspect(codes);
    const svc = new CrudService(codes, shape, factory.forResource(shape));

    await svc.deleteById('007');

    expect(col.deleteOne).toHaveBeenCalledWith({ _id: '007' });
  });

  it('wraps driver failures with operation context', async () => {
    col.countDocuments.mockRejectedValueOnce(
      Object.assign(new Error('connection reset'), { code: 'ECONNRESET' }),
    );
    const store = factory.forResource(introspect(usersResource));

    const err: unknown = await store.count([]).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StoreActionError);
    expect(err).toMatchObject({
      message: 'connection reset',
      code: 'STORE_ACTION_FAILED',
      context: {
        operation: 'countDocuments',
        resource: 'users',
        collection: 'users',
        driverCode: 'ECONNRESET',
      },
    });
  });

  it('does not touch the store once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const store = factory.forResource(introspect(usersResource));

    await expect(store.count([], { signal: controller.signal })).rejects.toMatchObject({
      name: 'AbortError',
    });
    expect(mongo.getCollection).not.toHaveBeenCalled();
  });
});
