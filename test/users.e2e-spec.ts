import { Test, TestingModule } from '@nestjs/testing';
import type { INestApplication } from '@nestjs/common';
import type { Server } from 'http';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { StoreActionError } from '../src/lib/errors/StoreActionError';
import type { Row } from '../src/lib/resources/schema';
import { RESOURCE_STORE_FACTORY } from '../src/modules/crud/store/resource.store';
import {
  MemoryStore,
  MemoryStoreFactory,
} from '../src/modules/crud/tests/memory.store';

function row(id: string, name: string, age: number, status: number, day: number): Row {
  const at = new Date(Date.UTC(2024, 0, day));
  return {
    id,
    name,
    email_address: `${id}@example.com`,
    age,
    status,
    created_at: at,
    updated_at: at,
  };
}

describe('users CRUD (e2e)', () => {
  let app: INestApplication;
  let httpServer: Server;
  let store: MemoryStore;

  beforeAll(async () => {
    const stores = new MemoryStoreFactory();
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(RESOURCE_STORE_FACTORY)
      .useValue(stores)
      .compile();

    app = moduleFixture.createNestApplication();
    // Match runtime prefix (main.ts sets it; tests must set it too)
    app.setGlobalPrefix('api');
    await app.init();

    httpServer = app.getHttpServer();

    const users = stores.stores.get('users');
    if (!users) throw new Error('users store was not created');
    store = users;
  });

  beforeEach(() => {
    store.rows.splice(0);
    store.seed([row('u1', 'Ann', 30, 1, 1), row('u2', 'Bob', 17, 1, 2), row('u3', 'Cid', 45, 0, 3)]);
  });

  afterAll(async () => {
    await app.close();
  });

  /* ---------------- list ---------------- */

  it('GET /api/users/list → filtered, ordered page in the envelope', async () => {
    const res = await request(httpServer)
      .get('/api/users/list')
      .query({ age__gte: '18', order: '-age', size: '1' })
      .expect(200);

    expect(res.body).toEqual({
      code: 0,
      message: 'OK',
      data: {
        list: [
          {
            id: 'u3',
            name: 'Cid',
            email: 'u3@example.com',
            age: 45,
            status: 0,
            createdAt: '2024-01-03T00:00:00.000Z',
            updatedAt: '2024-01-03T00:00:00.000Z',
          },
        ],
        page: 1,
        size: 1,
        total: 2,
      },
    });
  });

  it('GET /api/users/list → ignores unknown columns', async () => {
    const res = await request(httpServer)
      .get('/api/users/list?password=x&sort=password')
      .expect(200);

    expect(res.body.data.total).toBe(3);
    expect(res.body.data.list.map((u: { id: string }) => u.id)).toEqual(['u1', 'u2', 'u3']);
  });

  it('GET /api/users/list → 400 for a non-integer page', async () => {
    await request(httpServer)
      .get('/api/users/list?page=abc')
      .expect(400)
      .expect({ code: 400, message: 'page must be an integer', data: {} });
  });

  it('GET /api/users/list → 500 envelope when the store fails', async () => {
    jest
      .spyOn(store, 'count')
      .mockRejectedValueOnce(new StoreActionError('store down', { operation: 'countDocuments' }));

    await request(httpServer)
      .get('/api/users/list')
      .expect(500)
      .expect({ code: 500, message: 'store down', data: {} });
  });

  /* ---------------- save ---------------- */

  it('POST /api/users/save → creates a record without id', async () => {
    const res = await request(httpServer)
      .post('/api/users/save')
      .send({ name: 'Dee', email: 'dee@example.com', age: 22, status: 1 })
      .expect(200);

    expect(res.body.code).toBe(0);
    expect(res.body.data).toMatchObject({ name: 'Dee', email: 'dee@example.com', age: 22 });
    expect(res.body.data.id).toMatch(/^key-\d+$/);
    expect(typeof res.body.data.createdAt).toBe('string');
    expect(store.rows).toHaveLength(4);
  });

  it('POST /api/users/save → partial update keeps zero-valued fields', async () => {
    await request(httpServer)
      .post('/api/users/save')
      .send({ id: 'u1', name: 'Anna' })
      .expect(200);

    expect(store.rows[0]).toMatchObject({ id: 'u1', name: 'Anna', age: 30, status: 1 });
  });

  it('POST /api/users/save → 400 for mistyped fields', async () => {
    await request(httpServer)
      .post('/api/users/save')
      .send({ name: 'Eve', age: 'old' })
      .expect(400)
      .expect({ code: 400, message: 'users: invalid record payload', data: {} });
  });

  it('POST /api/users/save → 400 for a non-object body', async () => {
    await request(httpServer)
      .post('/api/users/save')
      .send([1, 2])
      .expect(400)
      .expect({ code: 400, message: 'users: record payload must be a JSON object', data: {} });
  });

  /* ---------------- delete ---------------- */

  it('DELETE /api/users/delete → removes the record', async () => {
    await request(httpServer)
      .delete('/api/users/delete?id=u2')
      .expect(200)
      .expect({ code: 0, message: 'OK', data: { id: 'u2' } });

    expect(store.rows.map((r) => r.id)).toEqual(['u1', 'u3']);
  });

  it('DELETE /api/users/delete → 404 for an unknown id', async () => {
    await request(httpServer)
      .delete('/api/users/delete?id=zzz')
      .expect(404)
      .expect({ code: 404, message: 'Record not found in users with id zzz', data: {} });
  });

  it('DELETE /api/users/delete → 400 without id', async () => {
    await request(httpServer)
      .delete('/api/users/delete')
      .expect(400)
      .expect({ code: 400, message: 'users: id is required', data: {} });
  });

  it('unknown routes use the same envelope', async () => {
    await request(httpServer)
      .get('/api/nope')
      .expect(404)
      .expect({ code: 404, message: 'Cannot GET /api/nope', data: {} });
  });
});
