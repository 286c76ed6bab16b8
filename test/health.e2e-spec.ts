import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { ErrorLog } from '../src/error-log/error-log';
import { InMemoryErrorStore } from './support/in-memory-error.store';

describe('Health (e2e)', () => {
  let app: INestApplication;
  const store = new InMemoryErrorStore();

  beforeAll(async () => {
    const errors = new ErrorLog({ connectionDescriptor: 'memory:', applicationName: 'shop' }, () => store);
    const moduleFixture: TestingModule = await Test.createTestingModule({ imports: [AppModule] })
      .overrideProvider(ErrorLog)
      .useValue(errors)
      .compile();
    app = moduleFixture.createNestApplication();
    app.setGlobalPrefix('api');
    await app.init();
  });

  afterAll(async () => { await app.close(); });

  it('/api/health returns status + meta', async () => {
    const res = await request(app.getHttpServer()).get('/api/health').expect(200);
    expect(res.body).toEqual(expect.objectContaining({ status: 'ok', version: expect.any(String), gitSha: expect.any(String) }));
  });

  it('/api/ready reports the store as up', async () => {
    store.available = true;
    const res = await request(app.getHttpServer()).get('/api/ready').expect(200);
    expect(res.body).toEqual(expect.objectContaining({ status: 'ok', store: 'up' }));
  });

  it('/api/ready reports the store as down when unreachable', async () => {
    store.available = false;
    const res = await request(app.getHttpServer()).get('/api/ready').expect(200);
    expect(res.body).toEqual(expect.objectContaining({ status: 'degraded', store: 'down' }));
  });

  it('/api/errors answers 503 when the store is unreachable', async () => {
    store.available = false;
    const list = await request(app.getHttpServer()).get('/api/errors').expect(503);
    expect(list.body).toEqual({ statusCode: 503, message: 'Error log unavailable' });

    const one = await request(app.getHttpServer()).get('/api/errors/00000000-0000-0000-0000-000000000000').expect(503);
    expect(one.body).toEqual({ statusCode: 503, message: 'Error log unavailable' });
    expect(store.rows).toEqual([]);
  });
});
