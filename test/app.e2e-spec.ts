import { Test, TestingModule } from '@nestjs/testing';
import { NestExpressApplication } from '@nestjs/platform-express';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';
import { UpstreamService } from '../src/upstream/upstream.service';
import { UpstreamTimeoutError } from '../src/upstream/upstream.errors';
import { TransactionType, UpstreamResponse } from '../src/upstream/types/upstream.types';

describe('Payout Status Proxy (e2e)', () => {
  let app: NestExpressApplication;

  const fakeUpstream = {
    fetchStatus: jest.fn<Promise<UpstreamResponse>, [string, TransactionType]>(),
  };

  const payoutBody = {
    data: {
      transactions: [
        {
          transactionId: 'TXN-1',
          status: 'Completed',
          createdAt: '2026-01-20T08:21:40.000Z',
          amount: 500,
          jazzCashMerchant: { merchant_of: 'Test Merchant', password: 'test-password' },
        },
      ],
    },
  };

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(UpstreamService)
      .useValue(fakeUpstream)
      .compile();

    app = configureApp(moduleFixture.createNestApplication<NestExpressApplication>());
    await app.init();
  });

  afterEach(() => {
    fakeUpstream.fetchStatus.mockReset();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('Health Endpoints', () => {
    it('/ (GET) - should return the service descriptor', () => {
      return request(app.getHttpServer())
        .get('/')
        .expect(200)
        .expect(res => {
          expect(res.body.ok).toBe(true);
          expect(res.body.service).toBe('payout-status-proxy');
        });
    });

    it('/health (GET) - should return health status', () => {
      return request(app.getHttpServer())
        .get('/health')
        .expect(200)
        .expect(res => {
          expect(res.body.status).toBe('ok');
          expect(res.body.timestamp).toBeDefined();
        });
    });
  });

  describe('Single Lookup', () => {
    it('/status (GET) - should return summary and sanitized data', async () => {
      fakeUpstream.fetchStatus.mockResolvedValue({ statusCode: 200, ok: true, body: payoutBody });

      const response = await request(app.getHttpServer())
        .get('/status')
        .query({ order_id: 'ORD-1' })
        .expect(200);

      expect(fakeUpstream.fetchStatus).toHaveBeenCalledWith('ORD-1', TransactionType.PAYOUT);
      expect(response.body).toEqual({
        ok: true,
        status_code: 200,
        order_id: 'ORD-1',
        type: 'payout',
        summary: {
          status: 'COMPLETED',
          raw_status: 'Completed',
          txn_id: 'TXN-1',
          date: '2026-01-20T08:21:40.000Z',
          amount: 500,
          currency: 'PKR',
          merchant: 'Test Merchant',
          note: '',
        },
        data: {
          data: {
            transactions: [
              {
                ...payoutBody.data.transactions[0],
                jazzCashMerchant: { merchant_of: 'Test Merchant', password: '***' },
              },
            ],
          },
        },
      });
    });

    it('/status (GET) - should accept id as an alias and a case-insensitive type', async () => {
      fakeUpstream.fetchStatus.mockResolvedValue({
        statusCode: 200,
        ok: true,
        body: { transactions: [] },
      });

      const response = await request(app.getHttpServer())
        .get('/status')
        .query({ id: ' P-9 ', type: 'PayIn' })
        .expect(200);

      expect(fakeUpstream.fetchStatus).toHaveBeenCalledWith('P-9', TransactionType.PAYIN);
      expect(response.body.summary.status).toBe('UNKNOWN');
      expect(response.body.summary.note).toBe('NOT_IN_BO');
    });

    it('/status (GET) - should mirror the upstream status code', async () => {
      fakeUpstream.fetchStatus.mockResolvedValue({
        statusCode: 404,
        ok: false,
        body: { message: 'not found' },
      });

      const response = await request(app.getHttpServer())
        .get('/status')
        .query({ order_id: 'ORD-404' })
        .expect(404);

      expect(response.body.ok).toBe(false);
      expect(response.body.status_code).toBe(404);
    });

    it('/status (GET) - should ignore extra query parameters', async () => {
      fakeUpstream.fetchStatus.mockResolvedValue({ statusCode: 200, ok: true, body: payoutBody });

      const response = await request(app.getHttpServer())
        .get('/status')
        .query({ id: 'ORD-1', _: '1700000000' })
        .expect(200);

      expect(fakeUpstream.fetchStatus).toHaveBeenCalledWith('ORD-1', TransactionType.PAYOUT);
      expect(response.body.summary.status).toBe('COMPLETED');
    });

    it('/status (GET) - should reject a missing id', async () => {
      const response = await request(app.getHttpServer()).get('/status').expect(400);

      expect(response.body).toEqual({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: 'order_id is required',
      });
      expect(fakeUpstream.fetchStatus).not.toHaveBeenCalled();
    });

    it('/status (GET) - should reject an invalid type', async () => {
      const response = await request(app.getHttpServer())
        .get('/status')
        .query({ order_id: 'ORD-1', type: 'refund' })
        .expect(400);

      expect(response.body).toEqual({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: 'type must be payout or payin',
      });
      expect(fakeUpstream.fetchStatus).not.toHaveBeenCalled();
    });

    it('/status (GET) - should report an upstream timeout as 504', async () => {
      fakeUpstream.fetchStatus.mockRejectedValue(
        new UpstreamTimeoutError('https://upstream.test/status', 15000),
      );

      const response = await request(app.getHttpServer())
        .get('/status')
        .query({ order_id: 'SLOW' })
        .expect(504);

      expect(response.body).toEqual({
        ok: false,
        error: 'TIMEOUT',
        message: 'Upstream did not respond within 15000ms',
      });
    });

    it('/status (GET) - should report other upstream failures as 500', async () => {
      fakeUpstream.fetchStatus.mockRejectedValue(new Error('fetch failed'));

      const response = await request(app.getHttpServer())
        .get('/status')
        .query({ order_id: 'DOWN' })
        .expect(500);

      expect(response.body).toEqual({
        ok: false,
        error: 'UPSTREAM_ERROR',
        message: 'fetch failed',
      });
    });
  });

  describe('Error Bodies', () => {
    it('should answer malformed JSON with a validation error body', async () => {
      const response = await request(app.getHttpServer())
        .post('/bulk-status')
        .set('Content-Type', 'application/json')
        .send('{"ids": [')
        .expect(400);

      expect(response.body.ok).toBe(false);
      expect(response.body.error).toBe('VALIDATION_ERROR');
      expect(typeof response.body.message).toBe('string');
      expect(fakeUpstream.fetchStatus).not.toHaveBeenCalled();
    });

    it('should answer an oversized body with a validation error body', async () => {
      const response = await request(app.getHttpServer())
        .post('/bulk-status')
        .set('Content-Type', 'application/json')
        .send(JSON.stringify({ ids: ['x'.repeat(2 * 1024 * 1024)] }))
        .expect(413);

      expect(response.body.ok).toBe(false);
      expect(response.body.error).toBe('VALIDATION_ERROR');
    });

    it('should answer unknown routes with a not-found body', async () => {
      const response = await request(app.getHttpServer()).get('/transactions').expect(404);

      expect(response.body.ok).toBe(false);
      expect(response.body.error).toBe('NOT_FOUND');
    });
  });

  describe('Bulk Lookup', () => {
    it('/bulk-status (POST) - should resolve a list of ids in order', async () => {
      fakeUpstream.fetchStatus.mockImplementation(async orderId => ({
        statusCode: 200,
        ok: true,
        body: { transactions: orderId === '2' ? [] : [{ id: orderId, status: 'success' }] },
      }));

      const response = await request(app.getHttpServer())
        .post('/bulk-status')
        .send({ type: 'payin', ids: ['1', '', 2, '3'] })
        .expect(200);

      expect(response.body.ok).toBe(true);
      expect(response.body.type).toBe('payin');
      expect(response.body.count).toBe(3);
      expect(typeof response.body.elapsed_ms).toBe('number');
      expect(
        response.body.results.map((r: { order_id: string; status: string }) => [
          r.order_id,
          r.status,
        ]),
      ).toEqual([
        ['1', 'COMPLETED'],
        ['2', 'NOT_IN_BO'],
        ['3', 'COMPLETED'],
      ]);
    });

    it('/bulk-status (POST) - should accept a comma-separated id string', async () => {
      fakeUpstream.fetchStatus.mockResolvedValue({
        statusCode: 200,
        ok: true,
        body: { data: { transactions: [{ id: 1, status: 'pending' }] } },
      });

      const response = await request(app.getHttpServer())
        .post('/bulk-status')
        .send({ ids: 'A, ,B' })
        .expect(200);

      expect(response.body.type).toBe('payout');
      expect(response.body.results.map((r: { order_id: string }) => r.order_id)).toEqual([
        'A',
        'B',
      ]);
    });

    it('/bulk-status (POST) - should reject an empty id list', async () => {
      const response = await request(app.getHttpServer())
        .post('/bulk-status')
        .send({ type: 'payout', ids: [] })
        .expect(400);

      expect(response.body).toEqual({
        ok: false,
        error: 'VALIDATION_ERROR',
        message: 'ids must be a non-empty list',
      });
    });

    it.each(['', '   '])(
      '/bulk-status (POST) - should reject a blank id string %p',
      async ids => {
        const response = await request(app.getHttpServer())
          .post('/bulk-status')
          .send({ type: 'payout', ids })
          .expect(400);

        expect(response.body).toEqual({
          ok: false,
          error: 'VALIDATION_ERROR',
          message: 'ids must be a non-empty list',
        });
        expect(fakeUpstream.fetchStatus).not.toHaveBeenCalled();
      },
    );

    it('/bulk-status (POST) - should accept 5000 vendor-length ids', async () => {
      fakeUpstream.fetchStatus.mockResolvedValue({
        statusCode: 200,
        ok: true,
        body: { data: { transactions: [{ id: 1, status: 'success' }] } },
      });
      const ids = Array.from({ length: 5000 }, (_, i) => String(i).padStart(24, '2026012017688973'));

      const response = await request(app.getHttpServer())
        .post('/bulk-status')
        .send({ type: 'payout', ids })
        .expect(200);

      expect(response.body.count).toBe(5000);
      expect(response.body.results[4999].order_id).toBe(ids[4999]);
      expect(fakeUpstream.fetchStatus).toHaveBeenCalledTimes(5000);
    }, 30000);

    it('/bulk-status (POST) - should reject more than 5000 ids before any lookup', async () => {
      const ids = Array.from({ length: 5001 }, (_, i) => `ORD-${i}`);

      const response = await request(app.getHttpServer())
        .post('/bulk-status')
        .send({ type: 'payout', ids })
        .expect(400);

      expect(response.body.error).toBe('VALIDATION_ERROR');
      expect(fakeUpstream.fetchStatus).not.toHaveBeenCalled();
    });

    it('/bulk-status (POST) - should reject an invalid type', async () => {
      await request(app.getHttpServer())
        .post('/bulk-status')
        .send({ type: 'refund', ids: ['1'] })
        .expect(400);

      expect(fakeUpstream.fetchStatus).not.toHaveBeenCalled();
    });
  });
});
