import type { INestApplication } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { Test } from '@nestjs/testing';
import { ThrottlerModule } from '@nestjs/throttler';
import request from 'supertest';
import { configureHttpApp } from '@/common/http/configure-http-app';
import { ObservabilityModule } from '@/common/observability';
import {
  ACCOUNTING_PORT,
  CART_PORT,
  CATALOG_PORT,
  CURRENCY_PORT,
  EMAIL_PORT,
  FRAUD_DETECTION_PORT,
  PAYMENT_PORT,
  SHIPPING_PORT,
} from '@/modules/checkout/application/ports';
import { CheckoutModule } from '@/modules/checkout/checkout.module';
import { HealthModule } from '@/modules/health/health.module';
import { failure } from '@/modules/checkout/domain';
import {
  buildCheckoutRequest,
  createFakePorts,
  createTestObservability,
  type FakePorts,
} from '../fixtures/checkout/checkout-fakes';

describe('Checkout API (e2e)', () => {
  let app: INestApplication;
  let ports: FakePorts;

  beforeAll(async () => {
    ports = createFakePorts();
    const { handle } = createTestObservability();

    const moduleRef = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [() => ({ CHECKOUT_DEADLINE_MS: 10_000, SHIPPING_PLACEHOLDER_COST: 0 })],
        }),
        ThrottlerModule.forRoot([{ name: 'default', ttl: 60_000, limit: 100 }]),
        ObservabilityModule.forRoot(handle),
        HealthModule,
        CheckoutModule,
      ],
    })
      .overrideProvider(CATALOG_PORT)
      .useValue(ports.catalogPort)
      .overrideProvider(SHIPPING_PORT)
      .useValue(ports.shippingPort)
      .overrideProvider(CURRENCY_PORT)
      .useValue(ports.currencyPort)
      .overrideProvider(PAYMENT_PORT)
      .useValue(ports.paymentPort)
      .overrideProvider(FRAUD_DETECTION_PORT)
      .useValue(ports.fraudDetectionPort)
      .overrideProvider(EMAIL_PORT)
      .useValue(ports.emailPort)
      .overrideProvider(ACCOUNTING_PORT)
      .useValue(ports.accountingPort)
      .overrideProvider(CART_PORT)
      .useValue(ports.cartPort)
      .compile();

    app = moduleRef.createNestApplication();
    configureHttpApp(app, handle.tracer);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  it('returns 200 with the completed order', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/checkout')
      .set('x-request-id', 'req-e2e-1')
      .send(buildCheckoutRequest());

    expect(response.status).toBe(200);
    expect(response.headers['x-request-id']).toBe('req-e2e-1');
    expect(response.body).toMatchObject({
      status: 'Completed',
      total: { currencyCode: 'USD', amount: 25 },
      transactionId: 'TXN-test',
      trackingId: 'TRK-test',
      warnings: [],
    });
  });

  it('returns 402 when the payment is declined', async () => {
    ports.paymentPort.charge.mockResolvedValueOnce(
      failure('declined', 'card declined', { statusCode: 402 }),
    );

    const response = await request(app.getHttpServer()).post('/api/checkout').send(buildCheckoutRequest());

    expect(response.status).toBe(402);
    expect(response.body).toMatchObject({ status: 'PaymentFailed', reason: 'declined' });
  });

  it('returns 409 when a product is unknown', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/checkout')
      .send(buildCheckoutRequest({ items: [{ productId: 'SKU-9999', quantity: 1 }] }));

    expect(response.status).toBe(409);
    expect(response.body).toMatchObject({ status: 'Rejected', reason: 'catalog_miss' });
  });

  it('returns 400 for an invalid quantity', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/checkout')
      .set('x-request-id', 'req-e2e-4')
      .send(buildCheckoutRequest({ items: [{ productId: 'SKU-1001', quantity: 0 }] }));

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ ok: false, message: 'Invalid payload.', requestId: 'req-e2e-4' });
  });

  it('returns 400 for an empty cart', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/checkout')
      .set('x-request-id', 'req-e2e-empty')
      .send(buildCheckoutRequest({ items: [] }));

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ ok: false, message: 'Invalid payload.', requestId: 'req-e2e-empty' });
  });

  it('returns 400 with the request id for malformed JSON', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/checkout')
      .set('x-request-id', 'req-e2e-malformed')
      .set('Content-Type', 'application/json')
      .send('{"userId": "user-1", "items": [');

    expect(response.status).toBe(400);
    expect(response.headers['x-request-id']).toBe('req-e2e-malformed');
    expect(response.body).toEqual({ ok: false, message: 'Invalid payload.', requestId: 'req-e2e-malformed' });
  });

  it('returns 400 for unexpected fields', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/checkout')
      .send({ ...buildCheckoutRequest(), coupon: 'FREE' });

    expect(response.status).toBe(400);
  });

  it('returns 400 for a lowercase currency code', async () => {
    const response = await request(app.getHttpServer())
      .post('/api/checkout')
      .send(buildCheckoutRequest({ currencyCode: 'usd' }));

    expect(response.status).toBe(400);
  });

  it('exposes checkout metrics in Prometheus text format', async () => {
    const response = await request(app.getHttpServer()).get('/internal/metrics');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
    expect(response.text.split('\n')).toContain(
      'checkout_orders_total{status="PaymentFailed",reason="declined"} 1',
    );
  });

  it('serves host metrics alongside the checkout metrics', async () => {
    const response = await request(app.getHttpServer()).get('/internal/metrics');
    const lines = response.text.split('\n');

    expect(lines).toContain(
      'target_info{service_name="checkout",service_version="1.0.0",deployment_environment="test",host_name="test-host",os_type="linux"} 1',
    );
    expect(lines).toContain('# TYPE system_cpu_load_average_1m gauge');
    expect(lines.indexOf('# TYPE system_cpu_time_seconds_total counter')).toBeLessThan(
      lines.indexOf('# TYPE checkout_orders_total counter'),
    );
  });
});
