import type { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '@/app.module';
import { configureHttpApp } from '@/common/http/configure-http-app';
import type { ServiceName } from '@/common/constants/services.constants';
import { FAILURE_POLICY, FixedFailurePolicy } from '@/modules/collaborators/shared/failure-policy';
import { createTestObservability } from '../fixtures/checkout/checkout-fakes';

async function startService(
  service: ServiceName,
  failing: ReadonlySet<string> = new Set(),
): Promise<INestApplication> {
  const { handle } = createTestObservability(service);
  const builder = Test.createTestingModule({ imports: [AppModule.forService(service, handle)] });
  const moduleRef =
    service === 'payment' || service === 'shipping' || service === 'fraud-detection'
      ? await builder.overrideProvider(FAILURE_POLICY).useValue(new FixedFailurePolicy(failing)).compile()
      : await builder.compile();

  const app = moduleRef.createNestApplication();
  configureHttpApp(app, handle.tracer);
  await app.init();
  return app;
}

const address = {
  streetAddress: '1 Test Street',
  city: 'Testville',
  country: 'US',
  zipCode: '00000',
};

describe('Collaborator services (e2e)', () => {
  const apps: INestApplication[] = [];

  async function service(name: ServiceName, failing?: ReadonlySet<string>): Promise<INestApplication> {
    const app = await startService(name, failing);
    apps.push(app);
    return app;
  }

  afterAll(async () => {
    await Promise.all(apps.map((app) => app.close()));
  });

  it('reports health with the service name', async () => {
    const app = await service('email');

    const response = await request(app.getHttpServer()).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: 'ok', service: 'email' });
  });

  it('serves host metrics from every collaborator', async () => {
    const app = await service('currency');

    const response = await request(app.getHttpServer()).get('/internal/metrics');
    const lines = response.text.split('\n');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toContain('text/plain');
    expect(lines).toContain(
      'target_info{service_name="currency",service_version="1.0.0",deployment_environment="test",host_name="test-host",os_type="linux"} 1',
    );
    expect(lines).toContain('# TYPE system_cpu_load_average_15m gauge');
    expect(lines.some((line) => line.startsWith('system_cpu_time_seconds_total{state="idle"} '))).toBe(true);
    expect(lines.some((line) => line.startsWith('checkout_'))).toBe(false);
  });

  it('serves catalog products and 404s unknown ones', async () => {
    const app = await service('product-catalog');

    const found = await request(app.getHttpServer()).get('/products/SKU-1001');
    const missing = await request(app.getHttpServer()).get('/products/SKU-0000');

    expect(found.body).toEqual({
      id: 'SKU-1001',
      name: 'Canvas Tote Bag',
      price: { currencyCode: 'USD', amount: 18.5 },
    });
    expect(missing.status).toBe(404);
    expect(missing.body.message).toBe('Product SKU-0000 not found');
  });

  it('charges, declines and reverses payments', async () => {
    const app = await service('payment');
    const charge = {
      orderId: 'order-1',
      amount: { currencyCode: 'USD', amount: 25 },
      paymentToken: 'tok-test',
    };

    const captured = await request(app.getHttpServer()).post('/charge').send(charge);
    const declined = await request(app.getHttpServer())
      .post('/charge')
      .send({ ...charge, paymentToken: 'declined-card' });
    const reversal = await request(app.getHttpServer())
      .post('/reversals')
      .send({ orderId: 'order-1', transactionId: captured.body.transactionId, amount: charge.amount });

    expect(captured.status).toBe(200);
    expect(captured.body.transactionId).toMatch(/^TXN-/);
    expect(declined.status).toBe(402);
    expect(declined.body.message).toBe('Payment declined for order order-1');
    expect(reversal.status).toBe(200);
    expect(reversal.body.reversalId).toMatch(/^REV-/);
  });

  it('quotes shipping and reports a failed shipment as unavailable', async () => {
    const app = await service('shipping', new Set(['ship']));
    const items = [{ productId: 'SKU-1001', quantity: 2 }];

    const quote = await request(app.getHttpServer()).post('/quote').send({ address, items });
    const shipment = await request(app.getHttpServer())
      .post('/ship')
      .send({ orderId: 'order-1', address, items });

    expect(quote.body).toEqual({ cost: { currencyCode: 'USD', amount: 8.99 } });
    expect(shipment.status).toBe(503);
  });

  it('converts currencies and rejects unsupported ones', async () => {
    const app = await service('currency');

    const converted = await request(app.getHttpServer())
      .post('/convert')
      .send({ from: { currencyCode: 'USD', amount: 100 }, toCurrency: 'EUR' });
    const unsupported = await request(app.getHttpServer())
      .post('/convert')
      .send({ from: { currencyCode: 'USD', amount: 100 }, toCurrency: 'XTS' });

    expect(converted.body).toEqual({ currencyCode: 'EUR', amount: 92 });
    expect(unsupported.status).toBe(400);
    expect(unsupported.body.message).toBe('Unsupported currency: XTS');
  });

  it('flags large orders in fraud detection', async () => {
    const app = await service('fraud-detection');

    const response = await request(app.getHttpServer())
      .post('/check')
      .send({
        orderId: 'order-1',
        userId: 'user-1',
        amount: { currencyCode: 'USD', amount: 6400 },
        items: [{ productId: 'SKU-1010', quantity: 1 }],
      });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ flagged: true, reason: 'amount_over_threshold' });
  });

  it('keeps carts until they are emptied', async () => {
    const app = await service('cart');
    const server = app.getHttpServer();

    await request(server).post('/carts/user-1/items').send({ productId: 'SKU-1001', quantity: 2 });
    const before = await request(server).get('/carts/user-1');
    const emptied = await request(server).delete('/carts/user-1');
    const after = await request(server).get('/carts/user-1');

    expect(before.body).toEqual({ userId: 'user-1', items: [{ productId: 'SKU-1001', quantity: 2 }] });
    expect(emptied.status).toBe(204);
    expect(after.body).toEqual({ userId: 'user-1', items: [] });
  });

  it('accepts order confirmations', async () => {
    const app = await service('email');

    const response = await request(app.getHttpServer())
      .post('/send-order-confirmation')
      .send({ userId: 'user-1', email: 'buyer@example.com', order: { orderId: 'order-1' } });

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ accepted: true });
  });

  it('records order events for accounting', async () => {
    const app = await service('accounting');

    const accepted = await request(app.getHttpServer())
      .post('/orders')
      .send({
        type: 'order.completed',
        userId: 'user-1',
        occurredAt: '2026-01-01T00:00:00.000Z',
        order: { orderId: 'order-1', status: 'Completed' },
      });
    const invalid = await request(app.getHttpServer())
      .post('/orders')
      .send({ type: 'order.lost', userId: 'user-1', occurredAt: 'yesterday', order: {} });
    const summary = await request(app.getHttpServer()).get('/orders/summary');

    expect(accepted.body).toEqual({ accepted: true });
    expect(invalid.status).toBe(400);
    expect(summary.body).toEqual({
      'order.completed': 1,
      'order.rejected': 0,
      'order.payment_failed': 0,
    });
  });
});
