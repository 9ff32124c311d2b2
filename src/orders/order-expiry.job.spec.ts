import { InvalidTransitionException } from '../common/exceptions/domain.exceptions';
import { backdateOrder, createTestApp, orderStatus, seedStockedProduct, seedUser } from '../testing/test-app';
import type { TestApp } from '../testing/test-app';
import type { Order } from './type/order.type';

const PRICING = { feeRatePpm: 7_000, fixedFee: 310 };

describe('OrderExpiryJob', () => {
  let app: TestApp;

  beforeEach(async () => {
    app = await createTestApp({ PAYMENT_EXPIRY_MINUTES: '10', SWEEP_INTERVAL_MS: '60000' });
    seedStockedProduct(app, { id: 1, customerPrice: 100_000 }, 5);
  });

  afterEach(async () => {
    jest.useRealTimers();
    jest.restoreAllMocks();
    await app.close();
  });

  async function pendingOrder(userId: number, minutesAgo: number): Promise<Order> {
    seedUser(app.db, { id: userId });
    const order = await app.orders.createOrder(userId, [{ productId: 1, quantity: 1 }], 'gateway', PRICING);
    backdateOrder(app.db, order.id, minutesAgo);
    return order;
  }

  it('expires overdue orders and releases their stock', async () => {
    const overdue = await pendingOrder(100, 11);
    const fresh = await pendingOrder(101, 2);

    await expect(app.expiryJob.sweep()).resolves.toBe(1);

    expect(orderStatus(app.db, overdue.id)).toBe('expired');
    expect(orderStatus(app.db, fresh.id)).toBe('pending');
    expect(app.inventory.availableCount(1)).toBe(4);
    expect(app.audit.findByEntity('order', overdue.invoiceId)[1]).toMatchObject({
      action: 'order_expired',
      actorType: 'system',
      context: { source: 'sweeper', releasedUnits: 1 },
    });
  });

  it('uses the supplied clock for the cutoff', async () => {
    const order = await pendingOrder(100, 0);

    await expect(app.expiryJob.sweep(new Date(Date.now() + 5 * 60 * 1000))).resolves.toBe(0);
    await expect(app.expiryJob.sweep(new Date(Date.now() + 11 * 60 * 1000))).resolves.toBe(1);
    expect(orderStatus(app.db, order.id)).toBe('expired');
  });

  it('treats an order that was settled mid-sweep as a no-op', async () => {
    const order = await pendingOrder(100, 11);
    jest
      .spyOn(app.orders, 'markExpired')
      .mockRejectedValueOnce(new InvalidTransitionException(order.id, 'paid', 'expired'));

    await expect(app.expiryJob.sweep()).resolves.toBe(0);
  });

  it('keeps sweeping after one order fails and retries it next time', async () => {
    const failing = await pendingOrder(100, 20);
    const other = await pendingOrder(101, 15);
    jest.spyOn(app.orders, 'markExpired').mockRejectedValueOnce(new Error('disk I/O error'));

    await expect(app.expiryJob.sweep()).resolves.toBe(1);
    expect(orderStatus(app.db, failing.id)).toBe('pending');
    expect(orderStatus(app.db, other.id)).toBe('expired');

    await expect(app.expiryJob.sweep()).resolves.toBe(1);
    expect(orderStatus(app.db, failing.id)).toBe('expired');
  });

  it('skips a sweep while another one is still running', async () => {
    await pendingOrder(100, 11);

    await expect(Promise.all([app.expiryJob.sweep(), app.expiryJob.sweep()])).resolves.toEqual([1, 0]);
  });

  it('runs on the configured interval until stopped', async () => {
    jest.useFakeTimers({ doNotFake: ['nextTick', 'setImmediate'] });
    const sweep = jest.spyOn(app.expiryJob, 'sweep').mockResolvedValue(0);

    app.expiryJob.start();
    await jest.advanceTimersByTimeAsync(120_000);
    expect(sweep).toHaveBeenCalledTimes(2);

    app.expiryJob.stop();
    await jest.advanceTimersByTimeAsync(120_000);
    expect(sweep).toHaveBeenCalledTimes(2);
  });
});
