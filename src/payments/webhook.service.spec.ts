import { NotFoundException } from '@nestjs/common';
import {
  AuditWriteFailureException,
  InvalidSignatureException,
  MalformedPayloadException,
} from '../common/exceptions/domain.exceptions';
import type { Order } from '../orders/type/order.type';
import { NotificationsService } from '../notifications/notifications.service';
import type { PaymentAuditInput } from '../audit/type/audit.type';
import {
  ADMIN_ID,
  createTestApp,
  orderStatus,
  seedStockedProduct,
  seedUser,
  soldCount,
} from '../testing/test-app';
import type { TestApp } from '../testing/test-app';
import { signWebhookBody } from './webhook.service';

const SECRET = 'test-secret';
const PRICING = { feeRatePpm: 7_000, fixedFee: 310 };

describe('WebhookService', () => {
  let app: TestApp;
  let order: Order;

  async function setup(env: Record<string, string> = { PAYMENT_WEBHOOK_SECRET: SECRET }) {
    app = await createTestApp(env);
    seedUser(app.db, { id: 100 });
    seedStockedProduct(app, { id: 1, name: 'Office 365', customerPrice: 100_000 }, 2);
    order = await app.orders.createOrder(100, [{ productId: 1, quantity: 1 }], 'gateway', PRICING);
  }

  function payload(overrides: Record<string, unknown> = {}) {
    return {
      project: 'test-store',
      order_id: order.invoiceId,
      amount: 101_010,
      status: 'completed',
      payment_method: 'qris',
      completed_at: '2030-01-01T00:05:00.000Z',
      ...overrides,
    };
  }

  function deliver(body: unknown, signature?: string) {
    const rawBody = Buffer.from(JSON.stringify(body));
    return app.webhooks.handle({
      rawBody,
      signature: signature ?? signWebhookBody(rawBody, SECRET),
      body,
      ipAddress: '203.0.113.7',
    });
  }

  afterEach(async () => {
    jest.restoreAllMocks();
    await app.close();
  });

  describe('with a signing secret', () => {
    beforeEach(() => setup());

    it('settles the order on a completed notification', async () => {
      await expect(deliver(payload())).resolves.toEqual({ outcome: 'settled', invoiceId: order.invoiceId });

      expect(orderStatus(app.db, order.id)).toBe('paid');
      expect(app.chat.messagesFor(100)).toEqual([
        `Pembayaran ${order.invoiceId} berhasil (Rp 101.010).\n\nProduk Anda:\n- Office 365: KEY-1-1`,
      ]);
      expect(app.audit.paymentHistory(100).map((entry) => entry.status)).toEqual(['paid', 'webhook_completed']);
    });

    it('fulfils once no matter how often the notification is replayed', async () => {
      const outcomes: string[] = [];
      for (let i = 0; i < 5; i++) {
        outcomes.push((await deliver(payload())).outcome);
      }

      expect(outcomes).toEqual(['settled', 'duplicate', 'duplicate', 'duplicate', 'duplicate']);
      expect(soldCount(app.db, 1)).toBe(1);
      expect(app.chat.messagesFor(100)).toHaveLength(1);
    });

    it('fulfils once when duplicates arrive concurrently', async () => {
      const results = await Promise.all([deliver(payload()), deliver(payload()), deliver(payload())]);

      expect(results.map((r) => r.outcome).sort()).toEqual(['duplicate', 'duplicate', 'settled']);
      expect(app.chat.messagesFor(100)).toHaveLength(1);
    });

    it('accepts an upper-case hex signature and status', async () => {
      const body = payload({ status: 'COMPLETED' });
      const signature = signWebhookBody(Buffer.from(JSON.stringify(body)), SECRET).toUpperCase();

      await expect(deliver(body, signature)).resolves.toMatchObject({ outcome: 'settled' });
    });

    it('rejects a wrong signature before touching any state', async () => {
      const forged = signWebhookBody(Buffer.from(JSON.stringify(payload())), 'another-secret');

      await expect(deliver(payload(), forged)).rejects.toBeInstanceOf(InvalidSignatureException);
      expect(orderStatus(app.db, order.id)).toBe('pending');
      expect(app.audit.paymentHistory()).toEqual([]);
    });

    it('rejects a missing signature', async () => {
      await expect(
        app.webhooks.handle({ rawBody: Buffer.from('{}'), signature: undefined, body: {} }),
      ).rejects.toBeInstanceOf(InvalidSignatureException);
    });

    it('rejects a payload that fails validation', async () => {
      const error = await deliver(payload({ amount: '101010' })).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MalformedPayloadException);
      if (error instanceof MalformedPayloadException) {
        expect(error.issues).toEqual(['amount: amount harus berupa angka']);
      }
    });

    it('rejects a notification for an unknown invoice', async () => {
      await expect(deliver(payload({ order_id: 'INV-20300101-ZZZZZZ' }))).rejects.toBeInstanceOf(
        NotFoundException,
      );
    });

    it('rejects a completed notification whose amount differs from the bill', async () => {
      await expect(deliver(payload({ amount: 100_000 }))).rejects.toMatchObject({
        issues: ['amount: 100000 does not match order total 101010'],
      });
      expect(orderStatus(app.db, order.id)).toBe('pending');
    });

    it('does not resurrect an order that already expired', async () => {
      await app.orders.markExpired(order.id);

      await expect(deliver(payload())).resolves.toMatchObject({ outcome: 'duplicate' });

      expect(orderStatus(app.db, order.id)).toBe('expired');
      expect(app.inventory.availableCount(1)).toBe(2);
      expect(app.audit.findByEntity('order', order.invoiceId).map((entry) => entry.action)).toEqual([
        'order_created',
        'order_expired',
        'transition_rejected',
      ]);
    });

    it('expires the order on an expired notification and treats a repeat as duplicate', async () => {
      await expect(deliver(payload({ status: 'expired' }))).resolves.toMatchObject({ outcome: 'expired' });
      await expect(deliver(payload({ status: 'expired' }))).resolves.toMatchObject({ outcome: 'duplicate' });

      expect(orderStatus(app.db, order.id)).toBe('expired');
      expect(app.audit.findByEntity('order', order.invoiceId)[1]).toMatchObject({
        action: 'order_expired',
        actorType: 'gateway',
      });
    });

    it.each(['canceled', 'cancelled'])('expires the order on a %s notification', async (status) => {
      await expect(deliver(payload({ status }))).resolves.toMatchObject({ outcome: 'expired' });

      expect(orderStatus(app.db, order.id)).toBe('expired');
      expect(app.inventory.availableCount(1)).toBe(2);
    });

    it('holds fulfilment when the settlement audit entry fails and lets an admin redeliver', async () => {
      const notifyAdmins = jest.spyOn(app.moduleRef.get(NotificationsService), 'notifyAdmins');
      const recordPayment = app.audit.recordPayment.bind(app.audit);
      jest.spyOn(app.audit, 'recordPayment').mockImplementation(async (entry: PaymentAuditInput) => {
        if (entry.status === 'paid') {
          throw new AuditWriteFailureException('payment_paid', entry.invoiceId);
        }
        return recordPayment(entry);
      });

      await expect(deliver(payload())).rejects.toBeInstanceOf(AuditWriteFailureException);

      expect(orderStatus(app.db, order.id)).toBe('paid');
      expect(app.chat.messagesFor(100)).toEqual([]);
      expect(notifyAdmins).toHaveBeenCalledWith(
        `Manual delivery required ${order.invoiceId}`,
        `Order ${order.invoiceId} (user 100) is paid but fulfilment was skipped ` +
          'because the payment audit entry could not be written. ' +
          `Redeliver with POST /api/admin/orders/${order.invoiceId}/redeliver once the audit store is healthy.`,
      );

      await expect(deliver(payload())).resolves.toMatchObject({ outcome: 'duplicate' });
      expect(app.chat.messagesFor(100)).toEqual([]);

      const admin = app.authorizer.authorize(ADMIN_ID);
      if (!admin) throw new Error('test admin is not configured');
      await expect(app.admin.redeliverOrder(admin, order.invoiceId)).resolves.toMatchObject({
        status: 'paid',
      });

      expect(app.chat.messagesFor(100)).toEqual([
        `Pembayaran ${order.invoiceId} berhasil (Rp 101.010).\n\nProduk Anda:\n- Office 365: KEY-1-1`,
      ]);
      expect(app.audit.findByEntity('order', order.invoiceId).map((entry) => entry.action)).toEqual([
        'order_created',
        'order_paid',
        'transition_rejected',
        'order_redelivered',
        'order_fulfilled',
      ]);
    });

    it.each(['pending', 'refunded'])('ignores a %s notification', async (status) => {
      await expect(deliver(payload({ status }))).resolves.toMatchObject({ outcome: 'ignored' });
      expect(orderStatus(app.db, order.id)).toBe('pending');
    });
  });

  describe('without a signing secret', () => {
    beforeEach(() => setup({}));

    it('accepts unsigned notifications', async () => {
      await expect(
        app.webhooks.handle({ rawBody: undefined, signature: undefined, body: payload() }),
      ).resolves.toMatchObject({ outcome: 'settled' });
    });
  });
});
