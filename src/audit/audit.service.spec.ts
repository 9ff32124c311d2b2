import { AuditWriteFailureException } from '../common/exceptions/domain.exceptions';
import { createTestApp } from '../testing/test-app';
import type { TestApp } from '../testing/test-app';
import { GENESIS_HASH } from './type/audit.type';

describe('AuditService', () => {
  let app: TestApp;

  beforeEach(async () => {
    app = await createTestApp();
  });

  afterEach(async () => {
    await app.close();
  });

  async function recordOrderEvent(action: string, actorId: number | null = 100) {
    await app.audit.record({
      actorId,
      actorType: actorId === null ? 'system' : 'user',
      entityType: 'order',
      entityId: 'INV-20300101-AAAAAA',
      action,
      afterState: { status: 'pending' },
    });
  }

  it('chains each entry to the previous hash', async () => {
    await recordOrderEvent('order_created');
    await recordOrderEvent('order_paid');

    const [first, second] = app.audit.findByEntity('order', 'INV-20300101-AAAAAA');
    const prevHashes = app.audit.connection
      .prepare<[], { prev_hash: string }>('SELECT prev_hash FROM audit_logs ORDER BY id ASC')
      .all()
      .map((row) => row.prev_hash);

    expect(prevHashes).toEqual([GENESIS_HASH, first.hash]);
    expect(second.hash).toMatch(/^[0-9a-f]{64}$/);
    expect(app.audit.verifyChain()).toEqual({ valid: true, checked: 2, brokenAt: null });
  });

  it('rejects updates and deletes on audit rows', async () => {
    await recordOrderEvent('order_created');
    const db = app.audit.connection;

    expect(() => db.prepare("UPDATE audit_logs SET action = 'tampered'").run()).toThrow(
      'audit_logs is append-only',
    );
    expect(() => db.prepare('DELETE FROM audit_logs').run()).toThrow('audit_logs is append-only');
    expect(app.audit.findByActor(100).map((e) => e.action)).toEqual(['order_created']);
  });

  it('detects a broken chain', async () => {
    await recordOrderEvent('order_created');
    await recordOrderEvent('order_paid');
    const db = app.audit.connection;

    // Tulis ulang baris kedua tanpa trigger, seperti pihak yang mengubah file database langsung
    db.exec('DROP TRIGGER audit_logs_no_update');
    db.prepare("UPDATE audit_logs SET action = 'order_cancelled' WHERE id = 2").run();

    expect(app.audit.verifyChain()).toEqual({
      valid: false,
      checked: 2,
      brokenAt: { table: 'audit_logs', id: 2 },
    });
  });

  it('returns entity history oldest first and actor history newest first', async () => {
    await recordOrderEvent('order_created');
    await recordOrderEvent('order_paid');
    await recordOrderEvent('order_fulfilled', null);

    expect(app.audit.findByEntity('order', 'INV-20300101-AAAAAA').map((e) => e.action)).toEqual([
      'order_created',
      'order_paid',
      'order_fulfilled',
    ]);
    expect(app.audit.findByActor(100).map((e) => e.action)).toEqual(['order_paid', 'order_created']);
  });

  it('parses stored JSON state back into objects', async () => {
    await app.audit.record({
      actorId: 9000,
      actorType: 'admin',
      entityType: 'user_balance',
      entityId: '100',
      action: 'balance_adjusted',
      beforeState: { balance: 0 },
      afterState: { balance: 5000 },
      context: { reason: 'manual top up' },
      ipAddress: '10.0.0.1',
    });

    const [entry] = app.audit.findByActor(9000);
    expect(entry).toMatchObject({
      actorType: 'admin',
      beforeState: { balance: 0 },
      afterState: { balance: 5000 },
      context: { reason: 'manual top up' },
      ipAddress: '10.0.0.1',
    });
  });

  it('filters search results', async () => {
    await recordOrderEvent('order_created', 100);
    await recordOrderEvent('order_created', 101);
    await recordOrderEvent('order_cancelled', 101);

    expect(app.audit.search({ action: 'order_created' }).map((e) => e.actorId)).toEqual([101, 100]);
    expect(app.audit.search({ actorId: 101, action: 'order_cancelled' })).toHaveLength(1);
    expect(app.audit.search({ limit: 1 }).map((e) => e.action)).toEqual(['order_cancelled']);
    expect(app.audit.search({ from: new Date(Date.now() + 60_000) })).toEqual([]);
  });

  it('counts actor actions since a point in time', async () => {
    await recordOrderEvent('order_created');
    await recordOrderEvent('order_created');
    await recordOrderEvent('order_cancelled');

    expect(app.audit.countActorActions(100, 'order_created', new Date(Date.now() - 60_000))).toBe(2);
    expect(app.audit.countActorActions(100, 'order_created', new Date(Date.now() + 60_000))).toBe(0);
  });

  it('keeps payment history per user', async () => {
    await app.audit.recordPayment({
      invoiceId: 'INV-20300101-AAAAAA',
      userId: 100,
      amount: 101010,
      paymentMethod: 'gateway',
      status: 'paid',
      metadata: { source: 'webhook' },
    });
    await app.audit.recordPayment({
      invoiceId: 'INV-20300101-BBBBBB',
      userId: 101,
      amount: 50000,
      paymentMethod: 'balance',
      status: 'paid',
    });

    const history = app.audit.paymentHistory(100);
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({
      invoiceId: 'INV-20300101-AAAAAA',
      amount: 101010,
      metadata: { source: 'webhook' },
      gatewayResponse: null,
    });
    expect(app.audit.paymentHistory().map((e) => e.userId)).toEqual([101, 100]);
    expect(app.audit.verifyChain()).toEqual({ valid: true, checked: 2, brokenAt: null });
  });

  describe('write failures', () => {
    beforeEach(() => {
      app.audit.connection.exec('DROP TABLE audit_logs; DROP TABLE payment_audit_logs;');
    });

    it('lets the caller continue when a regular entry fails', async () => {
      await expect(recordOrderEvent('order_created')).resolves.toBeUndefined();
    });

    it('throws AuditWriteFailure for a regulated entry', async () => {
      await expect(
        app.audit.record(
          {
            actorId: 9000,
            actorType: 'admin',
            entityType: 'user_balance',
            entityId: '100',
            action: 'balance_adjusted',
          },
          { regulated: true },
        ),
      ).rejects.toBeInstanceOf(AuditWriteFailureException);
    });

    it('treats payment entries as regulated', async () => {
      await expect(
        app.audit.recordPayment({
          invoiceId: 'INV-20300101-AAAAAA',
          userId: 100,
          amount: 101010,
          paymentMethod: 'gateway',
          status: 'paid',
        }),
      ).rejects.toMatchObject({ action: 'payment_paid', entityId: 'INV-20300101-AAAAAA' });
    });
  });
});
