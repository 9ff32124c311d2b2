import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { randomInt } from 'crypto';
import { DatabaseService } from '../database/database.service';
import type { Db } from '../database/database.service';
import { InventoryService } from '../inventory/inventory.service';
import { WalletService } from '../wallet/wallet.service';
import { AuditService } from '../audit/audit.service';
import type { AuditActorType } from '../audit/type/audit.type';
import { NotificationsService } from '../notifications/notifications.service';
import {
  AuditWriteFailureException,
  DuplicatePendingOrderException,
  InvalidTransitionException,
} from '../common/exceptions/domain.exceptions';
import { calculatePaymentFee, calculateTotal } from '../payments/type/payment.type';
import { MAX_QUANTITY_PER_LINE, ORDER_EVENTS, toOrder, toOrderItem } from './type/order.type';
import type {
  CancelActor,
  ExpirySource,
  MemberStatus,
  Order,
  OrderCancelledEvent,
  OrderExpiredEvent,
  OrderItemRow,
  OrderLineRequest,
  OrderPaidEvent,
  OrderPricing,
  OrderRow,
  OrderStats,
  OrderStatus,
  OrderWithItems,
  PaginatedOrders,
  PaymentMethod,
  Settlement,
  TerminalOrderStatus,
  TransitionResult,
} from './type/order.type';

const INVOICE_ALPHABET = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';
const INVOICE_ATTEMPTS = 5;

export function generateInvoiceId(now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10).replace(/-/g, '');
  let suffix = '';
  for (let i = 0; i < 6; i++) {
    suffix += INVOICE_ALPHABET[randomInt(INVOICE_ALPHABET.length)];
  }
  return `INV-${date}-${suffix}`;
}

function isUniqueViolation(error: unknown, column: string): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'SQLITE_CONSTRAINT_UNIQUE' &&
    error.message.includes(column)
  );
}

type CasOutcome<T> =
  | { kind: 'changed'; order: Order; extra: T }
  | { kind: 'unchanged'; order: Order }
  | { kind: 'rejected'; order: Order };

/**
 * OrdersService (Order Ledger)
 *
 * Pemilik tunggal tabel orders dan order_items. Semua transisi status
 * ditulis sebagai satu statement compare-and-set:
 *
 *   UPDATE orders SET status = ? WHERE id = ? AND status = 'pending'
 *
 * sehingga dari beberapa pemanggil yang berebut (webhook, sweeper, user)
 * hanya satu yang menang. Yang kalah menerima InvalidTransitionException,
 * kecuali expire/cancel ke status yang memang sudah sama (no-op).
 *
 * Efek samping (audit, event fulfilment/notifikasi) hanya dijalankan
 * oleh pemenang dan setelah transaksi commit.
 */
@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    private database: DatabaseService,
    private inventoryService: InventoryService,
    private walletService: WalletService,
    private auditService: AuditService,
    private notificationsService: NotificationsService,
    private eventEmitter: EventEmitter2,
  ) {}

  /**
   * Membuat order baru sekaligus mereservasi stok
   *
   * Semua langkah berjalan dalam satu transaksi:
   * 1. Pastikan user tidak punya order pending lain
   * 2. Snapshot harga per unit (harga reseller untuk member reseller)
   * 3. Hitung subtotal, fee gateway, dan total
   * 4. Insert order dengan invoice ID unik
   * 5. Reservasi unit stok tiap baris dan catat order_items
   *
   * Kalau salah satu langkah gagal (stok kurang, dll), tidak ada yang tersimpan.
   */
  async createOrder(
    userId: number,
    items: OrderLineRequest[],
    paymentMethod: PaymentMethod,
    pricing: OrderPricing,
  ): Promise<OrderWithItems> {
    if (items.length === 0) {
      throw new BadRequestException('Keranjang belanja kosong');
    }
    for (const item of items) {
      if (!Number.isInteger(item.quantity) || item.quantity < 1 || item.quantity > MAX_QUANTITY_PER_LINE) {
        throw new BadRequestException(`Jumlah per produk harus antara 1 dan ${MAX_QUANTITY_PER_LINE}`);
      }
    }

    const order = this.database.transaction((tx) => {
      const user = tx
        .prepare<[number], { member_status: MemberStatus }>(
          'SELECT member_status FROM users WHERE id = ?',
        )
        .get(userId);
      if (!user) {
        throw new NotFoundException('User tidak ditemukan');
      }

      const existing = this.pendingRowInTx(tx, userId);
      if (existing) {
        throw new DuplicatePendingOrderException(userId, existing.invoice_id);
      }

      const lines = items.map((item) => {
        const product = this.inventoryService.findProduct(item.productId);
        if (!product) {
          throw new NotFoundException(`Produk ${item.productId} tidak ditemukan`);
        }
        if (!product.isActive) {
          throw new BadRequestException(`Produk ${product.name} sedang tidak tersedia`);
        }
        const pricePerUnit =
          user.member_status === 'reseller' && product.resellerPrice !== null
            ? product.resellerPrice
            : product.customerPrice;
        return { ...item, pricePerUnit };
      });

      const subtotal = lines.reduce((sum, line) => sum + line.pricePerUnit * line.quantity, 0);
      const discount = 0;
      // Saldo akun tidak dikenai biaya gateway
      const paymentFee = paymentMethod === 'gateway' ? calculatePaymentFee(subtotal, pricing) : 0;
      const totalBill = calculateTotal(subtotal, discount, paymentFee);

      const orderId = this.insertOrderInTx(tx, {
        userId,
        subtotal,
        discount,
        paymentFee,
        totalBill,
        paymentMethod,
      });

      const insertItem = tx.prepare<[number, number, string, number]>(
        'INSERT INTO order_items (order_id, product_id, stock_id, price_per_unit) VALUES (?, ?, ?, ?)',
      );
      for (const line of lines) {
        const stockIds = this.inventoryService.reserveInTx(tx, line.productId, line.quantity, orderId);
        for (const stockId of stockIds) {
          insertItem.run(orderId, line.productId, stockId, line.pricePerUnit);
        }
      }

      return this.withItemsInTx(tx, this.requireOrderInTx(tx, orderId));
    });

    this.logger.log(
      `Order ${order.invoiceId} created for user ${userId}: ${order.items.length} unit(s), total ${order.totalBill}`,
    );

    await this.auditService.record({
      actorId: userId,
      actorType: 'user',
      entityType: 'order',
      entityId: order.invoiceId,
      action: 'order_created',
      afterState: { status: order.status, totalBill: order.totalBill },
      context: { items, paymentMethod },
    });

    return order;
  }

  /**
   * Tandai order sudah dibayar
   *
   * Dalam satu transaksi: CAS pending -> paid, potong saldo (metode balance),
   * dan finalize stok. Setelah commit: audit pembayaran (regulated),
   * lalu event order.paid yang memicu pengiriman produk.
   */
  async markPaid(orderId: number, settlement: Settlement): Promise<Order> {
    const outcome = this.database.transaction((tx): CasOutcome<null> => {
      const current = this.requireOrderInTx(tx, orderId);
      if (!this.casFromPendingInTx(tx, orderId, 'paid')) {
        return { kind: 'rejected', order: current };
      }

      if (current.paymentMethod === 'balance') {
        this.walletService.debitInTx(tx, current.userId, current.totalBill, current.id);
      }
      this.inventoryService.finalizeInTx(tx, orderId);

      return { kind: 'changed', order: this.requireOrderInTx(tx, orderId), extra: null };
    });

    const actor = this.settlementActor(settlement, outcome.order);

    if (outcome.kind !== 'changed') {
      return this.rejectTransition(outcome.order, 'paid', actor);
    }

    const order = outcome.order;
    this.logger.log(`Order ${order.invoiceId} paid via ${settlement.source}`);

    try {
      await this.auditService.record({
        ...actor,
        entityType: 'order',
        entityId: order.invoiceId,
        action: 'order_paid',
        beforeState: { status: 'pending' },
        afterState: { status: 'paid' },
        context: { source: settlement.source, amount: settlement.amount },
      });

      await this.auditService.recordPayment({
        invoiceId: order.invoiceId,
        userId: order.userId,
        amount: order.totalBill,
        paymentMethod: order.paymentMethod,
        status: 'paid',
        gatewayResponse: settlement.raw,
        metadata: {
          source: settlement.source,
          reference: settlement.reference ?? null,
          completedAt: settlement.completedAt ? settlement.completedAt.toISOString() : null,
        },
      });
    } catch (error) {
      if (error instanceof AuditWriteFailureException) {
        // Uang sudah masuk tapi fulfilment ditahan sampai admin mengirim ulang
        await this.notificationsService.notifyAdmins(
          `Manual delivery required ${order.invoiceId}`,
          `Order ${order.invoiceId} (user ${order.userId}) is paid but fulfilment was skipped ` +
            'because the payment audit entry could not be written. ' +
            `Redeliver with POST /api/admin/orders/${order.invoiceId}/redeliver once the audit store is healthy.`,
        );
      }
      throw error;
    }

    const event: OrderPaidEvent = { order, settlement };
    await this.eventEmitter.emitAsync(ORDER_EVENTS.PAID, event);

    return order;
  }

  /**
   * Expire order yang melewati batas waktu pembayaran dan kembalikan stoknya.
   * No-op kalau order sudah expired.
   */
  async markExpired(orderId: number, source: ExpirySource = 'sweeper'): Promise<TransitionResult> {
    const outcome = this.database.transaction((tx) =>
      this.terminateInTx(tx, orderId, 'expired'),
    );
    const actor: { actorId: number | null; actorType: AuditActorType } = {
      actorId: null,
      actorType: source === 'gateway' ? 'gateway' : 'system',
    };

    if (outcome.kind === 'rejected') {
      return this.rejectTransition(outcome.order, 'expired', actor);
    }
    if (outcome.kind === 'unchanged') {
      return { changed: false, order: outcome.order };
    }

    const order = outcome.order;
    this.logger.log(`Order ${order.invoiceId} expired (${source}), released ${outcome.extra} unit(s)`);

    await this.auditService.record({
      ...actor,
      entityType: 'order',
      entityId: order.invoiceId,
      action: 'order_expired',
      beforeState: { status: 'pending' },
      afterState: { status: 'expired' },
      context: { source, releasedUnits: outcome.extra },
    });

    const event: OrderExpiredEvent = { order, releasedUnits: outcome.extra };
    await this.eventEmitter.emitAsync(ORDER_EVENTS.EXPIRED, event);

    return { changed: true, order };
  }

  async markCancelled(orderId: number, actor: CancelActor): Promise<TransitionResult> {
    const outcome = this.database.transaction((tx) =>
      this.terminateInTx(tx, orderId, 'cancelled'),
    );
    const auditActor: { actorId: number | null; actorType: AuditActorType } =
      actor.type === 'admin'
        ? { actorId: actor.adminId, actorType: 'admin' }
        : { actorId: actor.userId, actorType: 'user' };

    if (outcome.kind === 'rejected') {
      return this.rejectTransition(outcome.order, 'cancelled', auditActor);
    }
    if (outcome.kind === 'unchanged') {
      return { changed: false, order: outcome.order };
    }

    const order = outcome.order;
    this.logger.log(`Order ${order.invoiceId} cancelled by ${actor.type}, released ${outcome.extra} unit(s)`);

    await this.auditService.record({
      ...auditActor,
      entityType: 'order',
      entityId: order.invoiceId,
      action: 'order_cancelled',
      beforeState: { status: 'pending' },
      afterState: { status: 'cancelled' },
      context: {
        releasedUnits: outcome.extra,
        reason: actor.type === 'admin' ? actor.reason : null,
      },
    });

    const event: OrderCancelledEvent = { order, actor, releasedUnits: outcome.extra };
    await this.eventEmitter.emitAsync(ORDER_EVENTS.CANCELLED, event);

    return { changed: true, order };
  }

  /**
   * Kirim ulang produk untuk order yang sudah paid
   *
   * Dipakai admin saat fulfilment tertahan (misalnya audit pembayaran gagal
   * ditulis setelah settlement). Status order tidak berubah.
   */
  async redeliver(invoiceId: string, adminId: number): Promise<Order> {
    const row = this.database.connection
      .prepare<[string], OrderRow>('SELECT * FROM orders WHERE invoice_id = ?')
      .get(invoiceId);
    if (!row) {
      throw new NotFoundException('Pesanan tidak ditemukan');
    }
    const order = toOrder(row);
    if (order.status !== 'paid') {
      throw new BadRequestException('Hanya pesanan yang sudah dibayar yang bisa dikirim ulang');
    }

    await this.auditService.record(
      {
        actorId: adminId,
        actorType: 'admin',
        entityType: 'order',
        entityId: order.invoiceId,
        action: 'order_redelivered',
      },
      { regulated: true },
    );

    this.logger.log(`Admin ${adminId} redelivering order ${order.invoiceId}`);
    const event: OrderPaidEvent = { order, settlement: null };
    await this.eventEmitter.emitAsync(ORDER_EVENTS.PAID, event);

    return order;
  }

  pendingOrderFor(userId: number): Order | null {
    const row = this.pendingRowInTx(this.database.connection, userId);
    return row ? toOrder(row) : null;
  }

  findById(orderId: number): Order | null {
    const row = this.database.connection
      .prepare<[number], OrderRow>('SELECT * FROM orders WHERE id = ?')
      .get(orderId);
    return row ? toOrder(row) : null;
  }

  findByInvoiceId(invoiceId: string): OrderWithItems | null {
    const db = this.database.connection;
    const row = db
      .prepare<[string], OrderRow>('SELECT * FROM orders WHERE invoice_id = ?')
      .get(invoiceId);
    return row ? this.withItemsInTx(db, toOrder(row)) : null;
  }

  /** Order pending yang dibuat sebelum `cutoff`, paling lama dulu */
  findExpirable(cutoff: Date, limit = 100): Order[] {
    return this.database.connection
      .prepare<[string, number], OrderRow>(
        `SELECT * FROM orders
         WHERE status = 'pending' AND created_at <= ?
         ORDER BY created_at ASC
         LIMIT ?`,
      )
      .all(cutoff.toISOString(), limit)
      .map(toOrder);
  }

  getUserOrders(userId: number, page = 1, limit = 10): PaginatedOrders {
    const db = this.database.connection;
    const offset = (page - 1) * limit;

    const orders = db
      .prepare<[number, number, number], OrderRow>(
        'SELECT * FROM orders WHERE user_id = ? ORDER BY created_at DESC, id DESC LIMIT ? OFFSET ?',
      )
      .all(userId, limit, offset)
      .map(toOrder);

    const total =
      db
        .prepare<[number], { count: number }>('SELECT COUNT(*) AS count FROM orders WHERE user_id = ?')
        .get(userId)?.count ?? 0;

    return { orders, total, page, limit, totalPages: Math.ceil(total / limit) };
  }

  /** Jumlah order user dalam `hours` jam terakhir (rate limiting) */
  recentOrderCount(userId: number, hours = 1, now: Date = new Date()): number {
    const since = new Date(now.getTime() - hours * 60 * 60 * 1000);
    return (
      this.database.connection
        .prepare<[number, string], { count: number }>(
          'SELECT COUNT(*) AS count FROM orders WHERE user_id = ? AND created_at >= ?',
        )
        .get(userId, since.toISOString())?.count ?? 0
    );
  }

  /** Jumlah order yang tidak jadi dibayar (expired/cancelled) dalam `days` hari terakhir */
  failedPaymentCount(userId: number, days = 7, now: Date = new Date()): number {
    const since = new Date(now.getTime() - days * 24 * 60 * 60 * 1000);
    return (
      this.database.connection
        .prepare<[number, string], { count: number }>(
          `SELECT COUNT(*) AS count FROM orders
           WHERE user_id = ? AND status IN ('expired', 'cancelled') AND created_at >= ?`,
        )
        .get(userId, since.toISOString())?.count ?? 0
    );
  }

  getOrderStats(): OrderStats {
    const rows = this.database.connection
      .prepare<[], { status: OrderStatus; count: number; revenue: number }>(
        'SELECT status, COUNT(*) AS count, COALESCE(SUM(total_bill), 0) AS revenue FROM orders GROUP BY status',
      )
      .all();

    const stats: OrderStats = { total: 0, pending: 0, paid: 0, expired: 0, cancelled: 0, revenue: 0 };
    for (const row of rows) {
      stats[row.status] = row.count;
      stats.total += row.count;
      if (row.status === 'paid') {
        stats.revenue = row.revenue;
      }
    }
    return stats;
  }

  private pendingRowInTx(db: Db, userId: number): OrderRow | undefined {
    return db
      .prepare<[number], OrderRow>("SELECT * FROM orders WHERE user_id = ? AND status = 'pending'")
      .get(userId);
  }

  private requireOrderInTx(db: Db, orderId: number): Order {
    const row = db.prepare<[number], OrderRow>('SELECT * FROM orders WHERE id = ?').get(orderId);
    if (!row) {
      throw new NotFoundException('Pesanan tidak ditemukan');
    }
    return toOrder(row);
  }

  private withItemsInTx(db: Db, order: Order): OrderWithItems {
    const items = db
      .prepare<[number], OrderItemRow>('SELECT * FROM order_items WHERE order_id = ? ORDER BY id ASC')
      .all(order.id)
      .map(toOrderItem);
    return { ...order, items };
  }

  private insertOrderInTx(
    tx: Db,
    values: {
      userId: number;
      subtotal: number;
      discount: number;
      paymentFee: number;
      totalBill: number;
      paymentMethod: PaymentMethod;
    },
  ): number {
    const now = new Date();
    const insert = tx.prepare(
      `INSERT INTO orders
        (invoice_id, user_id, subtotal, discount, payment_fee, total_bill, payment_method, status, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, 'pending', ?, ?)`,
    );

    for (let attempt = 1; attempt <= INVOICE_ATTEMPTS; attempt++) {
      try {
        const result = insert.run(
          generateInvoiceId(now),
          values.userId,
          values.subtotal,
          values.discount,
          values.paymentFee,
          values.totalBill,
          values.paymentMethod,
          now.toISOString(),
          now.toISOString(),
        );
        return Number(result.lastInsertRowid);
      } catch (error) {
        if (isUniqueViolation(error, 'orders.user_id')) {
          throw new DuplicatePendingOrderException(
            values.userId,
            this.pendingRowInTx(tx, values.userId)?.invoice_id ?? null,
          );
        }
        if (!isUniqueViolation(error, 'orders.invoice_id')) {
          throw error;
        }
        this.logger.warn(`Invoice ID collision (attempt ${attempt}), regenerating`);
      }
    }
    throw new Error(`Failed to generate a unique invoice ID after ${INVOICE_ATTEMPTS} attempts`);
  }

  private casFromPendingInTx(tx: Db, orderId: number, to: TerminalOrderStatus): boolean {
    const result = tx
      .prepare<[TerminalOrderStatus, string, number]>(
        "UPDATE orders SET status = ?, updated_at = ? WHERE id = ? AND status = 'pending'",
      )
      .run(to, new Date().toISOString(), orderId);
    return result.changes === 1;
  }

  private terminateInTx(
    tx: Db,
    orderId: number,
    to: 'expired' | 'cancelled',
  ): CasOutcome<number> {
    const current = this.requireOrderInTx(tx, orderId);
    if (current.status === to) {
      return { kind: 'unchanged', order: current };
    }
    if (!this.casFromPendingInTx(tx, orderId, to)) {
      return { kind: 'rejected', order: current };
    }
    const released = this.inventoryService.releaseInTx(tx, orderId);
    return { kind: 'changed', order: this.requireOrderInTx(tx, orderId), extra: released };
  }

  private settlementActor(
    settlement: Settlement,
    order: Order,
  ): { actorId: number | null; actorType: AuditActorType } {
    switch (settlement.source) {
      case 'webhook':
        return { actorId: null, actorType: 'gateway' };
      case 'poll':
        return { actorId: null, actorType: 'system' };
      case 'balance':
        return { actorId: order.userId, actorType: 'user' };
    }
  }

  private async rejectTransition(
    order: Order,
    attempted: TerminalOrderStatus,
    actor: { actorId: number | null; actorType: AuditActorType },
  ): Promise<never> {
    this.logger.warn(
      `Rejected transition of order ${order.invoiceId}: ${order.status} -> ${attempted}`,
    );

    await this.auditService.record({
      ...actor,
      entityType: 'order',
      entityId: order.invoiceId,
      action: 'transition_rejected',
      beforeState: { status: order.status },
      context: { attempted },
    });

    throw new InvalidTransitionException(order.id, order.status, attempted);
  }
}
