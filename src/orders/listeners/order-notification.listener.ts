import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { InventoryService } from '../../inventory/inventory.service';
import type { DeliverableUnit } from '../../inventory/type/inventory.type';
import { NotificationsService } from '../../notifications/notifications.service';
import { AuditService } from '../../audit/audit.service';
import { formatCurrency } from '../../wallet/type/wallet.type';
import { ORDER_EVENTS } from '../type/order.type';
import type {
  OrderCancelledEvent,
  OrderExpiredEvent,
  OrderPaidEvent,
} from '../type/order.type';

export function formatDeliveryMessage(invoiceId: string, total: number, units: DeliverableUnit[]): string {
  const lines = [
    `Pembayaran ${invoiceId} berhasil (${formatCurrency(total)}).`,
    '',
    'Produk Anda:',
  ];
  for (const unit of units) {
    lines.push(`- ${unit.productName}: ${unit.content}`);
  }
  return lines.join('\n');
}

/**
 * Listener event order
 *
 * order.paid      -> kirim isi unit stok ke pembeli (fulfilment)
 * order.expired   -> beri tahu pembeli bahwa waktu pembayaran habis
 * order.cancelled -> beri tahu pembeli bahwa pesanan dibatalkan
 *
 * Event hanya di-emit oleh pemenang transisi di OrdersService,
 * jadi fulfilment terjadi tepat satu kali per order, kecuali admin
 * sengaja mengirim ulang lewat OrdersService.redeliver.
 */
@Injectable()
export class OrderNotificationListener {
  private readonly logger = new Logger(OrderNotificationListener.name);

  constructor(
    private inventoryService: InventoryService,
    private notificationsService: NotificationsService,
    private auditService: AuditService,
  ) {}

  @OnEvent(ORDER_EVENTS.PAID)
  async handleOrderPaid({ order }: OrderPaidEvent) {
    const units = this.inventoryService.unitsForOrder(order.id);
    const delivered = await this.notificationsService.notifyBuyer(
      order.userId,
      formatDeliveryMessage(order.invoiceId, order.totalBill, units),
    );

    if (!delivered) {
      await this.notificationsService.notifyAdmins(
        'Manual delivery required',
        `Order ${order.invoiceId} (user ${order.userId}) is paid but the product message could not be delivered.`,
      );
    }

    this.logger.log(`Order ${order.invoiceId} fulfilment: ${units.length} unit(s), delivered=${delivered}`);

    await this.auditService.record({
      actorId: null,
      actorType: 'system',
      entityType: 'order',
      entityId: order.invoiceId,
      action: 'order_fulfilled',
      context: { units: units.map((unit) => unit.stockId), delivered },
    });
  }

  @OnEvent(ORDER_EVENTS.EXPIRED)
  async handleOrderExpired({ order }: OrderExpiredEvent) {
    await this.notificationsService.notifyBuyer(
      order.userId,
      `Pesanan ${order.invoiceId} kedaluwarsa karena pembayaran tidak diterima tepat waktu. ` +
        'Jika Anda sudah membayar, dana akan dikembalikan (dipotong biaya transaksi).',
    );
  }

  @OnEvent(ORDER_EVENTS.CANCELLED)
  async handleOrderCancelled({ order, actor }: OrderCancelledEvent) {
    const reason = actor.type === 'admin' ? ` oleh admin. Alasan: ${actor.reason}` : '.';
    await this.notificationsService.notifyBuyer(
      order.userId,
      `Pesanan ${order.invoiceId} telah dibatalkan${reason}`,
    );
  }
}
