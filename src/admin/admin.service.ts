import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { OrdersService } from '../orders/orders.service';
import type { Order, TransitionResult } from '../orders/type/order.type';
import { InventoryService } from '../inventory/inventory.service';
import { WalletService } from '../wallet/wallet.service';
import type { WalletTransactionRecord } from '../wallet/type/wallet.type';
import { AuditService } from '../audit/audit.service';
import type { AuditEntry, AuditSearchFilter } from '../audit/type/audit.type';
import { AdminCapability } from './admin-capability';

export interface UserActivitySummary {
  userId: number;
  ordersLastHour: number;
  failedPaymentsLastWeek: number;
  recentAuditEntries: AuditEntry[];
}

/**
 * AdminService
 *
 * Operasi yang mengubah state (cancel, kirim ulang, adjust saldo, restock) selalu
 * meminta AdminCapability secara eksplisit.
 */
@Injectable()
export class AdminService {
  private readonly logger = new Logger(AdminService.name);

  constructor(
    private ordersService: OrdersService,
    private inventoryService: InventoryService,
    private walletService: WalletService,
    private auditService: AuditService,
  ) {}

  async cancelOrder(
    capability: AdminCapability,
    invoiceId: string,
    reason: string,
  ): Promise<TransitionResult> {
    const admin = AdminCapability.verify(capability);
    const order = this.ordersService.findByInvoiceId(invoiceId);
    if (!order) {
      throw new NotFoundException('Pesanan tidak ditemukan');
    }

    this.logger.log(`Admin ${admin.adminId} cancelling order ${invoiceId}`);
    return this.ordersService.markCancelled(order.id, {
      type: 'admin',
      adminId: admin.adminId,
      reason,
    });
  }

  async redeliverOrder(capability: AdminCapability, invoiceId: string): Promise<Order> {
    const admin = AdminCapability.verify(capability);
    return this.ordersService.redeliver(invoiceId, admin.adminId);
  }

  adjustBalance(
    capability: AdminCapability,
    userId: number,
    amount: number,
    reason: string,
  ): Promise<WalletTransactionRecord> {
    return this.walletService.adjustBalance(capability, userId, amount, reason);
  }

  async restock(capability: AdminCapability, productId: number, contents: string[]) {
    const admin = AdminCapability.verify(capability);
    const stockIds = this.inventoryService.restock(productId, contents);

    await this.auditService.record({
      actorId: admin.adminId,
      actorType: 'admin',
      entityType: 'product',
      entityId: String(productId),
      action: 'product_restocked',
      context: { units: stockIds.length },
    });

    return { productId, added: stockIds.length, available: this.inventoryService.availableCount(productId) };
  }

  getOrderStats() {
    return this.ordersService.getOrderStats();
  }

  getUserActivity(userId: number): UserActivitySummary {
    return {
      userId,
      ordersLastHour: this.ordersService.recentOrderCount(userId, 1),
      failedPaymentsLastWeek: this.ordersService.failedPaymentCount(userId, 7),
      recentAuditEntries: this.auditService.findByActor(userId, 20),
    };
  }

  searchAudit(filter: AuditSearchFilter) {
    return this.auditService.search(filter);
  }

  getOrderHistory(invoiceId: string) {
    return this.auditService.findByEntity('order', invoiceId);
  }

  getPaymentHistory(userId: number | undefined, limit: number) {
    return this.auditService.paymentHistory(userId, limit);
  }

  verifyAuditChain() {
    const result = this.auditService.verifyChain();
    if (!result.valid) {
      this.logger.error(
        `Audit chain broken at ${result.brokenAt?.table} #${result.brokenAt?.id}`,
      );
    }
    return result;
  }
}
