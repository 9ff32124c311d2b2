import {
  BadRequestException,
  ForbiddenException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/app.config';
import { DatabaseService } from '../database/database.service';
import { InventoryService } from '../inventory/inventory.service';
import { PaymentsService } from '../payments/payments.service';
import type { CheckoutPaymentInfo, GatewayStatus } from '../payments/type/payment.type';
import {
  GatewayUnavailableException,
  InsufficientBalanceException,
  InvalidTransitionException,
} from '../common/exceptions/domain.exceptions';
import { OrdersService } from './orders.service';
import type {
  MemberStatus,
  Order,
  OrderLineRequest,
  OrderWithItems,
  PaymentMethod,
} from './type/order.type';

export interface CheckoutResult {
  order: OrderWithItems;
  payment: CheckoutPaymentInfo | null;
}

export interface StatusCheckResult {
  order: Order;
  gatewayStatus: GatewayStatus | null;
}

interface BuyerRow {
  member_status: MemberStatus;
  account_balance: number;
  is_banned: number;
}

/**
 * CheckoutService
 *
 * Alur belanja dari sisi pembeli:
 * 1. Validasi pembeli (terdaftar, tidak diblokir)
 * 2. Untuk QRIS: pastikan gateway hidup sebelum order dibuat
 * 3. Buat order + reservasi stok lewat OrdersService
 * 4. QRIS: buat transaksi di gateway dan kembalikan QR + link bayar
 *    Saldo: langsung settle; kalau saldo kurang, order dibatalkan
 *    dan stok dikembalikan
 */
@Injectable()
export class CheckoutService {
  private readonly logger = new Logger(CheckoutService.name);

  constructor(
    private configService: ConfigService,
    private database: DatabaseService,
    private inventoryService: InventoryService,
    private ordersService: OrdersService,
    private paymentsService: PaymentsService,
  ) {}

  async checkout(
    userId: number,
    items: OrderLineRequest[],
    paymentMethod: PaymentMethod,
  ): Promise<CheckoutResult> {
    const buyer = this.requireBuyer(userId);
    const { payment, gateway } = this.configService.getOrThrow<AppConfig>('app');

    if (paymentMethod === 'gateway' && !(await this.paymentsService.checkHealth())) {
      const alternatives: Array<'balance'> =
        gateway.downPolicy === 'balance_fallback' &&
        buyer.account_balance >= this.quoteSubtotal(buyer.member_status, items)
          ? ['balance']
          : [];
      this.logger.warn(
        `Gateway down, rejecting checkout for user ${userId} (policy ${gateway.downPolicy})`,
      );
      throw new GatewayUnavailableException('health check failed', null, alternatives);
    }

    const order = await this.ordersService.createOrder(userId, items, paymentMethod, {
      feeRatePpm: payment.feeRatePpm,
      fixedFee: payment.fixedFee,
    });

    if (paymentMethod === 'balance') {
      return { order: await this.settleWithBalance(order), payment: null };
    }

    // Health check sudah dijalankan di atas
    return { order, payment: await this.createIntent(order, true) };
  }

  /**
   * Buat ulang transaksi QRIS untuk order pending
   * (misalnya setelah gateway sempat down saat checkout).
   */
  async retryPayment(userId: number, invoiceId: string): Promise<CheckoutResult> {
    const order = this.requireOwnedOrder(userId, invoiceId);

    if (order.status !== 'pending') {
      throw new BadRequestException('Pesanan tidak dalam status menunggu pembayaran');
    }
    if (order.paymentMethod !== 'gateway') {
      throw new BadRequestException('Pesanan ini tidak dibayar melalui QRIS');
    }

    return { order, payment: await this.createIntent(order) };
  }

  async cancel(userId: number, invoiceId: string): Promise<Order> {
    const order = this.requireOwnedOrder(userId, invoiceId);
    const result = await this.ordersService.markCancelled(order.id, { type: 'user', userId });
    return result.order;
  }

  /**
   * Cek status pembayaran langsung ke gateway
   *
   * Fallback kalau webhook belum datang. Hasilnya diterapkan lewat ledger
   * dengan aturan idempotensi yang sama seperti webhook.
   */
  async checkStatus(userId: number, invoiceId: string): Promise<StatusCheckResult> {
    const order = this.requireOwnedOrder(userId, invoiceId);

    if (order.status !== 'pending' || order.paymentMethod !== 'gateway') {
      return { order, gatewayStatus: null };
    }

    const result = await this.paymentsService.pollStatus(order.invoiceId, order.totalBill);

    try {
      if (result.status === 'completed') {
        await this.ordersService.markPaid(order.id, {
          source: 'poll',
          amount: order.totalBill,
          completedAt: result.completedAt,
        });
      } else if (result.status === 'expired') {
        await this.ordersService.markExpired(order.id, 'poll');
      }
    } catch (error) {
      if (!(error instanceof InvalidTransitionException)) throw error;
      this.logger.log(`Status check for ${order.invoiceId} lost to a concurrent transition`);
    }

    return {
      order: this.ordersService.findById(order.id) ?? order,
      gatewayStatus: result.status,
    };
  }

  getOrder(userId: number, invoiceId: string): OrderWithItems {
    return this.requireOwnedOrder(userId, invoiceId);
  }

  private async settleWithBalance(order: OrderWithItems): Promise<OrderWithItems> {
    try {
      const paid = await this.ordersService.markPaid(order.id, {
        source: 'balance',
        amount: order.totalBill,
        completedAt: new Date(),
      });
      return { ...paid, items: order.items };
    } catch (error) {
      if (error instanceof InsufficientBalanceException) {
        this.logger.log(`Insufficient balance for ${order.invoiceId}, cancelling order`);
        await this.ordersService.markCancelled(order.id, { type: 'user', userId: order.userId });
      }
      throw error;
    }
  }

  private async createIntent(order: Order, healthChecked = false): Promise<CheckoutPaymentInfo> {
    const intent = await this.paymentsService.createPayment(order.invoiceId, order.totalBill, {
      healthChecked,
    });
    return {
      checkoutUrl: this.paymentsService.buildCheckoutUrl(order.invoiceId, order.totalBill),
      qrString: intent.renderableCode,
      expiresAt: intent.expiresAt,
    };
  }

  private requireBuyer(userId: number): BuyerRow {
    const buyer = this.database.connection
      .prepare<[number], BuyerRow>(
        'SELECT member_status, account_balance, is_banned FROM users WHERE id = ?',
      )
      .get(userId);

    if (!buyer) {
      throw new NotFoundException('User belum terdaftar');
    }
    if (buyer.is_banned === 1) {
      throw new ForbiddenException('Akun Anda diblokir dan tidak dapat melakukan pembelian');
    }
    return buyer;
  }

  private requireOwnedOrder(userId: number, invoiceId: string): OrderWithItems {
    const order = this.ordersService.findByInvoiceId(invoiceId);
    if (!order || order.userId !== userId) {
      throw new NotFoundException('Pesanan tidak ditemukan');
    }
    return order;
  }

  /** Subtotal tanpa fee, untuk menilai apakah saldo cukup sebagai alternatif */
  private quoteSubtotal(memberStatus: MemberStatus, items: OrderLineRequest[]): number {
    return items.reduce((sum, item) => {
      const product = this.inventoryService.findProduct(item.productId);
      if (!product) return Number.POSITIVE_INFINITY;
      const price =
        memberStatus === 'reseller' && product.resellerPrice !== null
          ? product.resellerPrice
          : product.customerPrice;
      return sum + price * item.quantity;
    }, 0);
  }
}
