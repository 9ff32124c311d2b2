import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ActorId } from '../common/decorators/actor-id.decorator';
import { CheckoutService } from './checkout.service';
import { OrdersService } from './orders.service';
import { CheckoutDto, OrderListQueryDto } from './dto/order.dto';

/**
 * OrdersController
 *
 * Dipanggil oleh front end bot atas nama user di header X-User-Id.
 *
 * Endpoints:
 * - POST /orders/checkout                  - Checkout keranjang
 * - GET  /orders/pending                   - Pesanan yang belum dibayar
 * - GET  /orders                           - Riwayat pesanan
 * - GET  /orders/:invoiceId                - Detail pesanan
 * - POST /orders/:invoiceId/payment        - Buat ulang pembayaran QRIS
 * - POST /orders/:invoiceId/check-status   - Cek status ke gateway
 * - POST /orders/:invoiceId/cancel         - Batalkan pesanan
 */
@Controller('orders')
export class OrdersController {
  constructor(
    private readonly checkoutService: CheckoutService,
    private readonly ordersService: OrdersService,
  ) {}

  /**
   * Checkout
   * POST /api/orders/checkout
   *
   * Response untuk QRIS berisi link pembayaran dan string QR.
   * Untuk saldo, pesanan langsung lunas dan produk dikirim lewat chat.
   */
  @Post('checkout')
  async checkout(@ActorId() userId: number, @Body() dto: CheckoutDto) {
    const result = await this.checkoutService.checkout(userId, dto.items, dto.paymentMethod);

    return {
      success: true,
      message:
        dto.paymentMethod === 'balance'
          ? 'Pembayaran dengan saldo berhasil'
          : 'Pesanan dibuat, silakan selesaikan pembayaran',
      data: result,
    };
  }

  @Get('pending')
  getPending(@ActorId() userId: number) {
    return {
      success: true,
      data: this.ordersService.pendingOrderFor(userId),
    };
  }

  @Get()
  getMyOrders(@ActorId() userId: number, @Query() query: OrderListQueryDto) {
    return {
      success: true,
      data: this.ordersService.getUserOrders(userId, query.page, query.limit),
    };
  }

  @Get(':invoiceId')
  getOrder(@ActorId() userId: number, @Param('invoiceId') invoiceId: string) {
    return {
      success: true,
      data: this.checkoutService.getOrder(userId, invoiceId),
    };
  }

  @Post(':invoiceId/payment')
  @HttpCode(HttpStatus.OK)
  async retryPayment(@ActorId() userId: number, @Param('invoiceId') invoiceId: string) {
    return {
      success: true,
      message: 'Link pembayaran berhasil dibuat',
      data: await this.checkoutService.retryPayment(userId, invoiceId),
    };
  }

  @Post(':invoiceId/check-status')
  @HttpCode(HttpStatus.OK)
  async checkStatus(@ActorId() userId: number, @Param('invoiceId') invoiceId: string) {
    return {
      success: true,
      data: await this.checkoutService.checkStatus(userId, invoiceId),
    };
  }

  @Post(':invoiceId/cancel')
  @HttpCode(HttpStatus.OK)
  async cancel(@ActorId() userId: number, @Param('invoiceId') invoiceId: string) {
    const order = await this.checkoutService.cancel(userId, invoiceId);
    return {
      success: true,
      message: 'Pesanan berhasil dibatalkan',
      data: order,
    };
  }
}
