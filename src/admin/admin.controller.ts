import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import { AdminService } from './admin.service';
import { AdminGuard, GetAdmin } from './guards/admin.guard';
import { AdminCapability } from './admin-capability';
import {
  AdminCancelOrderDto,
  AuditSearchQueryDto,
  PaymentHistoryQueryDto,
  RestockDto,
} from './dto/admin.dto';
import { AdjustBalanceDto } from '../wallet/dto/wallet.dto';

@Controller('admin')
@UseGuards(AdminGuard) // ApiKeyGuard sudah berjalan global
export class AdminController {
  constructor(private readonly adminService: AdminService) {}

  /**
   * Membatalkan order pending
   * POST /api/admin/orders/:invoiceId/cancel
   */
  @Post('orders/:invoiceId/cancel')
  @HttpCode(HttpStatus.OK)
  async cancelOrder(
    @GetAdmin() admin: AdminCapability,
    @Param('invoiceId') invoiceId: string,
    @Body() dto: AdminCancelOrderDto,
  ) {
    const result = await this.adminService.cancelOrder(admin, invoiceId, dto.reason);
    return {
      success: true,
      message: result.changed
        ? 'Pesanan berhasil dibatalkan. Stok telah dikembalikan.'
        : 'Pesanan sudah dibatalkan sebelumnya',
      data: result.order,
    };
  }

  /**
   * Kirim ulang produk untuk order yang sudah paid
   * POST /api/admin/orders/:invoiceId/redeliver
   */
  @Post('orders/:invoiceId/redeliver')
  @HttpCode(HttpStatus.OK)
  async redeliverOrder(@GetAdmin() admin: AdminCapability, @Param('invoiceId') invoiceId: string) {
    return {
      success: true,
      message: 'Produk berhasil dikirim ulang ke pembeli',
      data: await this.adminService.redeliverOrder(admin, invoiceId),
    };
  }

  /**
   * Penyesuaian saldo user
   * POST /api/admin/wallet/adjust
   */
  @Post('wallet/adjust')
  @HttpCode(HttpStatus.OK)
  async adjustBalance(@GetAdmin() admin: AdminCapability, @Body() dto: AdjustBalanceDto) {
    const record = await this.adminService.adjustBalance(admin, dto.userId, dto.amount, dto.reason);
    return {
      success: true,
      message: 'Saldo berhasil disesuaikan',
      data: record,
    };
  }

  /**
   * Menambah unit stok produk
   * POST /api/admin/products/:productId/stock
   */
  @Post('products/:productId/stock')
  async restock(
    @GetAdmin() admin: AdminCapability,
    @Param('productId', ParseIntPipe) productId: number,
    @Body() dto: RestockDto,
  ) {
    return {
      success: true,
      data: await this.adminService.restock(admin, productId, dto.contents),
    };
  }

  @Get('orders/stats')
  getOrderStats() {
    return { success: true, data: this.adminService.getOrderStats() };
  }

  @Get('users/:userId/activity')
  getUserActivity(@Param('userId', ParseIntPipe) userId: number) {
    return { success: true, data: this.adminService.getUserActivity(userId) };
  }

  @Get('audit')
  searchAudit(@Query() query: AuditSearchQueryDto) {
    return { success: true, data: this.adminService.searchAudit(query) };
  }

  @Get('audit/orders/:invoiceId')
  getOrderHistory(@Param('invoiceId') invoiceId: string) {
    return { success: true, data: this.adminService.getOrderHistory(invoiceId) };
  }

  @Get('audit/payments')
  getPaymentHistory(@Query() query: PaymentHistoryQueryDto) {
    return {
      success: true,
      data: this.adminService.getPaymentHistory(query.userId, query.limit),
    };
  }

  /**
   * Verifikasi rantai hash audit
   * GET /api/admin/audit/verify
   */
  @Get('audit/verify')
  verifyAuditChain() {
    return { success: true, data: this.adminService.verifyAuditChain() };
  }
}
