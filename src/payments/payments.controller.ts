import {
  Body,
  Controller,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Ip,
  Post,
  Req,
} from '@nestjs/common';
import type { RawBodyRequest } from '@nestjs/common';
import type { Request } from 'express';
import { Public } from '../common/decorators/public.decorator';
import { PaymentsService } from './payments.service';
import { WebhookService } from './webhook.service';

/**
 * PaymentsController
 *
 * Endpoints:
 * - POST /payments/webhook - Menerima notifikasi dari payment gateway
 * - GET  /payments/health  - Status payment gateway
 */
@Controller('payments')
export class PaymentsController {
  constructor(
    private readonly paymentsService: PaymentsService,
    private readonly webhookService: WebhookService,
  ) {}

  /**
   * Webhook endpoint untuk notifikasi dari Pakasir
   * POST /api/payments/webhook
   *
   * Endpoint ini HARUS bisa diakses tanpa API key karena dipanggil
   * oleh server gateway. Keamanan dijamin oleh signature HMAC di
   * header X-Signature (kalau PAYMENT_WEBHOOK_SECRET diset).
   *
   * Notifikasi yang sama bisa datang berkali-kali; responsnya tetap 200
   * dengan outcome `duplicate` supaya gateway berhenti retry.
   */
  @Public()
  @Post('webhook')
  @HttpCode(HttpStatus.OK)
  async handleWebhook(
    @Req() req: RawBodyRequest<Request>,
    @Body() body: unknown,
    @Ip() ip: string,
    @Headers('x-signature') signature?: string,
  ) {
    const result = await this.webhookService.handle({
      rawBody: req.rawBody,
      signature,
      body,
      ipAddress: ip,
    });

    return {
      success: true,
      message: 'Webhook processed successfully',
      data: result,
    };
  }

  /**
   * Cek ketersediaan payment gateway
   * GET /api/payments/health
   *
   * Dipakai front end untuk memutuskan apakah opsi QRIS ditampilkan.
   */
  @Public()
  @Get('health')
  async health() {
    const available = await this.paymentsService.checkHealth();
    return {
      success: true,
      data: { gateway: available ? 'up' : 'down' },
    };
  }
}
