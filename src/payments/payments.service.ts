import { BadGatewayException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import type { AppConfig } from '../config/app.config';
import { GatewayUnavailableException } from '../common/exceptions/domain.exceptions';
import type { GatewayStatus, PaymentIntent, PaymentStatusResult } from './type/payment.type';

const HEALTH_TIMEOUT_MS = 5_000;
const CREATE_TIMEOUT_MS = 30_000;
const STATUS_TIMEOUT_MS = 10_000;

const CreatePaymentResponseSchema = z.object({
  payment: z.object({
    order_id: z.string(),
    amount: z.number().int(),
    fee: z.number().int(),
    total_payment: z.number().int(),
    payment_number: z.string().min(1),
    expired_at: z.string().nullish(),
  }),
});

const TransactionDetailSchema = z.object({
  transaction: z.object({
    status: z.string(),
    completed_at: z.string().nullish(),
  }),
});

const GATEWAY_STATUS_MAP: Record<string, GatewayStatus> = {
  completed: 'completed',
  pending: 'pending',
  expired: 'expired',
  canceled: 'expired',
  cancelled: 'expired',
};

function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * PaymentsService (Settlement Client)
 *
 * Klien untuk payment gateway QRIS Pakasir.
 *
 * Klasifikasi error:
 * - timeout, error jaringan, HTTP 5xx -> GatewayUnavailableException (boleh dicoba lagi)
 * - HTTP 4xx, response tidak sesuai format -> BadGatewayException
 *
 * Service ini tidak menyentuh database; status order diubah oleh
 * OrdersService berdasarkan hasil dari sini.
 */
@Injectable()
export class PaymentsService {
  private readonly logger = new Logger(PaymentsService.name);

  constructor(private configService: ConfigService) {}

  private get gateway(): AppConfig['gateway'] {
    return this.configService.getOrThrow<AppConfig>('app').gateway;
  }

  /**
   * Cek apakah gateway bisa dijangkau sebelum menawarkan pembayaran QRIS.
   */
  async checkHealth(): Promise<boolean> {
    try {
      const response = await fetch(this.gateway.baseUrl, {
        method: 'GET',
        signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS),
      });
      if (!response.ok) {
        this.logger.warn(`Gateway health check returned HTTP ${response.status}`);
      }
      return response.ok;
    } catch (error) {
      this.logger.warn(
        `Gateway health check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  /**
   * Buat transaksi QRIS untuk sebuah invoice
   *
   * `amount` sudah termasuk biaya transaksi. Health check dilewati kalau
   * pemanggil baru saja menjalankannya (`healthChecked`).
   */
  async createPayment(
    invoiceId: string,
    amount: number,
    options: { healthChecked?: boolean } = {},
  ): Promise<PaymentIntent> {
    if (!options.healthChecked && !(await this.checkHealth())) {
      throw new GatewayUnavailableException('health check failed', invoiceId);
    }

    const { baseUrl, projectSlug, apiKey } = this.gateway;
    const body = await this.request(
      `${baseUrl}/api/transactioncreate/qris`,
      {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          project: projectSlug,
          order_id: invoiceId,
          amount,
          api_key: apiKey,
        }),
        signal: AbortSignal.timeout(CREATE_TIMEOUT_MS),
      },
      invoiceId,
    );

    const parsed = CreatePaymentResponseSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.error(`Malformed create-payment response for ${invoiceId}: ${parsed.error.message}`);
      throw new BadGatewayException('Respons payment gateway tidak valid');
    }

    const { payment } = parsed.data;
    this.logger.log(`Payment created for ${invoiceId}: total ${payment.total_payment}`);

    return {
      checkoutReference: payment.order_id,
      renderableCode: payment.payment_number,
      feeAmount: payment.fee,
      totalAmount: payment.total_payment,
      expiresAt: parseDate(payment.expired_at),
    };
  }

  /**
   * Tanya status transaksi ke gateway (fallback kalau webhook terlambat).
   */
  async pollStatus(invoiceId: string, amount: number): Promise<PaymentStatusResult> {
    const { baseUrl, projectSlug, apiKey } = this.gateway;
    const query = new URLSearchParams({
      project: projectSlug,
      amount: String(amount),
      order_id: invoiceId,
      api_key: apiKey,
    });

    const body = await this.request(
      `${baseUrl}/api/transactiondetail?${query.toString()}`,
      { method: 'GET', signal: AbortSignal.timeout(STATUS_TIMEOUT_MS) },
      invoiceId,
    );

    const parsed = TransactionDetailSchema.safeParse(body);
    const status = parsed.success ? GATEWAY_STATUS_MAP[parsed.data.transaction.status] : undefined;
    if (!parsed.success || !status) {
      this.logger.error(`Malformed transaction-detail response for ${invoiceId}`);
      throw new BadGatewayException('Respons payment gateway tidak valid');
    }

    return { status, completedAt: parseDate(parsed.data.transaction.completed_at) };
  }

  /**
   * URL halaman pembayaran (tanpa network call)
   */
  buildCheckoutUrl(invoiceId: string, amount: number): string {
    const { paymentDomain, projectSlug } = this.gateway;
    return `${paymentDomain}/pay/${projectSlug}/${amount}?order_id=${encodeURIComponent(invoiceId)}&qris_only=1`;
  }

  private async request(url: string, init: RequestInit, invoiceId: string): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (error) {
      const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      this.logger.error(`Gateway request failed for ${invoiceId}: ${reason}`);
      throw new GatewayUnavailableException(reason, invoiceId);
    }

    if (response.status >= 500) {
      this.logger.error(`Gateway returned HTTP ${response.status} for ${invoiceId}`);
      throw new GatewayUnavailableException(`HTTP ${response.status}`, invoiceId);
    }

    if (!response.ok) {
      const text = await response.text();
      this.logger.error(`Gateway rejected request for ${invoiceId}: HTTP ${response.status} ${text}`);
      throw new BadGatewayException('Payment gateway menolak permintaan');
    }

    try {
      return await response.json();
    } catch {
      this.logger.error(`Gateway returned a non-JSON body for ${invoiceId}`);
      throw new BadGatewayException('Respons payment gateway tidak valid');
    }
  }
}
