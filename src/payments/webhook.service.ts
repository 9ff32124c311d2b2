import { Injectable, Logger, NotFoundException, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createHmac, timingSafeEqual } from 'crypto';
import type { AppConfig } from '../config/app.config';
import {
  InvalidSignatureException,
  InvalidTransitionException,
  MalformedPayloadException,
} from '../common/exceptions/domain.exceptions';
import { OrdersService } from '../orders/orders.service';
import type { Order } from '../orders/type/order.type';
import { AuditService } from '../audit/audit.service';
import { WebhookPayloadSchema, toWebhookStatus } from './dto/payment.dto';
import type { WebhookPayload, WebhookStatus } from './dto/payment.dto';
import type { WebhookResult } from './type/payment.type';

export interface IncomingWebhook {
  rawBody: Buffer | undefined;
  signature: string | undefined;
  body: unknown;
  ipAddress?: string;
}

export function signWebhookBody(rawBody: Buffer | string, secret: string): string {
  return createHmac('sha256', secret).update(rawBody).digest('hex');
}

/**
 * WebhookService (Webhook Ingestor)
 *
 * Gateway mengirim notifikasi at-least-once: bisa dobel, terlambat,
 * atau datang setelah order sudah di-expire oleh sweeper. Karena itu
 * InvalidTransitionException dari ledger diperlakukan sebagai no-op
 * yang sukses (outcome `duplicate`), bukan error.
 *
 * Order tidak pernah dibuat dari webhook.
 */
@Injectable()
export class WebhookService implements OnModuleInit {
  private readonly logger = new Logger(WebhookService.name);

  constructor(
    private configService: ConfigService,
    private ordersService: OrdersService,
    private auditService: AuditService,
  ) {}

  onModuleInit() {
    if (!this.secret) {
      this.logger.warn(
        'PAYMENT_WEBHOOK_SECRET is not set. Webhook signatures will NOT be verified.',
      );
    }
  }

  private get secret(): string | undefined {
    return this.configService.getOrThrow<AppConfig>('app').gateway.webhookSecret;
  }

  async handle(incoming: IncomingWebhook): Promise<WebhookResult> {
    // Step 1: Signature, sebelum menyentuh state apapun
    this.verifySignature(incoming);

    // Step 2: Validasi payload
    const parsed = WebhookPayloadSchema.safeParse(incoming.body);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      this.logger.warn(`Malformed webhook payload: ${issues.join('; ')}`);
      throw new MalformedPayloadException(issues);
    }
    const payload = parsed.data;

    // Step 3: Resolve invoice
    const order = this.ordersService.findByInvoiceId(payload.order_id);
    if (!order) {
      this.logger.warn(`Webhook for unknown invoice ${payload.order_id} from ${incoming.ipAddress ?? 'unknown'}`);
      throw new NotFoundException('Pesanan tidak ditemukan');
    }

    const status = toWebhookStatus(payload);
    if (status.kind === 'completed' && payload.amount !== order.totalBill) {
      this.logger.error(
        `Amount mismatch for ${order.invoiceId}: webhook ${payload.amount}, order ${order.totalBill}`,
      );
      throw new MalformedPayloadException([
        `amount: ${payload.amount} does not match order total ${order.totalBill}`,
      ]);
    }

    this.logger.log(`Webhook received for ${order.invoiceId}: ${payload.status}`);

    await this.auditService.recordPayment({
      invoiceId: order.invoiceId,
      userId: order.userId,
      amount: payload.amount,
      paymentMethod: payload.payment_method ?? 'qris',
      status: `webhook_${payload.status.toLowerCase()}`,
      gatewayResponse: payload,
      metadata: { ipAddress: incoming.ipAddress ?? null },
    });

    // Step 4: Dispatch
    return {
      outcome: await this.dispatch(order, status, payload),
      invoiceId: order.invoiceId,
    };
  }

  private async dispatch(
    order: Order,
    status: WebhookStatus,
    payload: WebhookPayload,
  ): Promise<WebhookResult['outcome']> {
    switch (status.kind) {
      case 'completed':
        try {
          await this.ordersService.markPaid(order.id, {
            source: 'webhook',
            amount: payload.amount,
            completedAt: status.completedAt,
            reference: payload.order_id,
            raw: payload,
          });
          return 'settled';
        } catch (error) {
          return this.duplicateOrThrow(error, order);
        }

      case 'expired':
        try {
          const result = await this.ordersService.markExpired(order.id, 'gateway');
          return result.changed ? 'expired' : 'duplicate';
        } catch (error) {
          return this.duplicateOrThrow(error, order);
        }

      case 'pending':
        this.logger.log(`Order ${order.invoiceId} still pending at gateway`);
        return 'ignored';

      case 'unknown':
        this.logger.warn(`Unknown webhook status "${status.raw}" for ${order.invoiceId}, ignoring`);
        return 'ignored';

      default: {
        const unhandled: never = status;
        throw new Error(`Unhandled webhook status: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private duplicateOrThrow(error: unknown, order: Order): 'duplicate' {
    if (error instanceof InvalidTransitionException) {
      this.logger.log(`Webhook for ${order.invoiceId} arrived after order became ${error.from}`);
      return 'duplicate';
    }
    throw error;
  }

  private verifySignature(incoming: IncomingWebhook) {
    const secret = this.secret;
    if (!secret) return;

    if (!incoming.signature || !incoming.rawBody) {
      this.logger.warn('Webhook rejected: missing signature');
      throw new InvalidSignatureException();
    }

    const expected = Buffer.from(signWebhookBody(incoming.rawBody, secret), 'hex');
    const provided = Buffer.from(incoming.signature.trim().toLowerCase(), 'hex');

    if (expected.length !== provided.length || !timingSafeEqual(expected, provided)) {
      this.logger.warn('Webhook rejected: invalid signature');
      throw new InvalidSignatureException();
    }
  }
}
