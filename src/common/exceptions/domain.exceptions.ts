import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';
import type { OrderStatus } from '../../orders/type/order.type';

/**
 * Domain exceptions
 *
 * Semua error bisnis di-model sebagai turunan HttpException bawaan Nest,
 * jadi controller tidak perlu mapping manual. Setiap response membawa
 * `code` yang stabil supaya front end (bot) bisa memilih pesan yang tepat
 * tanpa mem-parse teks.
 */

export type DomainErrorCode =
  | 'INSUFFICIENT_STOCK'
  | 'DUPLICATE_PENDING_ORDER'
  | 'INVALID_TRANSITION'
  | 'GATEWAY_UNAVAILABLE'
  | 'INVALID_SIGNATURE'
  | 'MALFORMED_PAYLOAD'
  | 'AUDIT_WRITE_FAILURE'
  | 'INSUFFICIENT_BALANCE';

export class InsufficientStockException extends ConflictException {
  readonly code: DomainErrorCode = 'INSUFFICIENT_STOCK';

  constructor(
    readonly productId: number,
    readonly requested: number,
    readonly available: number,
  ) {
    super({
      code: 'INSUFFICIENT_STOCK',
      message: `Stok tidak mencukupi: diminta ${requested}, tersedia ${available}`,
      productId,
      requested,
      available,
    });
  }
}

export class DuplicatePendingOrderException extends ConflictException {
  readonly code: DomainErrorCode = 'DUPLICATE_PENDING_ORDER';

  constructor(
    readonly userId: number,
    readonly existingInvoiceId: string | null,
  ) {
    super({
      code: 'DUPLICATE_PENDING_ORDER',
      message:
        'Anda masih memiliki pesanan yang belum dibayar. Selesaikan atau batalkan pesanan tersebut terlebih dahulu.',
      invoiceId: existingInvoiceId,
    });
  }
}

export class InvalidTransitionException extends ConflictException {
  readonly code: DomainErrorCode = 'INVALID_TRANSITION';

  constructor(
    readonly orderId: number,
    readonly from: OrderStatus,
    readonly to: OrderStatus,
  ) {
    super({
      code: 'INVALID_TRANSITION',
      message: `Pesanan sudah berstatus ${from} dan tidak bisa diubah menjadi ${to}`,
      orderId,
      from,
      to,
    });
  }
}

export class GatewayUnavailableException extends ServiceUnavailableException {
  readonly code: DomainErrorCode = 'GATEWAY_UNAVAILABLE';
  readonly retryable = true;

  constructor(
    readonly reason: string,
    readonly invoiceId: string | null = null,
    readonly alternatives: Array<'balance'> = [],
  ) {
    super({
      code: 'GATEWAY_UNAVAILABLE',
      message: 'Layanan pembayaran QRIS sedang tidak tersedia. Silakan coba lagi nanti.',
      retryable: true,
      invoiceId,
      alternatives,
    });
  }
}

export class InvalidSignatureException extends UnauthorizedException {
  readonly code: DomainErrorCode = 'INVALID_SIGNATURE';

  constructor() {
    super({ code: 'INVALID_SIGNATURE', message: 'Invalid signature' });
  }
}

export class MalformedPayloadException extends BadRequestException {
  readonly code: DomainErrorCode = 'MALFORMED_PAYLOAD';

  constructor(readonly issues: string[]) {
    super({ code: 'MALFORMED_PAYLOAD', message: 'Malformed payload', issues });
  }
}

export class AuditWriteFailureException extends InternalServerErrorException {
  readonly code: DomainErrorCode = 'AUDIT_WRITE_FAILURE';

  constructor(
    readonly action: string,
    readonly entityId: string,
    options?: { cause: unknown },
  ) {
    super(
      {
        code: 'AUDIT_WRITE_FAILURE',
        message: 'Transaksi tercatat namun log audit gagal ditulis. Admin sudah diberi tahu.',
        action,
        entityId,
      },
      options,
    );
  }
}

export class InsufficientBalanceException extends BadRequestException {
  readonly code: DomainErrorCode = 'INSUFFICIENT_BALANCE';

  constructor(
    readonly required: number,
    readonly available: number,
  ) {
    super({
      code: 'INSUFFICIENT_BALANCE',
      message: `Saldo tidak mencukupi: dibutuhkan Rp ${required.toLocaleString('id-ID')}, saldo Anda Rp ${available.toLocaleString('id-ID')}`,
      required,
      available,
    });
  }
}
