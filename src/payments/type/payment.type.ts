/**
 * Payment Type Definitions
 *
 * Tipe untuk komunikasi dengan payment gateway QRIS (Pakasir)
 * dan perhitungan biaya transaksi.
 */
import { FEE_RATE_SCALE } from '../../config/app.config';
import type { OrderPricing } from '../../orders/type/order.type';

/**
 * Biaya transaksi gateway: round(subtotal * rate) + fixed.
 *
 * Rate disimpan dalam parts-per-million, pembulatan half-up dilakukan
 * dengan aritmatika integer.
 */
export function calculatePaymentFee(subtotal: number, pricing: OrderPricing): number {
  const scaled = subtotal * pricing.feeRatePpm;
  if (!Number.isSafeInteger(scaled)) {
    throw new RangeError(`Subtotal ${subtotal} is too large for fee calculation`);
  }
  const percentage = Math.floor((scaled + FEE_RATE_SCALE / 2) / FEE_RATE_SCALE);
  return percentage + pricing.fixedFee;
}

export function calculateTotal(subtotal: number, discount: number, paymentFee: number): number {
  return subtotal - discount + paymentFee;
}

/**
 * Status transaksi menurut gateway.
 * `completed` berarti dana sudah masuk.
 */
export type GatewayStatus = 'completed' | 'pending' | 'expired';

export interface PaymentIntent {
  checkoutReference: string;
  /** String QRIS yang dirender jadi QR code oleh front end */
  renderableCode: string;
  feeAmount: number;
  totalAmount: number;
  expiresAt: Date | null;
}

export interface PaymentStatusResult {
  status: GatewayStatus;
  completedAt: Date | null;
}

export interface CheckoutPaymentInfo {
  checkoutUrl: string;
  qrString: string;
  expiresAt: Date | null;
}

/**
 * Hasil pemrosesan satu webhook.
 *
 * settled   -> transisi ke paid benar-benar terjadi
 * expired   -> transisi ke expired benar-benar terjadi
 * ignored   -> status pending / tidak dikenal, tidak ada perubahan
 * duplicate -> order sudah di status final, notifikasi diabaikan
 */
export type WebhookOutcome = 'settled' | 'expired' | 'ignored' | 'duplicate';

export interface WebhookResult {
  outcome: WebhookOutcome;
  invoiceId: string;
}
