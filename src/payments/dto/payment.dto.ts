import { z } from 'zod';

/**
 * Schema untuk notifikasi webhook dari Pakasir
 *
 * Field lain yang dikirim gateway (project, metadata, dll) dibiarkan lewat
 * dan ikut disimpan di audit pembayaran sebagai raw payload.
 */
export const WebhookPayloadSchema = z
  .object({
    order_id: z.string().min(1, { message: 'order_id wajib diisi' }),
    status: z.string().min(1, { message: 'status wajib diisi' }),
    amount: z
      .number({ invalid_type_error: 'amount harus berupa angka' })
      .int({ message: 'amount harus bilangan bulat' })
      .positive({ message: 'amount harus lebih dari 0' }),
    payment_method: z.string().optional(),
    completed_at: z.string().nullish(),
    project: z.string().optional(),
  })
  .passthrough();

export type WebhookPayload = z.infer<typeof WebhookPayloadSchema>;

/**
 * Status webhook setelah dinormalisasi.
 * `canceled`/`cancelled` dari gateway diperlakukan sama dengan `expired`,
 * status lain yang tidak dikenal dibawa sebagai `unknown`.
 */
export type WebhookStatus =
  | { kind: 'completed'; completedAt: Date | null }
  | { kind: 'expired' }
  | { kind: 'pending' }
  | { kind: 'unknown'; raw: string };

export function toWebhookStatus(payload: WebhookPayload): WebhookStatus {
  switch (payload.status.toLowerCase()) {
    case 'completed': {
      const completedAt = payload.completed_at ? new Date(payload.completed_at) : null;
      return {
        kind: 'completed',
        completedAt: completedAt && !Number.isNaN(completedAt.getTime()) ? completedAt : null,
      };
    }
    case 'expired':
    case 'canceled':
    case 'cancelled':
      return { kind: 'expired' };
    case 'pending':
      return { kind: 'pending' };
    default:
      return { kind: 'unknown', raw: payload.status };
  }
}
