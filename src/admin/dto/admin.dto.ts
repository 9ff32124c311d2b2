import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

/**
 * Schema untuk pembatalan order oleh admin
 */
export const AdminCancelOrderSchema = z.object({
  reason: z
    .string()
    .min(5, { message: 'Alasan pembatalan minimal 5 karakter' })
    .max(500, { message: 'Alasan pembatalan maksimal 500 karakter' }),
});

export class AdminCancelOrderDto extends createZodDto(AdminCancelOrderSchema) {}

/**
 * Schema untuk menambah unit stok
 */
export const RestockSchema = z.object({
  contents: z
    .array(z.string().trim().min(1, { message: 'Isi unit stok tidak boleh kosong' }))
    .min(1, { message: 'Minimal 1 unit stok' })
    .max(1000, { message: 'Maksimal 1000 unit stok per request' }),
});

export class RestockDto extends createZodDto(RestockSchema) {}

export const AuditSearchQuerySchema = z.object({
  from: z.coerce.date().optional(),
  to: z.coerce.date().optional(),
  actorId: z.coerce.number().int().positive().optional(),
  entityType: z.string().optional(),
  action: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export class AuditSearchQueryDto extends createZodDto(AuditSearchQuerySchema) {}

export const PaymentHistoryQuerySchema = z.object({
  userId: z.coerce.number().int().positive().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export class PaymentHistoryQueryDto extends createZodDto(PaymentHistoryQuerySchema) {}
