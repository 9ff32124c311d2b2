import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';

export const WalletTransactionQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

export class WalletTransactionQueryDto extends createZodDto(WalletTransactionQuerySchema) {}

/**
 * Schema untuk penyesuaian saldo manual oleh admin
 *
 * Digunakan untuk:
 * - Refund manual (pembayaran masuk setelah order expired)
 * - Koreksi error sistem
 */
export const AdjustBalanceSchema = z.object({
  userId: z.number().int().positive({ message: 'ID user tidak valid' }),
  amount: z
    .number()
    .int({ message: 'Nominal harus bilangan bulat' })
    .refine((val) => val !== 0, { message: 'Nominal tidak boleh 0' }),
  reason: z
    .string()
    .min(10, { message: 'Alasan minimal 10 karakter' })
    .max(500, { message: 'Alasan maksimal 500 karakter' }),
});

export class AdjustBalanceDto extends createZodDto(AdjustBalanceSchema) {}
