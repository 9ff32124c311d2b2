import { createZodDto } from 'nestjs-zod';
import { z } from 'zod';
import { MAX_QUANTITY_PER_LINE } from '../type/order.type';

/**
 * Schema untuk checkout keranjang
 *
 * Harga tidak dikirim dari front end; harga diambil dari produk
 * sesuai tier member saat order dibuat.
 */
export const CheckoutSchema = z.object({
  items: z
    .array(
      z.object({
        productId: z.number().int().positive({ message: 'ID produk tidak valid' }),
        quantity: z
          .number()
          .int({ message: 'Jumlah harus bilangan bulat' })
          .min(1, { message: 'Jumlah minimal 1' })
          .max(MAX_QUANTITY_PER_LINE, { message: `Jumlah maksimal ${MAX_QUANTITY_PER_LINE}` }),
      }),
    )
    .min(1, { message: 'Keranjang belanja kosong' })
    .max(20, { message: 'Maksimal 20 produk per pesanan' }),

  paymentMethod: z.enum(['gateway', 'balance'], {
    errorMap: () => ({ message: 'Metode pembayaran harus gateway atau balance' }),
  }),
});

export class CheckoutDto extends createZodDto(CheckoutSchema) {}

/**
 * Schema untuk query daftar pesanan user
 */
export const OrderListQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

export class OrderListQueryDto extends createZodDto(OrderListQuerySchema) {}
