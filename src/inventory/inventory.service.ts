import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { DatabaseService } from '../database/database.service';
import type { Db } from '../database/database.service';
import { InsufficientStockException } from '../common/exceptions/domain.exceptions';
import { toProduct } from './type/inventory.type';
import type { DeliverableUnit, Product, ProductRow } from './type/inventory.type';

/**
 * InventoryService
 *
 * Satu-satunya tempat yang mengubah tabel product_stocks.
 *
 * Unit stok punya tiga keadaan:
 * - tersedia:    is_sold = 0, order_id = NULL
 * - direservasi: is_sold = 1, order_id = <order pending>
 * - terjual:     is_sold = 1, order_id = <order paid>
 *
 * Method berakhiran `InTx` ikut transaksi milik pemanggil (biasanya
 * OrdersService) sehingga pembuatan order dan reservasi stok commit bersama.
 */
@Injectable()
export class InventoryService {
  private readonly logger = new Logger(InventoryService.name);

  constructor(private database: DatabaseService) {}

  findProduct(productId: number): Product | null {
    const row = this.database.connection
      .prepare<[number], ProductRow>('SELECT * FROM products WHERE id = ?')
      .get(productId);
    return row ? toProduct(row) : null;
  }

  availableCount(productId: number): number {
    return this.countAvailableInTx(this.database.connection, productId);
  }

  /**
   * Reservasi `quantity` unit untuk sebuah order, semua atau tidak sama sekali.
   */
  reserve(productId: number, quantity: number, orderId: number): string[] {
    return this.database.transaction((tx) =>
      this.reserveInTx(tx, productId, quantity, orderId),
    );
  }

  reserveInTx(tx: Db, productId: number, quantity: number, orderId: number): string[] {
    if (!Number.isInteger(quantity) || quantity < 1) {
      throw new BadRequestException('Jumlah harus bilangan bulat positif');
    }

    const candidates = tx
      .prepare<[number, number], { id: string }>(
        `SELECT id FROM product_stocks
         WHERE product_id = ? AND is_sold = 0 AND order_id IS NULL
         ORDER BY created_at ASC, rowid ASC
         LIMIT ?`,
      )
      .all(productId, quantity);

    if (candidates.length < quantity) {
      throw new InsufficientStockException(productId, quantity, candidates.length);
    }

    const now = new Date().toISOString();
    const claim = tx.prepare<[number, string, string]>(
      `UPDATE product_stocks
       SET is_sold = 1, order_id = ?, updated_at = ?
       WHERE id = ? AND is_sold = 0`,
    );

    for (const { id } of candidates) {
      // Unit sudah diambil order lain: batalkan seluruh reservasi
      if (claim.run(orderId, now, id).changes !== 1) {
        throw new InsufficientStockException(productId, quantity, this.countAvailableInTx(tx, productId));
      }
    }

    return candidates.map(({ id }) => id);
  }

  /**
   * Kembalikan semua unit milik order ke stok. Aman dipanggil berulang.
   */
  release(orderId: number): number {
    return this.database.transaction((tx) => this.releaseInTx(tx, orderId));
  }

  releaseInTx(tx: Db, orderId: number): number {
    const result = tx
      .prepare<[string, number]>(
        `UPDATE product_stocks
         SET is_sold = 0, order_id = NULL, updated_at = ?
         WHERE order_id = ?`,
      )
      .run(new Date().toISOString(), orderId);

    if (result.changes > 0) {
      this.logger.log(`Released ${result.changes} stock unit(s) from order ${orderId}`);
    }
    return result.changes;
  }

  /**
   * Reservasi menjadi permanen: naikkan sold_count tiap produk
   * sebanyak unit yang terjual ke order ini.
   */
  finalize(orderId: number): number {
    return this.database.transaction((tx) => this.finalizeInTx(tx, orderId));
  }

  finalizeInTx(tx: Db, orderId: number): number {
    const now = new Date().toISOString();
    const result = tx
      .prepare<[number, string, number]>(
        `UPDATE products
         SET sold_count = sold_count + (
               SELECT COUNT(*) FROM product_stocks
               WHERE product_stocks.order_id = ? AND product_stocks.product_id = products.id
             ),
             updated_at = ?
         WHERE id IN (SELECT product_id FROM product_stocks WHERE order_id = ?)`,
      )
      .run(orderId, now, orderId);
    return result.changes;
  }

  unitsForOrder(orderId: number): DeliverableUnit[] {
    return this.database.connection
      .prepare<[number], { id: string; product_id: number; name: string; content: string }>(
        `SELECT s.id, s.product_id, p.name, s.content
         FROM product_stocks s
         JOIN products p ON p.id = s.product_id
         WHERE s.order_id = ?
         ORDER BY s.product_id ASC, s.created_at ASC, s.rowid ASC`,
      )
      .all(orderId)
      .map((row) => ({
        stockId: row.id,
        productId: row.product_id,
        productName: row.name,
        content: row.content,
      }));
  }

  /** Tambah unit stok baru untuk produk */
  restock(productId: number, contents: string[]): string[] {
    if (!this.findProduct(productId)) {
      throw new BadRequestException('Produk tidak ditemukan');
    }

    return this.database.transaction((tx) => {
      const now = new Date().toISOString();
      const insert = tx.prepare<[string, number, string, string, string]>(
        `INSERT INTO product_stocks (id, product_id, content, order_id, is_sold, created_at, updated_at)
         VALUES (?, ?, ?, NULL, 0, ?, ?)`,
      );
      const ids = contents.map((content) => {
        const id = randomUUID();
        insert.run(id, productId, content, now, now);
        return id;
      });
      this.logger.log(`Restocked product ${productId} with ${ids.length} unit(s)`);
      return ids;
    });
  }

  private countAvailableInTx(tx: Db, productId: number): number {
    const row = tx
      .prepare<[number], { count: number }>(
        'SELECT COUNT(*) AS count FROM product_stocks WHERE product_id = ? AND is_sold = 0',
      )
      .get(productId);
    return row?.count ?? 0;
  }
}
