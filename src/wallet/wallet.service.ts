import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from '@nestjs/common';
import { DatabaseService } from '../database/database.service';
import type { Db } from '../database/database.service';
import { AuditService } from '../audit/audit.service';
import { AdminCapability } from '../admin/admin-capability';
import { InsufficientBalanceException } from '../common/exceptions/domain.exceptions';
import { toWalletTransaction } from './type/wallet.type';
import type {
  WalletTransactionRecord,
  WalletTransactionRow,
  WalletTransactionType,
} from './type/wallet.type';

/**
 * WalletService
 *
 * Mengelola saldo akun user:
 * 1. Debit saldo untuk pembayaran order (di dalam transaksi ledger)
 * 2. Penyesuaian manual oleh admin
 * 3. Riwayat mutasi saldo
 *
 * Setiap mutasi tercatat dengan balance before/after. Pengurangan saldo
 * ditulis sebagai compare-and-set (`account_balance >= amount`) sehingga
 * saldo tidak pernah negatif.
 */
@Injectable()
export class WalletService {
  private readonly logger = new Logger(WalletService.name);

  constructor(
    private database: DatabaseService,
    private auditService: AuditService,
  ) {}

  getBalance(userId: number): number {
    const balance = this.readBalance(this.database.connection, userId);
    if (balance === null) {
      throw new NotFoundException('User tidak ditemukan');
    }
    return balance;
  }

  getTransactions(userId: number, limit = 20): WalletTransactionRecord[] {
    return this.database.connection
      .prepare<[number, number], WalletTransactionRow>(
        'SELECT * FROM wallet_transactions WHERE user_id = ? ORDER BY id DESC LIMIT ?',
      )
      .all(userId, limit)
      .map(toWalletTransaction);
  }

  /**
   * Potong saldo untuk pembayaran order.
   * Harus dipanggil dari dalam transaksi OrdersService.markPaid.
   */
  debitInTx(tx: Db, userId: number, amount: number, orderId: number): WalletTransactionRecord {
    const before = this.readBalance(tx, userId);
    if (before === null) {
      throw new NotFoundException('User tidak ditemukan');
    }

    const result = tx
      .prepare<[number, string, number, number]>(
        `UPDATE users
         SET account_balance = account_balance - ?, updated_at = ?
         WHERE id = ? AND account_balance >= ?`,
      )
      .run(amount, new Date().toISOString(), userId, amount);

    if (result.changes !== 1) {
      throw new InsufficientBalanceException(amount, before);
    }

    return this.journalInTx(tx, {
      userId,
      type: 'ORDER_PAYMENT',
      amount: -amount,
      balanceBefore: before,
      balanceAfter: before - amount,
      refOrderId: orderId,
      description: `Pembayaran order #${orderId}`,
    });
  }

  /**
   * Penyesuaian saldo manual (admin only)
   *
   * `delta` positif menambah saldo, negatif mengurangi.
   * Dicatat sebagai audit regulated: kalau audit gagal ditulis,
   * admin diberi tahu dan pemanggil menerima AuditWriteFailureException.
   */
  async adjustBalance(
    capability: AdminCapability,
    userId: number,
    delta: number,
    reason: string,
  ): Promise<WalletTransactionRecord> {
    const admin = AdminCapability.verify(capability);

    if (!Number.isSafeInteger(delta) || delta === 0) {
      throw new BadRequestException('Nominal penyesuaian harus bilangan bulat dan tidak boleh 0');
    }

    const record = this.database.transaction((tx) => {
      const before = this.readBalance(tx, userId);
      if (before === null) {
        throw new NotFoundException('User tidak ditemukan');
      }

      const after = before + delta;
      if (after < 0) {
        throw new InsufficientBalanceException(-delta, before);
      }

      tx.prepare<[number, string, number]>(
        'UPDATE users SET account_balance = ?, updated_at = ? WHERE id = ?',
      ).run(after, new Date().toISOString(), userId);

      return this.journalInTx(tx, {
        userId,
        type: 'ADJUSTMENT',
        amount: delta,
        balanceBefore: before,
        balanceAfter: after,
        refOrderId: null,
        description: reason,
      });
    });

    this.logger.log(
      `Admin ${admin.adminId} adjusted balance of user ${userId} by ${delta} (${record.balanceBefore} -> ${record.balanceAfter})`,
    );

    await this.auditService.record(
      {
        actorId: admin.adminId,
        actorType: 'admin',
        entityType: 'user_balance',
        entityId: String(userId),
        action: 'balance_adjusted',
        beforeState: { balance: record.balanceBefore },
        afterState: { balance: record.balanceAfter },
        context: { delta, reason, walletTransactionId: record.id },
      },
      { regulated: true },
    );

    return record;
  }

  private readBalance(db: Db, userId: number): number | null {
    const row = db
      .prepare<[number], { account_balance: number }>(
        'SELECT account_balance FROM users WHERE id = ?',
      )
      .get(userId);
    return row ? row.account_balance : null;
  }

  private journalInTx(
    tx: Db,
    entry: {
      userId: number;
      type: WalletTransactionType;
      amount: number;
      balanceBefore: number;
      balanceAfter: number;
      refOrderId: number | null;
      description: string;
    },
  ): WalletTransactionRecord {
    const createdAt = new Date().toISOString();
    const result = tx
      .prepare(
        `INSERT INTO wallet_transactions
          (user_id, type, amount, balance_before, balance_after, ref_order_id, description, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        entry.userId,
        entry.type,
        entry.amount,
        entry.balanceBefore,
        entry.balanceAfter,
        entry.refOrderId,
        entry.description,
        createdAt,
      );

    return {
      id: Number(result.lastInsertRowid),
      ...entry,
      createdAt: new Date(createdAt),
    };
  }
}
