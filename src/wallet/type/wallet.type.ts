/**
 * Wallet Type Definitions
 *
 * Saldo akun (pre-funded) milik user. Setiap perubahan saldo
 * dicatat di wallet_transactions dengan balance before/after.
 */

/**
 * ORDER_PAYMENT: Saldo dipotong untuk membayar order (amount negatif)
 * ADJUSTMENT:    Koreksi manual oleh admin (positif atau negatif)
 */
export type WalletTransactionType = 'ORDER_PAYMENT' | 'ADJUSTMENT';

export interface WalletTransactionRecord {
  id: number;
  userId: number;
  type: WalletTransactionType;
  amount: number;
  balanceBefore: number;
  balanceAfter: number;
  refOrderId: number | null;
  description: string;
  createdAt: Date;
}

export interface WalletTransactionRow {
  id: number;
  user_id: number;
  type: WalletTransactionType;
  amount: number;
  balance_before: number;
  balance_after: number;
  ref_order_id: number | null;
  description: string;
  created_at: string;
}

export function toWalletTransaction(row: WalletTransactionRow): WalletTransactionRecord {
  return {
    id: row.id,
    userId: row.user_id,
    type: row.type,
    amount: row.amount,
    balanceBefore: row.balance_before,
    balanceAfter: row.balance_after,
    refOrderId: row.ref_order_id,
    description: row.description,
    createdAt: new Date(row.created_at),
  };
}

/**
 * Format angka ke Rupiah, contoh: 101010 -> "Rp 101.010"
 */
export function formatCurrency(amount: number): string {
  return `Rp ${amount.toLocaleString('id-ID')}`;
}
