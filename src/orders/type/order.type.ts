/**
 * Order Ledger Type Definitions
 *
 * Status pesanan:
 * pending   -> menunggu pembayaran, stok sudah direservasi
 * paid      -> pembayaran diterima, stok terjual permanen
 * expired   -> melewati batas waktu pembayaran, stok dikembalikan
 * cancelled -> dibatalkan user atau admin, stok dikembalikan
 *
 * Tiga status terakhir adalah status final dan tidak pernah berubah lagi.
 */
export type OrderStatus = 'pending' | 'paid' | 'expired' | 'cancelled';

export type TerminalOrderStatus = Exclude<OrderStatus, 'pending'>;

export type PaymentMethod = 'gateway' | 'balance';

export type MemberStatus = 'customer' | 'reseller' | 'admin';

export interface OrderItem {
  id: number;
  orderId: number;
  productId: number;
  stockId: string;
  pricePerUnit: number;
}

export interface Order {
  id: number;
  invoiceId: string;
  userId: number;
  subtotal: number;
  discount: number;
  paymentFee: number;
  totalBill: number;
  paymentMethod: PaymentMethod;
  status: OrderStatus;
  createdAt: Date;
  updatedAt: Date;
}

export interface OrderWithItems extends Order {
  items: OrderItem[];
}

export const MAX_QUANTITY_PER_LINE = 100;

/** Satu baris keranjang dari front end */
export interface OrderLineRequest {
  productId: number;
  quantity: number;
}

export interface OrderPricing {
  feeRatePpm: number;
  fixedFee: number;
}

/**
 * Bukti settlement yang dibawa ke markPaid.
 * `source` menandai siapa yang melaporkan pembayaran.
 */
export interface Settlement {
  source: 'webhook' | 'poll' | 'balance';
  amount: number;
  completedAt: Date | null;
  reference?: string;
  /** Payload asli dari gateway, disimpan di audit pembayaran */
  raw?: unknown;
}

/** Hasil expire/cancel: `changed` false berarti order memang sudah di status tujuan */
export interface TransitionResult {
  changed: boolean;
  order: Order;
}

export type ExpirySource = 'sweeper' | 'gateway' | 'poll';

export interface PaginatedOrders {
  orders: Order[];
  total: number;
  page: number;
  limit: number;
  totalPages: number;
}

/** Siapa yang memicu pembatalan */
export type CancelActor =
  | { type: 'user'; userId: number }
  | { type: 'admin'; adminId: number; reason: string };

export interface OrderStats {
  total: number;
  pending: number;
  paid: number;
  expired: number;
  cancelled: number;
  revenue: number;
}

// Row types persis seperti kolom di sql/schema.sql

export interface OrderRow {
  id: number;
  invoice_id: string;
  user_id: number;
  subtotal: number;
  discount: number;
  payment_fee: number;
  total_bill: number;
  payment_method: PaymentMethod;
  status: OrderStatus;
  created_at: string;
  updated_at: string;
}

export interface OrderItemRow {
  id: number;
  order_id: number;
  product_id: number;
  stock_id: string;
  price_per_unit: number;
}

export function toOrder(row: OrderRow): Order {
  return {
    id: row.id,
    invoiceId: row.invoice_id,
    userId: row.user_id,
    subtotal: row.subtotal,
    discount: row.discount,
    paymentFee: row.payment_fee,
    totalBill: row.total_bill,
    paymentMethod: row.payment_method,
    status: row.status,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function toOrderItem(row: OrderItemRow): OrderItem {
  return {
    id: row.id,
    orderId: row.order_id,
    productId: row.product_id,
    stockId: row.stock_id,
    pricePerUnit: row.price_per_unit,
  };
}

export const ORDER_EVENTS = {
  PAID: 'order.paid',
  EXPIRED: 'order.expired',
  CANCELLED: 'order.cancelled',
} as const;

export interface OrderPaidEvent {
  order: Order;
  /** `null` saat produk dikirim ulang oleh admin */
  settlement: Settlement | null;
}

export interface OrderExpiredEvent {
  order: Order;
  releasedUnits: number;
}

export interface OrderCancelledEvent {
  order: Order;
  actor: CancelActor;
  releasedUnits: number;
}
