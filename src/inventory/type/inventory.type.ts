export interface Product {
  id: number;
  name: string;
  category: string;
  customerPrice: number;
  resellerPrice: number | null;
  soldCount: number;
  isActive: boolean;
}

/** Unit stok yang dikirim ke pembeli setelah order dibayar */
export interface DeliverableUnit {
  stockId: string;
  productId: number;
  productName: string;
  content: string;
}

export interface ProductRow {
  id: number;
  name: string;
  category: string;
  customer_price: number;
  reseller_price: number | null;
  sold_count: number;
  is_active: number;
}

export function toProduct(row: ProductRow): Product {
  return {
    id: row.id,
    name: row.name,
    category: row.category,
    customerPrice: row.customer_price,
    resellerPrice: row.reseller_price,
    soldCount: row.sold_count,
    isActive: row.is_active === 1,
  };
}
