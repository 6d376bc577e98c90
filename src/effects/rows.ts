// Row shapes returned by the pg driver and their mapping to domain types.
// SERIAL columns arrive as numbers, NUMERIC columns as strings.

import {Customer, Order, Product} from '../domain';
import {parseMoney} from '../pure/money';

const MAX_SERIAL = 2147483647;

export type CustomerRow = {
  id: number;
  name: string;
  email: string;
  phone: string | null;
};

export type ProductRow = {
  id: number;
  name: string;
  price: string;
  stock: number;
};

export type OrderRow = {
  id: number;
  customer_id: number;
  total_amount: string;
  order_date: Date;
  product_ids: number[];
};

/**
 * Parse an API id into a database key. Anything that cannot be a SERIAL value
 * is treated as absent rather than sent to the server.
 */
export function toDbId(id: string): number | null {
  if (!/^\d+$/.test(id)) return null;
  const value = Number(id);
  return value >= 1 && value <= MAX_SERIAL ? value : null;
}

export function toDbIds(ids: string[]): number[] {
  return ids.flatMap(id => {
    const dbId = toDbId(id);
    return dbId === null ? [] : [dbId];
  });
}

export function toCustomer(row: CustomerRow): Customer {
  return {
    id: String(row.id),
    name: row.name,
    email: row.email,
    phone: row.phone,
  };
}

export function toProduct(row: ProductRow): Product {
  return {
    id: String(row.id),
    name: row.name,
    price: parseMoney(row.price).unsafeCoerce(),
    stock: row.stock,
  };
}

export function toOrder(row: OrderRow): Order {
  return {
    id: String(row.id),
    customerId: String(row.customer_id),
    productIds: row.product_ids.map(String),
    totalAmount: parseMoney(row.total_amount).unsafeCoerce(),
    orderDate: row.order_date,
  };
}
