// API shapes of the domain types. Money leaves the domain as a two-decimal
// string; dates as ISO-8601.

import {Customer, Order, Product} from '../domain';
import {formatCents} from '../pure/money';

export type CustomerView = {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly phone: string | null;
};

export type ProductView = {
  readonly id: string;
  readonly name: string;
  readonly price: string;
  readonly stock: number;
};

export type OrderView = {
  readonly id: string;
  readonly customerId: string;
  readonly productIds: string[];
  readonly totalAmount: string;
  readonly orderDate: string;
};

export function toCustomerView(customer: Customer): CustomerView {
  return {
    id: customer.id,
    name: customer.name,
    email: customer.email,
    phone: customer.phone,
  };
}

export function toProductView(product: Product): ProductView {
  return {
    id: product.id,
    name: product.name,
    price: formatCents(product.price),
    stock: product.stock,
  };
}

export function toOrderView(order: Order): OrderView {
  return {
    id: order.id,
    customerId: order.customerId,
    productIds: order.productIds,
    totalAmount: formatCents(order.totalAmount),
    orderDate: order.orderDate.toISOString(),
  };
}
