/**
 * GraphQL schema.
 *
 * Entity types are generated from the field tables below. Each table must
 * name exactly the fields of its view type (see `satisfies`), so adding a
 * field to a view without exposing it, or the reverse, fails to compile.
 */

import {CustomerView, OrderView, ProductView} from './views';

type FieldTable<T> = Record<keyof T, string>;

type OrderFields = Omit<OrderView, 'customerId' | 'productIds'> & {
  readonly customer: CustomerView;
  readonly products: ProductView[];
};

export const CUSTOMER_FIELDS = {
  id: 'ID!',
  name: 'String!',
  email: 'String!',
  phone: 'String',
} satisfies FieldTable<CustomerView>;

export const PRODUCT_FIELDS = {
  id: 'ID!',
  name: 'String!',
  price: 'String!',
  stock: 'Int!',
} satisfies FieldTable<ProductView>;

export const ORDER_FIELDS = {
  id: 'ID!',
  customer: 'Customer!',
  products: '[Product!]!',
  totalAmount: 'String!',
  orderDate: 'String!',
} satisfies FieldTable<OrderFields>;

export function objectType(name: string, fields: Record<string, string>): string {
  const lines = Object.entries(fields).map(([field, type]) => `  ${field}: ${type}`);
  return `type ${name} {\n${lines.join('\n')}\n}`;
}

export const typeDefs = `#graphql
${objectType('Customer', CUSTOMER_FIELDS)}

${objectType('Product', PRODUCT_FIELDS)}

${objectType('Order', ORDER_FIELDS)}

"Fields are optional so a missing value is reported per entry."
input CustomerInput {
  name: String
  email: String
  phone: String
}

type BulkFailure {
  index: Int!
  code: String!
  message: String!
}

type CreateCustomerPayload {
  customer: Customer!
  message: String!
}

type BulkCreateCustomersPayload {
  customers: [Customer!]!
  errors: [String!]!
  failures: [BulkFailure!]!
}

type CreateProductPayload {
  product: Product!
}

type CreateOrderPayload {
  order: Order!
}

type Query {
  customers: [Customer!]!
  products: [Product!]!
  orders: [Order!]!
}

type Mutation {
  createCustomer(name: String!, email: String!, phone: String): CreateCustomerPayload
  bulkCreateCustomers(customers: [CustomerInput!]!): BulkCreateCustomersPayload
  createProduct(name: String!, price: Float!, stock: Int = 0): CreateProductPayload
  createOrder(customerId: ID!, productIds: [ID!]!): CreateOrderPayload
}
`;
