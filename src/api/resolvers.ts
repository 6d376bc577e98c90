/**
 * Resolvers delegate to the CRM operations with the request's effects and
 * translate the results into API views. A rule failure becomes a GraphQL
 * error whose `extensions.code` is the error kind.
 */

import {CustomerInput, OrderInput} from '../types';
import {AppEffects} from '../pure/effects';
import {CrmError} from '../pure/errors';
import {
  bulkCreateCustomers,
  createCustomer,
  createOrder,
  createProduct,
  listCustomers,
  listOrders,
  listProducts,
} from '../pure/crmOperations';
import {BulkFailure} from '../pure/types';
import {CustomerView, OrderView, ProductView, toCustomerView, toOrderView, toProductView} from './views';
import {GraphQLError} from 'graphql';
import {Either} from 'purify-ts';

export type CrmContext = {
  readonly effects: AppEffects;
};

type CreateCustomerArgs = {
  name: string;
  email: string;
  phone?: string | null;
};

type CreateProductArgs = {
  name: string;
  price: number;
  stock?: number | null;
};

function unwrap<T>(result: Either<CrmError, T>): T {
  return result.caseOf<T>({
    Left: (error) => {
      throw new GraphQLError(error.message, {extensions: {code: error.code}});
    },
    Right: (value) => value,
  });
}

export const resolvers = {
  Query: {
    async customers(_parent: unknown, _args: unknown, {effects}: CrmContext): Promise<CustomerView[]> {
      const customers = await listCustomers()(effects);
      return customers.map(toCustomerView);
    },
    async products(_parent: unknown, _args: unknown, {effects}: CrmContext): Promise<ProductView[]> {
      const products = await listProducts()(effects);
      return products.map(toProductView);
    },
    async orders(_parent: unknown, _args: unknown, {effects}: CrmContext): Promise<OrderView[]> {
      const orders = await listOrders()(effects);
      return orders.map(toOrderView);
    },
  },

  Order: {
    async customer(order: OrderView, _args: unknown, {effects}: CrmContext): Promise<CustomerView> {
      const customer = await effects.customers.getById(order.customerId);
      if (!customer) {
        throw new GraphQLError(`Customer ${order.customerId} not found for order ${order.id}.`, {
          extensions: {code: 'NotFoundError'},
        });
      }
      return toCustomerView(customer);
    },
    async products(order: OrderView, _args: unknown, {effects}: CrmContext): Promise<ProductView[]> {
      const products = await effects.products.getByIds(order.productIds);
      return products.map(toProductView);
    },
  },

  Mutation: {
    async createCustomer(
      _parent: unknown,
      args: CreateCustomerArgs,
      {effects}: CrmContext
    ): Promise<{ customer: CustomerView; message: string }> {
      const {customer, message} = unwrap(await createCustomer(args)(effects));
      return {customer: toCustomerView(customer), message};
    },

    async bulkCreateCustomers(
      _parent: unknown,
      args: { customers: CustomerInput[] },
      {effects}: CrmContext
    ): Promise<{ customers: CustomerView[]; errors: string[]; failures: BulkFailure[] }> {
      const result = await bulkCreateCustomers(args.customers)(effects);
      return {...result, customers: result.customers.map(toCustomerView)};
    },

    async createProduct(
      _parent: unknown,
      args: CreateProductArgs,
      {effects}: CrmContext
    ): Promise<{ product: ProductView }> {
      const {product} = unwrap(await createProduct(args)(effects));
      return {product: toProductView(product)};
    },

    async createOrder(
      _parent: unknown,
      args: OrderInput,
      {effects}: CrmContext
    ): Promise<{ order: OrderView }> {
      const {order} = unwrap(await createOrder(args)(effects));
      return {order: toOrderView(order)};
    },
  },
};
