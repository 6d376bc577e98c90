/**
 * EFFECTS LAYER
 *
 * Repository interfaces at the level the operations need them ("find a
 * customer by email", "create an order with its products") rather than
 * "execute arbitrary SQL". Production code implements them over PostgreSQL;
 * tests implement them in memory.
 */

import {Customer, Order, Product} from '../domain';
import {GetOrCreateResult, NewCustomer, NewOrder, NewProduct} from './types';

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface CustomerRepository {
  findAll(): Promise<Customer[]>;
  getById(id: string): Promise<Customer | null>;
  findByEmail(email: string): Promise<Customer | null>;
  /** Resolves to null when the email is already taken. */
  create(customer: NewCustomer): Promise<Customer | null>;
  getOrCreateByEmail(
    email: string,
    defaults: Omit<NewCustomer, 'email'>
  ): Promise<GetOrCreateResult<Customer>>;
}

export interface ProductRepository {
  findAll(): Promise<Product[]>;
  /** Existing products among `ids`, each at most once, ascending by id. */
  getByIds(ids: string[]): Promise<Product[]>;
  create(product: NewProduct): Promise<Product>;
  getOrCreateByName(
    name: string,
    defaults: Omit<NewProduct, 'name'>
  ): Promise<GetOrCreateResult<Product>>;
}

export interface OrderRepository {
  findAll(): Promise<Order[]>;
  /** Inserts the order and its product associations atomically. */
  create(order: NewOrder): Promise<Order>;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type AppEffects = {
  readonly customers: CustomerRepository;
  readonly products: ProductRepository;
  readonly orders: OrderRepository;
}
