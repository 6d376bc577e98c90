/**
 * Idempotent sample data. Customers are keyed by email and products by name,
 * so re-running leaves them untouched. The sample order has no natural key
 * and is created again on every run.
 */

import {Cents, Order} from '../domain';
import {AppEffects} from './effects';
import {calculateOrderTotal} from './validation';
import {NewCustomer} from './types';
import {Maybe} from 'purify-ts';

export type SeedLogger = (line: string) => void;

export const SAMPLE_CUSTOMERS: NewCustomer[] = [
  {name: 'Alice', email: 'alice@example.com', phone: '+12025550101'},
  {name: 'Bob', email: 'bob@example.com', phone: '202-555-0102'},
  {name: 'Charlie', email: 'charlie@example.com', phone: '2025550103'},
];

export const SAMPLE_PRODUCTS: { name: string; price: Cents; stock: number }[] = [
  {name: 'Laptop', price: 85000, stock: 10},
  {name: 'Phone', price: 50000, stock: 20},
  {name: 'Headphones', price: 7500, stock: 50},
];

async function seedCustomers(appEffects: AppEffects, log: SeedLogger): Promise<void> {
  for (const {email, ...defaults} of SAMPLE_CUSTOMERS) {
    const {record, created} = await appEffects.customers.getOrCreateByEmail(email, defaults);
    log(created ? `Created customer: ${record.name}` : `Customer already exists: ${record.name}`);
  }
}

async function seedProducts(appEffects: AppEffects, log: SeedLogger): Promise<void> {
  for (const {name, ...defaults} of SAMPLE_PRODUCTS) {
    const {record, created} = await appEffects.products.getOrCreateByName(name, defaults);
    log(created ? `Created product: ${record.name}` : `Product already exists: ${record.name}`);
  }
}

// First customer and first two products, in store order
async function seedOrder(appEffects: AppEffects, log: SeedLogger): Promise<Maybe<Order>> {
  const [customers, products] = await Promise.all([
    appEffects.customers.findAll(),
    appEffects.products.findAll(),
  ]);
  const customer = customers[0];
  if (!customer || products.length === 0) {
    log('Cannot create orders: customers or products missing.');
    return Maybe.empty();
  }

  const selected = products.slice(0, 2);
  const order = await appEffects.orders.create({
    customerId: customer.id,
    productIds: selected.map(product => product.id),
    totalAmount: calculateOrderTotal(selected),
  });
  log(`Created order for ${customer.name} with ${selected.length} products.`);
  return Maybe.of(order);
}

export function seedDatabase(
  log: SeedLogger = console.log
): (appEffects: AppEffects) => Promise<Maybe<Order>> {
  return async (appEffects: AppEffects) => {
    log('Seeding database...');
    await seedCustomers(appEffects, log);
    await seedProducts(appEffects, log);
    const order = await seedOrder(appEffects, log);
    log('Done seeding!');
    return order;
  };
}
