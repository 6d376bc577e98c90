import {toCustomer, toDbId, toDbIds, toOrder, toProduct} from '../effects/rows';
import {readFileSync} from 'fs';
import {join} from 'path';

describe('toDbId', () => {
  it('accepts SERIAL values', () => {
    expect(toDbId('42')).toBe(42);
    expect(toDbId('2147483647')).toBe(2147483647);
  });

  it('treats anything else as absent', () => {
    expect(toDbId('abc')).toBeNull();
    expect(toDbId('0')).toBeNull();
    expect(toDbId('-1')).toBeNull();
    expect(toDbId('2147483648')).toBeNull();
  });

  it('drops ids that cannot exist', () => {
    expect(toDbIds(['1', 'x', '3'])).toEqual([1, 3]);
  });
});

describe('row mapping', () => {
  it('maps a customer row', () => {
    expect(toCustomer({id: 3, name: 'Charlie', email: 'charlie@example.com', phone: null}))
      .toEqual({id: '3', name: 'Charlie', email: 'charlie@example.com', phone: null});
  });

  it('maps NUMERIC prices to cents', () => {
    expect(toProduct({id: 7, name: 'Phone', price: '500.00', stock: 20}))
      .toEqual({id: '7', name: 'Phone', price: 50000, stock: 20});
  });

  it('maps prices beyond twelve digits', () => {
    expect(toProduct({id: 8, name: 'Yacht', price: '10000000000.00', stock: 1}).price).toBe(1000000000000);
  });

  it('maps an order row with its product ids', () => {
    const orderDate = new Date('2024-01-15T10:00:00Z');

    expect(toOrder({id: 1, customer_id: 1, total_amount: '1350.00', order_date: orderDate, product_ids: [10, 11]}))
      .toEqual({id: '1', customerId: '1', productIds: ['10', '11'], totalAmount: 135000, orderDate});
  });
});

describe('schema.sql', () => {
  const schema = readFileSync(join(__dirname, '..', 'effects', 'schema.sql'), 'utf8');

  it('puts no length limit on text columns', () => {
    expect(schema).not.toMatch(/VARCHAR/i);
  });

  it('puts no precision limit on money columns', () => {
    expect(schema).toMatch(/price NUMERIC NOT NULL CHECK \(price > 0\)/);
    expect(schema).toMatch(/total_amount NUMERIC NOT NULL/);
    expect(schema).not.toMatch(/NUMERIC\s*\(/i);
  });
});
