/**
 * TESTS FOR VALIDATION RULES
 *
 * Plain inputs and outputs: the rules never touch the store.
 */

import {Customer, Product} from '../domain';
import {
  calculateOrderTotal,
  validateEmailUnique,
  validatePhoneFormat,
  validatePricePositive,
  validateProductIdsPresent,
  validateProductsExist,
  validateRequired,
  validateStockNonNegative,
} from '../pure/validation';

const alice: Customer = {id: '1', name: 'Alice', email: 'alice@example.com', phone: null};
const laptop: Product = {id: '10', name: 'Laptop', price: 85000, stock: 10};
const phone: Product = {id: '11', name: 'Phone', price: 50000, stock: 20};

describe('validateRequired', () => {
  it('fails when name or email is missing', () => {
    const expected = {code: 'RequiredFieldError', message: 'Name and Email are required.'};
    expect(validateRequired('', 'alice@example.com').extract()).toEqual(expected);
    expect(validateRequired('Alice', null).extract()).toEqual(expected);
    expect(validateRequired(undefined, undefined).extract()).toEqual(expected);
  });

  it('passes both values through', () => {
    expect(validateRequired('Alice', 'alice@example.com').extract())
      .toEqual({name: 'Alice', email: 'alice@example.com'});
  });
});

describe('validateEmailUnique', () => {
  it('fails when a customer already has the email', () => {
    expect(validateEmailUnique('alice@example.com', alice).extract())
      .toEqual({code: 'DuplicateError', message: 'Email already exists: alice@example.com'});
  });

  it('passes when no customer has the email', () => {
    expect(validateEmailUnique('bob@example.com', null).extract()).toBe('bob@example.com');
  });
});

describe('validatePhoneFormat', () => {
  it.each([
    '1234567890',
    '+1234567890',
    '123456789012345',
    '+123456789012345',
    '123-456-7890',
  ])('accepts %s', (value) => {
    expect(validatePhoneFormat(value).extract()).toBe(value);
  });

  it.each([
    '12345',
    '+1234567890123456',
    '123-4567-890',
    '(123) 456-7890',
    '+123-456-7890',
    'abcdefghij',
  ])('rejects %s', (value) => {
    expect(validatePhoneFormat(value).extract())
      .toEqual({code: 'FormatError', message: `Invalid phone format for: ${value}`});
  });

  it('treats an absent or empty phone as null', () => {
    expect(validatePhoneFormat(undefined).extract()).toBeNull();
    expect(validatePhoneFormat(null).extract()).toBeNull();
    expect(validatePhoneFormat('').extract()).toBeNull();
  });
});

describe('validatePricePositive', () => {
  it('rejects zero and negative prices', () => {
    const expected = {code: 'RangeError', message: 'Price must be positive.'};
    expect(validatePricePositive(0).extract()).toEqual(expected);
    expect(validatePricePositive(-100).extract()).toEqual(expected);
  });

  it('accepts a positive price', () => {
    expect(validatePricePositive(1).extract()).toBe(1);
  });
});

describe('validateStockNonNegative', () => {
  it('rejects negative and fractional stock', () => {
    const expected = {code: 'RangeError', message: 'Stock cannot be negative.'};
    expect(validateStockNonNegative(-1).extract()).toEqual(expected);
    expect(validateStockNonNegative(1.5).extract()).toEqual(expected);
  });

  it('accepts zero', () => {
    expect(validateStockNonNegative(0).extract()).toBe(0);
  });
});

describe('validateProductIdsPresent', () => {
  it('fails for an empty list', () => {
    expect(validateProductIdsPresent([]).extract())
      .toEqual({code: 'RequiredFieldError', message: 'At least one product must be selected.'});
  });
});

describe('validateProductsExist', () => {
  it('passes when every id resolved', () => {
    expect(validateProductsExist(['10', '11'], [laptop, phone]).extract()).toEqual([laptop, phone]);
  });

  it('lists the ids that did not resolve', () => {
    expect(validateProductsExist(['10', '98', '99'], [laptop]).extract())
      .toEqual({code: 'ReferenceError', message: 'Some product IDs are invalid: 98, 99'});
  });

  it('rejects an id given twice', () => {
    expect(validateProductsExist(['10', '10'], [laptop]).extract())
      .toEqual({code: 'ReferenceError', message: 'Some product IDs are invalid: 10'});
  });
});

describe('calculateOrderTotal', () => {
  it('sums product prices', () => {
    expect(calculateOrderTotal([laptop, phone])).toBe(135000);
  });
});
