/**
 * CRM OPERATIONS - The Coordinators
 *
 * Each operation is curried over its effects: it reads what the rules need,
 * hands the values to the pure rules in validation.ts, and writes only once
 * every rule has passed. Rule failures come back as Left values; failures of
 * the store itself are thrown and left to the caller.
 */

import {Customer, Order, Product} from '../domain';
import {CustomerInput, OrderInput, ProductInput} from '../types';
import {AppEffects} from './effects';
import {CrmError, duplicateError, notFoundError} from './errors';
import {parseMoney} from './money';
import {
    calculateOrderTotal,
    validateEmailUnique,
    validatePhoneFormat,
    validatePricePositive,
    validateProductIdsPresent,
    validateProductsExist,
    validateRequired,
    validateStockNonNegative,
} from './validation';
import {
    BulkCreateCustomersResult,
    BulkFailure,
    CreateCustomerResult,
    CreateOrderResult,
    CreateProductResult,
} from './types';
import {Either, Left, Maybe, Right} from 'purify-ts';

export const CUSTOMER_CREATED_MESSAGE = 'Customer created successfully!';

/**
 * Continue with `next` on Right; a Left short-circuits unchanged.
 */
function andThen<L, R, T>(
    either: Either<L, R>,
    next: (value: R) => Promise<Either<L, T>>
): Promise<Either<L, T>> {
    return either.caseOf({
        Left: (error) => Promise.resolve(Left<L, T>(error)),
        Right: next,
    });
}

// ============================================================================
// Customers
// ============================================================================

/**
 * Validate and insert one customer. Checks run in order: required fields,
 * email uniqueness, phone format. The insert is also guarded by the store's
 * unique constraint, so a concurrent insert of the same email is still
 * reported as a duplicate.
 */
function persistCustomer(
    input: CustomerInput
): (appEffects: AppEffects) => Promise<Either<CrmError, Customer>> {
    return async (appEffects: AppEffects) =>
        andThen(validateRequired(input.name, input.email), async ({name, email}) => {
            const existing = await appEffects.customers.findByEmail(email);
            const phone = validateEmailUnique(email, existing)
                .chain(() => validatePhoneFormat(input.phone));

            return andThen(phone, async (validPhone): Promise<Either<CrmError, Customer>> => {
                const customer = await appEffects.customers.create({name, email, phone: validPhone});
                return customer
                    ? Right(customer)
                    : Left(duplicateError(`Email already exists: ${email}`));
            });
        });
}

export function createCustomer(
    input: CustomerInput
): (appEffects: AppEffects) => Promise<Either<CrmError, CreateCustomerResult>> {
    return async (appEffects: AppEffects) => {
        const customer = await persistCustomer(input)(appEffects);
        return customer.map(created => ({customer: created, message: CUSTOMER_CREATED_MESSAGE}));
    };
}

/**
 * Best-effort bulk insert: entries are handled one after another and each
 * one commits on its own. A failing entry is recorded and the rest carry on,
 * so both result lists keep input order.
 */
export function bulkCreateCustomers(
    entries: CustomerInput[]
): (appEffects: AppEffects) => Promise<BulkCreateCustomersResult> {
    return async (appEffects: AppEffects) => {
        const customers: Customer[] = [];
        const failures: BulkFailure[] = [];

        for (const [index, entry] of entries.entries()) {
            try {
                const result = await persistCustomer(entry)(appEffects);
                result.caseOf({
                    Left: (error) => {
                        failures.push({index, code: error.code, message: error.message});
                    },
                    Right: (customer) => {
                        customers.push(customer);
                    },
                });
            } catch (error) {
                console.error(`Failed to store bulk customer entry ${index}:`, error);
                failures.push({
                    index,
                    code: 'StoreError',
                    message: error instanceof Error ? error.message : String(error),
                });
            }
        }

        return {customers, errors: failures.map(failure => failure.message), failures};
    };
}

// ============================================================================
// Products
// ============================================================================

export function createProduct(
    input: ProductInput
): (appEffects: AppEffects) => Promise<Either<CrmError, CreateProductResult>> {
    return async (appEffects: AppEffects) => {
        const product = parseMoney(input.price)
            .chain(validatePricePositive)
            .chain(price => validateStockNonNegative(input.stock ?? 0)
                .map(stock => ({name: input.name, price, stock})));

        return andThen(product, async (fields): Promise<Either<CrmError, CreateProductResult>> =>
            Right({product: await appEffects.products.create(fields)}));
    };
}

// ============================================================================
// Orders
// ============================================================================

/**
 * Create an order. The customer, the non-empty product list and the product
 * references are checked in that order; the first failure is returned. The
 * total is the exact sum of the resolved prices and is stored once.
 */
export function createOrder(
    input: OrderInput
): (appEffects: AppEffects) => Promise<Either<CrmError, CreateOrderResult>> {
    return async (appEffects: AppEffects) => {
        const customer = Maybe
            .fromNullable(await appEffects.customers.getById(input.customerId))
            .toEither(notFoundError('Invalid customer ID.'));
        const request = customer.chain(found => validateProductIdsPresent(input.productIds)
            .map(productIds => ({customer: found, productIds})));

        return andThen(request, async ({customer: found, productIds}) => {
            const resolved = await appEffects.products.getByIds(productIds);

            return andThen(
                validateProductsExist(productIds, resolved),
                async (products): Promise<Either<CrmError, CreateOrderResult>> => {
                    const order = await appEffects.orders.create({
                        customerId: found.id,
                        productIds: products.map(product => product.id),
                        totalAmount: calculateOrderTotal(products),
                    });
                    return Right({order});
                }
            );
        });
    };
}

// ============================================================================
// Queries
// ============================================================================

export function listCustomers(): (appEffects: AppEffects) => Promise<Customer[]> {
    return (appEffects: AppEffects) => appEffects.customers.findAll();
}

export function listProducts(): (appEffects: AppEffects) => Promise<Product[]> {
    return (appEffects: AppEffects) => appEffects.products.findAll();
}

export function listOrders(): (appEffects: AppEffects) => Promise<Order[]> {
    return (appEffects: AppEffects) => appEffects.orders.findAll();
}
