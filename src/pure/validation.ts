/**
 * VALIDATION RULES
 *
 * Pure checks over values. Anything a rule needs from the store (an existing
 * customer, the resolved products) is looked up by the caller and passed in,
 * so these are tested with plain inputs and outputs.
 */

import {Cents, Customer, Product} from '../domain';
import {
    CrmError,
    duplicateError,
    formatError,
    rangeError,
    referenceError,
    requiredFieldError,
} from './errors';
import {sumCents} from './money';
import {Either, Left, Right} from 'purify-ts';

export const PHONE_PATTERN = /^(\+?\d{10,15}|\d{3}-\d{3}-\d{4})$/;

// ============================================================================
// Customers
// ============================================================================

export function validateRequired(
    name: string | null | undefined,
    email: string | null | undefined
): Either<CrmError, { name: string; email: string }> {
    if (!name || !email) {
        return Left(requiredFieldError('Name and Email are required.'));
    }
    return Right({name, email});
}

export function validateEmailUnique(
    email: string,
    existing: Customer | null
): Either<CrmError, string> {
    return existing
        ? Left(duplicateError(`Email already exists: ${email}`))
        : Right(email);
}

/**
 * An absent or empty phone is valid and normalised to null.
 */
export function validatePhoneFormat(
    phone: string | null | undefined
): Either<CrmError, string | null> {
    if (!phone) return Right(null);
    return PHONE_PATTERN.test(phone)
        ? Right(phone)
        : Left(formatError(`Invalid phone format for: ${phone}`));
}

// ============================================================================
// Products
// ============================================================================

export function validatePricePositive(price: Cents): Either<CrmError, Cents> {
    return price > 0 ? Right(price) : Left(rangeError('Price must be positive.'));
}

export function validateStockNonNegative(stock: number): Either<CrmError, number> {
    return Number.isInteger(stock) && stock >= 0
        ? Right(stock)
        : Left(rangeError('Stock cannot be negative.'));
}

// ============================================================================
// Orders
// ============================================================================

export function validateProductIdsPresent(productIds: string[]): Either<CrmError, string[]> {
    return productIds.length > 0
        ? Right(productIds)
        : Left(requiredFieldError('At least one product must be selected.'));
}

/**
 * Fails when fewer products resolved than ids were requested, which covers
 * both unknown ids and an id given more than once.
 */
export function validateProductsExist(
    productIds: string[],
    resolved: Product[]
): Either<CrmError, Product[]> {
    if (resolved.length >= productIds.length) {
        return Right(resolved);
    }

    const found = new Set(resolved.map(product => product.id));
    const seen = new Set<string>();
    const invalid = productIds.filter(id => {
        const bad = !found.has(id) || seen.has(id);
        seen.add(id);
        return bad;
    });
    return Left(referenceError(`Some product IDs are invalid: ${invalid.join(', ')}`));
}

export function calculateOrderTotal(products: Product[]): Cents {
    return sumCents(products.map(product => product.price));
}
