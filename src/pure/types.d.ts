// Module product types

import {Cents, Customer, Order, Product} from "../domain";
import {CrmErrorCode} from "./errors";

export type NewCustomer = {
    readonly name: string;
    readonly email: string;
    readonly phone: string | null;
};

export type NewProduct = {
    readonly name: string;
    readonly price: Cents;
    readonly stock: number;
};

export type NewOrder = {
    readonly customerId: string;
    readonly productIds: string[];
    readonly totalAmount: Cents;
};

export type GetOrCreateResult<T> = {
    readonly record: T;
    readonly created: boolean;
};

export type CreateCustomerResult = {
    readonly customer: Customer;
    readonly message: string;
};

export type BulkFailure = {
    readonly index: number;
    readonly code: CrmErrorCode | 'StoreError';
    readonly message: string;
};

export type BulkCreateCustomersResult = {
    readonly customers: Customer[];
    readonly errors: string[];
    readonly failures: BulkFailure[];
};

export type CreateProductResult = {
    readonly product: Product;
};

export type CreateOrderResult = {
    readonly order: Order;
};
