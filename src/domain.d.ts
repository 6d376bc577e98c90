// Domain types shared across the application

/** Integer amount of the smallest currency unit (cents). */
export type Cents = number;

export type Customer = {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly phone: string | null;
};

export type Product = {
  readonly id: string;
  readonly name: string;
  readonly price: Cents;
  readonly stock: number;
};

export type Order = {
  readonly id: string;
  readonly customerId: string;
  readonly productIds: string[];
  readonly totalAmount: Cents;
  readonly orderDate: Date;
};
