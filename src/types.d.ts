// Operation inputs, as received from the API layer

export type CustomerInput = {
  readonly name?: string | null;
  readonly email?: string | null;
  readonly phone?: string | null;
};

export type ProductInput = {
  readonly name: string;
  readonly price: number | string;
  readonly stock?: number | null;
};

export type OrderInput = {
  readonly customerId: string;
  readonly productIds: string[];
};
