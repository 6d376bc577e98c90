/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * PostgreSQL-backed repositories. Each call borrows one client from the pool
 * and releases it when done; multi-statement writes run inside an explicit
 * transaction on that client.
 */
import {Customer, Order, Product} from '../domain';
import {GetOrCreateResult, NewCustomer, NewOrder, NewProduct} from '../pure/types';
import {AppEffects, CustomerRepository, OrderRepository, ProductRepository} from '../pure/effects';
import {formatCents} from '../pure/money';
import {loadConfigFromEnv} from './config';
import {AppConfig} from './types';
import {
  CustomerRow,
  OrderRow,
  ProductRow,
  toCustomer,
  toDbId,
  toDbIds,
  toOrder,
  toProduct,
} from './rows';
import {Pool, PoolClient} from 'pg';
import {readFileSync} from 'fs';
import {join} from 'path';

const SCHEMA_PATH = join(__dirname, 'schema.sql');

const CUSTOMER_COLUMNS = 'id, name, email, phone';
const PRODUCT_COLUMNS = 'id, name, price, stock';
const ORDER_SELECT = `
  SELECT o.id, o.customer_id, o.total_amount, o.order_date,
         COALESCE(array_agg(op.product_id ORDER BY op.product_id)
                  FILTER (WHERE op.product_id IS NOT NULL), '{}') AS product_ids
  FROM orders o
  LEFT JOIN order_products op ON op.order_id = o.id`;

async function withClient<T>(pool: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    return await work(client);
  } finally {
    client.release();
  }
}

async function inTransaction<T>(pool: Pool, work: (client: PoolClient) => Promise<T>): Promise<T> {
  return withClient(pool, async (client) => {
    await client.query('BEGIN');
    try {
      const result = await work(client);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    }
  });
}

/**
 * Apply schema.sql. Every statement is CREATE ... IF NOT EXISTS, so this runs
 * on every startup.
 */
export async function migrate(pool: Pool): Promise<void> {
  const schema = readFileSync(SCHEMA_PATH, 'utf8');
  await withClient(pool, (client) => client.query(schema));
}

// ============================================================================
// PostgreSQL Customer Repository
// ============================================================================

class PostgresCustomerRepository implements CustomerRepository {
  constructor(private pool: Pool) {}

  async findAll(): Promise<Customer[]> {
    return withClient(this.pool, async (client) => {
      const result = await client.query<CustomerRow>(
        `SELECT ${CUSTOMER_COLUMNS} FROM customers ORDER BY id`
      );
      return result.rows.map(toCustomer);
    });
  }

  async getById(id: string): Promise<Customer | null> {
    const dbId = toDbId(id);
    if (dbId === null) {
      return null;
    }

    return withClient(this.pool, async (client) => {
      const result = await client.query<CustomerRow>(
        `SELECT ${CUSTOMER_COLUMNS} FROM customers WHERE id = $1`,
        [dbId]
      );
      return result.rows[0] ? toCustomer(result.rows[0]) : null;
    });
  }

  async findByEmail(email: string): Promise<Customer | null> {
    return withClient(this.pool, async (client) => {
      const result = await client.query<CustomerRow>(
        `SELECT ${CUSTOMER_COLUMNS} FROM customers WHERE email = $1`,
        [email]
      );
      return result.rows[0] ? toCustomer(result.rows[0]) : null;
    });
  }

  async create(customer: NewCustomer): Promise<Customer | null> {
    return withClient(this.pool, async (client) => {
      // The UNIQUE constraint decides; no row back means the email was taken
      const result = await client.query<CustomerRow>(
        `INSERT INTO customers (name, email, phone) VALUES ($1, $2, $3)
         ON CONFLICT (email) DO NOTHING
         RETURNING ${CUSTOMER_COLUMNS}`,
        [customer.name, customer.email, customer.phone]
      );
      return result.rows[0] ? toCustomer(result.rows[0]) : null;
    });
  }

  async getOrCreateByEmail(
    email: string,
    defaults: Omit<NewCustomer, 'email'>
  ): Promise<GetOrCreateResult<Customer>> {
    const created = await this.create({...defaults, email});
    if (created) {
      return {record: created, created: true};
    }

    const existing = await this.findByEmail(email);
    if (!existing) {
      throw new Error(`Customer ${email} vanished between insert and lookup`);
    }
    return {record: existing, created: false};
  }
}

// ============================================================================
// PostgreSQL Product Repository
// ============================================================================

class PostgresProductRepository implements ProductRepository {
  constructor(private pool: Pool) {}

  async findAll(): Promise<Product[]> {
    return withClient(this.pool, async (client) => {
      const result = await client.query<ProductRow>(
        `SELECT ${PRODUCT_COLUMNS} FROM products ORDER BY id`
      );
      return result.rows.map(toProduct);
    });
  }

  async getByIds(ids: string[]): Promise<Product[]> {
    const dbIds = toDbIds(ids);
    if (dbIds.length === 0) {
      return [];
    }

    return withClient(this.pool, async (client) => {
      const result = await client.query<ProductRow>(
        `SELECT ${PRODUCT_COLUMNS} FROM products WHERE id = ANY($1::int[]) ORDER BY id`,
        [dbIds]
      );
      return result.rows.map(toProduct);
    });
  }

  async create(product: NewProduct): Promise<Product> {
    return withClient(this.pool, async (client) => {
      const result = await client.query<ProductRow>(
        `INSERT INTO products (name, price, stock) VALUES ($1, $2, $3)
         RETURNING ${PRODUCT_COLUMNS}`,
        [product.name, formatCents(product.price), product.stock]
      );
      return toProduct(result.rows[0]);
    });
  }

  async getOrCreateByName(
    name: string,
    defaults: Omit<NewProduct, 'name'>
  ): Promise<GetOrCreateResult<Product>> {
    return inTransaction(this.pool, async (client) => {
      const existing = await client.query<ProductRow>(
        `SELECT ${PRODUCT_COLUMNS} FROM products WHERE name = $1 ORDER BY id LIMIT 1`,
        [name]
      );
      if (existing.rows[0]) {
        return {record: toProduct(existing.rows[0]), created: false};
      }

      const inserted = await client.query<ProductRow>(
        `INSERT INTO products (name, price, stock) VALUES ($1, $2, $3)
         RETURNING ${PRODUCT_COLUMNS}`,
        [name, formatCents(defaults.price), defaults.stock]
      );
      return {record: toProduct(inserted.rows[0]), created: true};
    });
  }
}

// ============================================================================
// PostgreSQL Order Repository
// ============================================================================

class PostgresOrderRepository implements OrderRepository {
  constructor(private pool: Pool) {}

  async findAll(): Promise<Order[]> {
    return withClient(this.pool, async (client) => {
      const result = await client.query<OrderRow>(`${ORDER_SELECT} GROUP BY o.id ORDER BY o.id`);
      return result.rows.map(toOrder);
    });
  }

  async create(order: NewOrder): Promise<Order> {
    const customerId = toDbId(order.customerId);
    if (customerId === null) {
      throw new Error(`Invalid customer id: ${order.customerId}`);
    }

    return inTransaction(this.pool, async (client) => {
      const inserted = await client.query<Omit<OrderRow, 'product_ids'>>(
        `INSERT INTO orders (customer_id, total_amount) VALUES ($1, $2)
         RETURNING id, customer_id, total_amount, order_date`,
        [customerId, formatCents(order.totalAmount)]
      );
      const row = inserted.rows[0];

      const productIds = toDbIds(order.productIds);
      await client.query(
        'INSERT INTO order_products (order_id, product_id) SELECT $1, unnest($2::int[])',
        [row.id, productIds]
      );

      return toOrder({...row, product_ids: productIds});
    });
  }
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

export type ManagedAppEffects = AppEffects & {
  close(): Promise<void>;
};

class EffectsFactory implements ManagedAppEffects {
  private _pool?: Pool;
  private _customerRepository?: CustomerRepository;
  private _productRepository?: ProductRepository;
  private _orderRepository?: OrderRepository;

  constructor(private config: AppConfig) {}

  private async getPool(): Promise<Pool> {
    if (!this._pool) {
      this._pool = new Pool({
        host: this.config.database.host,
        port: this.config.database.port,
        user: this.config.database.user,
        password: this.config.database.password,
        database: this.config.database.database,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
      });

      // Test database connection
      try {
        const client = await this._pool.connect();
        console.log('✅ Connected to PostgreSQL');
        client.release();
      } catch (error) {
        console.error('❌ Failed to connect to PostgreSQL:', error);
        throw error;
      }
    }
    return this._pool;
  }

  private requirePool(): Pool {
    if (!this._pool) {
      throw new Error('Database pool not initialized. Call initialize() first.');
    }
    return this._pool;
  }

  get customers(): CustomerRepository {
    if (!this._customerRepository) {
      this._customerRepository = new PostgresCustomerRepository(this.requirePool());
    }
    return this._customerRepository;
  }

  get products(): ProductRepository {
    if (!this._productRepository) {
      this._productRepository = new PostgresProductRepository(this.requirePool());
    }
    return this._productRepository;
  }

  get orders(): OrderRepository {
    if (!this._orderRepository) {
      this._orderRepository = new PostgresOrderRepository(this.requirePool());
    }
    return this._orderRepository;
  }

  /**
   * Connect and apply the schema. Must be called before using the effects.
   */
  async initialize(): Promise<void> {
    const pool = await this.getPool();
    await migrate(pool);
    console.log('✅ Database schema ready');
  }

  async close(): Promise<void> {
    if (this._pool) {
      await this._pool.end();
      this._pool = undefined;
      console.log('✅ PostgreSQL pool closed');
    }
  }

  static async make(config?: AppConfig): Promise<ManagedAppEffects> {
    const effects = new EffectsFactory(config || loadConfigFromEnv());
    await effects.initialize();
    return effects;
  }
}

export async function makeAppEffects(config?: AppConfig): Promise<ManagedAppEffects> {
  return EffectsFactory.make(config);
}
