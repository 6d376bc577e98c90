import {AppConfig} from './types';
import {z} from 'zod';

const port = (fallback: number) => z.coerce.number().int().min(1).max(65535).default(fallback);

const envSchema = z.object({
  DATABASE_HOST: z.string().min(1).default('localhost'),
  DATABASE_PORT: port(5432),
  DATABASE_USER: z.string().min(1).default('appuser'),
  DATABASE_PASSWORD: z.string().default('apppassword'),
  DATABASE_NAME: z.string().min(1).default('crmdb'),
  API_PORT: port(4000),
});

/**
 * Load configuration from environment variables, falling back to local
 * development defaults. Throws a ZodError naming the offending variable when
 * a value is present but invalid.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    database: {
      host: parsed.DATABASE_HOST,
      port: parsed.DATABASE_PORT,
      user: parsed.DATABASE_USER,
      password: parsed.DATABASE_PASSWORD,
      database: parsed.DATABASE_NAME,
    },
    api: {
      port: parsed.API_PORT,
    },
  };
}
