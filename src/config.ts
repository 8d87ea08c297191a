import { join } from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';

export const ENVIRONMENTS = ['staging', 'prod'] as const;
export type Environment = (typeof ENVIRONMENTS)[number];

export type DatabaseConfig =
  | { url: string }
  | {
      host: string;
      port: number;
      database: string;
      username: string;
      password: string | undefined;
    };

// Empty assignments in .env files (`PG_PASSWORD=`) count as unset
const optionalString = z.preprocess(
  (val) => (typeof val === 'string' && val.trim() === '' ? undefined : val),
  z.string().optional()
);

const envSchema = z.object({
  DATABASE_URL: optionalString,
  PG_HOST: optionalString,
  PG_PORT: z.preprocess(
    (val) => (val === undefined || val === '' ? 5432 : val),
    z.coerce.number().int().positive()
  ),
  PG_DBNAME: optionalString,
  PG_USER: optionalString,
  PG_PASSWORD: optionalString,
});

/**
 * Build the connection settings from environment variables.
 *
 * DATABASE_URL wins when set; otherwise PG_HOST, PG_DBNAME and PG_USER are
 * all required (PG_PORT defaults to 5432).
 */
export function resolveDatabaseConfig(env: NodeJS.ProcessEnv): DatabaseConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid database configuration: ${detail}`);
  }

  const vars = parsed.data;
  if (vars.DATABASE_URL) {
    return { url: vars.DATABASE_URL };
  }

  const missing = (['PG_HOST', 'PG_DBNAME', 'PG_USER'] as const).filter((name) => !vars[name]);
  if (!vars.PG_HOST || !vars.PG_DBNAME || !vars.PG_USER) {
    throw new Error(
      `DATABASE_URL environment variable is not set, and neither is ${missing.join(', ')}. ` +
        'Please add them to your .env.<environment> file.'
    );
  }

  return {
    host: vars.PG_HOST,
    port: vars.PG_PORT,
    database: vars.PG_DBNAME,
    username: vars.PG_USER,
    password: vars.PG_PASSWORD,
  };
}

/**
 * Load `.env.<environment>` (then `.env` as fallback) into process.env and
 * resolve the database settings for that environment.
 */
export function loadEnvironment(environment: Environment, dir = process.cwd()): DatabaseConfig {
  dotenv.config({ path: join(dir, `.env.${environment}`) });
  dotenv.config({ path: join(dir, '.env') });
  return resolveDatabaseConfig(process.env);
}

/** Printable form of the target, without credentials */
export function describeDatabase(config: DatabaseConfig): string {
  if ('url' in config) {
    try {
      const url = new URL(config.url);
      return `${url.hostname}${url.pathname}`;
    } catch {
      return '<unparseable DATABASE_URL>';
    }
  }
  return `${config.host}/${config.database}`;
}
