import { z } from 'zod';

const booleanFromString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment schema, applied by ConfigModule at startup.
 *
 * Values arrive as strings; numeric and boolean settings are coerced here
 * so `ConfigService.get<number>()` returns what it claims to.
 */
export const envSchema = z
  .object({
    NODE_ENV: z
      .enum(['development', 'production', 'test'])
      .default('development'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    /** Browser origin allowed to call the API; CORS stays off when unset */
    CORS_ORIGIN: z.string().min(1).optional(),

    DB_TYPE: z.enum(['postgres', 'better-sqlite3']).default('postgres'),
    DB_HOST: z.string().default('localhost'),
    DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
    DB_USERNAME: z.string().optional(),
    DB_PASSWORD: z.string().optional(),
    DB_DATABASE: z.string().default('d0010'),
    DB_SQLITE_PATH: z.string().default('d0010.sqlite'),
    DB_SYNCHRONIZE: booleanFromString.optional(),
  })
  .transform((env) => ({
    ...env,
    // Off by default in production
    DB_SYNCHRONIZE: env.DB_SYNCHRONIZE ?? env.NODE_ENV !== 'production',
  }));

export type EnvConfig = z.infer<typeof envSchema>;

/**
 * `validate` hook for ConfigModule.forRoot.
 *
 * @throws Error listing every invalid variable
 */
export function validateEnv(config: Record<string, unknown>): EnvConfig {
  const parsed = envSchema.safeParse(config);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }
  return parsed.data;
}
