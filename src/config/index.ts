import path from 'path';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(5000),
  DATABASE_URL: z.string().min(1).default('messaging.db'),
  DATABASE_SCHEMA_PATH: z.string().min(1).default(path.join('db', 'schema.sql')),
  FRONTEND_URL: z.string().url().optional(),
  LOG_QUERIES: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
});

export type AppConfig = ReturnType<typeof loadConfig>;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env) => {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  const parsed = result.data;
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    schemaPath: path.resolve(process.cwd(), parsed.DATABASE_SCHEMA_PATH),
    logQueries: parsed.LOG_QUERIES,
    allowedOrigins: ['http://localhost:3000', parsed.FRONTEND_URL].filter(
      (origin): origin is string => Boolean(origin),
    ),
  };
};
