import { z } from 'zod';

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.length === 0) {
    return undefined;
  }
  return value;
}

const optionalLogLevel = z.preprocess(emptyStringToUndefined, z.enum(['debug', 'info', 'warn', 'error']).optional());

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  DB_HOST: z.string().min(1).default('lb'),
  DB_PORT: z.coerce.number().int().positive().max(65_535).default(26257),
  DB_NAME: z.string().min(1).default('defaultdb'),
  DB_USER: z.string().min(1).default('roach'),
  DB_SSL_ROOT_CERT: z.string().min(1).default('/certs/ca.crt'),
  DB_APPLICATION_NAME: z.string().min(1).default('$ using_jwt_token_postgresjs'),
  DB_CONNECT_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(10),
  TRANSFER_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  TRANSFER_AMOUNT: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: optionalLogLevel
});

export type RuntimeConfig = z.infer<typeof envSchema>;

export function loadRuntimeConfig(input: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  return envSchema.parse(input);
}
