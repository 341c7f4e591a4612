import { z } from 'zod';
import { ConfigError } from './ledger/errors';

export interface AppConfig {
  databaseUrl: string;
  port: number;
  host: string;
  logLevel: string;
  genesisFile: string;
  poolCapacity: number;
}

const envSchema = z.object({
  DATABASE_URL: z.string({ required_error: 'DATABASE_URL is required' }).min(1, 'DATABASE_URL is required'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  GENESIS_FILE: z.string().default('config/genesis.json'),
  POOL_CAPACITY: z.coerce.number().int().positive().default(1024),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`);
  }

  const vars = parsed.data;
  return {
    databaseUrl: vars.DATABASE_URL,
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    genesisFile: vars.GENESIS_FILE,
    poolCapacity: vars.POOL_CAPACITY,
  };
}
