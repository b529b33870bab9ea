import dotenv from 'dotenv';
import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

const configSchema = z.object({
  dataDir: z.string().min(1).default('./data'),
  dbFileName: z.string().min(1).default('pos.db'),
  httpHost: z.string().min(1).default('127.0.0.1'),
  httpPort: z.coerce.number().int().min(0).max(65535).default(8080),
  storeName: z.string().min(1).default('POS'),
  adminPassword: z.string().min(1).default('admin'),
  bcryptRounds: z.coerce.number().int().min(4).max(15).default(10),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type RuntimeConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

/**
 * Loads `<POS_DATA_DIR>/config.env` when present, otherwise the `.env` in the
 * working directory. Variables already set in the process win.
 */
export function loadRuntimeEnv(env: Env = process.env): void {
  const dataDir = env.POS_DATA_DIR || './data';
  const runtimeEnvPath = path.join(dataDir, 'config.env');

  if (fs.existsSync(runtimeEnvPath)) {
    dotenv.config({ path: runtimeEnvPath });
    return;
  }

  dotenv.config();
}

export function loadRuntimeConfig(env: Env = process.env): RuntimeConfig {
  const result = configSchema.safeParse({
    dataDir: blankToUndefined(env.POS_DATA_DIR),
    dbFileName: blankToUndefined(env.POS_DB_FILE),
    httpHost: blankToUndefined(env.POS_HTTP_HOST),
    httpPort: blankToUndefined(env.POS_HTTP_PORT),
    storeName: blankToUndefined(env.POS_STORE_NAME),
    adminPassword: blankToUndefined(env.POS_ADMIN_PASSWORD),
    bcryptRounds: blankToUndefined(env.POS_BCRYPT_ROUNDS),
    logLevel: blankToUndefined(env.POS_LOG_LEVEL),
  });

  if (!result.success) {
    const keys = result.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new Error(`Invalid configuration: ${keys}`);
  }

  return result.data;
}

export function databasePath(config: RuntimeConfig): string {
  return path.resolve(config.dataDir, config.dbFileName);
}

function blankToUndefined(value: string | undefined): string | undefined {
  const trimmed = (value || '').trim();
  return trimmed ? trimmed : undefined;
}
