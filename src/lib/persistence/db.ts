import pg from 'pg';
import type { AppEnv } from '../env';
import { describeError, jsonLogger } from '../ingest/logger';
import type { IngestLogger } from '../ingest/types';

const { Pool } = pg;

let pool: pg.Pool | null = null;

type SslMode = AppEnv['DATABASE_SSLMODE'];

export function getSslConfig(dbUrl: string, sslModeEnv?: SslMode): pg.PoolConfig['ssl'] | undefined {
  let sslMode: string = sslModeEnv ?? '';

  try {
    const url = new URL(dbUrl);
    sslMode = sslMode || url.searchParams.get('sslmode') || '';
  } catch {
    // Malformed URLs are rejected by env validation; fall back to env here.
  }

  if (!sslMode) return undefined;
  if (sslMode === 'disable') return false;
  if (sslMode === 'verify-full') return { rejectUnauthorized: true };
  return { rejectUnauthorized: false };
}

export function getPool(
  env: Pick<AppEnv, 'DATABASE_URL' | 'DATABASE_SSLMODE'>,
  logger: IngestLogger = jsonLogger,
): pg.Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: env.DATABASE_URL,
      ssl: getSslConfig(env.DATABASE_URL, env.DATABASE_SSLMODE),
    });
    // Idle clients that lose their connection emit here; queries surface it later.
    pool.on('error', (error) => {
      logger.error('db.pool.error', { code: 'DB_POOL_ERROR', ...describeError(error) });
    });
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) {
    return;
  }
  const current = pool;
  pool = null;
  await current.end();
}
