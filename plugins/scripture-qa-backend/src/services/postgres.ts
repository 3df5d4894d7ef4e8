/*
 * Copyright (C) 2025-2026 flickleafy
 *
 * This program is free software: you can redistribute it and/or modify
 * it under the terms of the GNU General Public License as published by
 * the Free Software Foundation, either version 3 of the License, or
 * (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE. See the
 * GNU General Public License for more details.
 *
 * You should have received a copy of the GNU General Public License
 * along with this program. If not, see <https://www.gnu.org/licenses/>.
 */

import { Pool } from 'pg';
import type { Logger } from 'winston';
import { PostgresConfig } from '../models';

/**
 * Create a connection pool for the configured PostgreSQL server
 */
export function createPool(config: PostgresConfig, logger: Logger): Pool {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
    max: config.maxConnections || 10,
    idleTimeoutMillis: config.idleTimeoutMillis || 30000,
    connectionTimeoutMillis: config.connectionTimeoutMillis || 5000,
  });

  pool.on('error', err => {
    logger.error(`Unexpected PostgreSQL pool error: ${err}`);
  });

  return pool;
}

/**
 * Check that the connection works and a migrated table exists
 */
export async function verifyTable(pool: Pool, table: string, logger: Logger): Promise<void> {
  const client = await pool.connect();
  try {
    const now = await client.query<{ now: Date }>('SELECT NOW() as now');
    logger.debug(`Database connection successful: ${now.rows[0]?.now}`);

    const result = await client.query<{ exists: boolean }>(
      'SELECT EXISTS(SELECT 1 FROM information_schema.tables WHERE table_name = $1) as exists',
      [table]
    );

    if (!result.rows[0]?.exists) {
      throw new Error(`${table} table not found. Run migrations first.`);
    }

    logger.debug(`Table ${table} verified`);
  } finally {
    client.release();
  }
}
