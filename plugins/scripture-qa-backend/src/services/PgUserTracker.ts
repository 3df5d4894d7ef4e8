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

/**
 * PostgreSQL usage accounting
 *
 * @packageDocumentation
 */

import { Pool } from 'pg';
import type { Logger } from 'winston';
import { IUserTracker } from '../interfaces';
import { PostgresConfig, TrackedUser } from '../models';
import { createPool, verifyTable } from './postgres';

const UPSERT_USER = `
  INSERT INTO qa_users (external_id, username, first_name, last_name, first_seen, last_seen, message_count)
  VALUES ($1, $2, $3, $4, NOW(), NOW(), 0)
  ON CONFLICT (external_id)
  DO UPDATE SET
    username = EXCLUDED.username,
    first_name = EXCLUDED.first_name,
    last_name = EXCLUDED.last_name,
    last_seen = NOW()
`;

const INCREMENT_MESSAGE_COUNT = `
  UPDATE qa_users
  SET message_count = message_count + 1, last_seen = NOW()
  WHERE external_id = $1
`;

const COUNT_ACTIVE_TODAY = `
  SELECT COUNT(*) as count FROM qa_users
  WHERE last_seen >= date_trunc('day', NOW() AT TIME ZONE 'UTC') AT TIME ZONE 'UTC'
`;

/**
 * User tracker backed by the `qa_users` table
 *
 * Every operation reports failure as `false` or `0`; tracking must never
 * interrupt answering a question.
 */
export class PgUserTracker implements IUserTracker {
  private readonly logger: Logger;
  private readonly pool: Pool;
  private initialized: boolean = false;

  constructor(logger: Logger, config: PostgresConfig) {
    this.logger = logger;
    this.pool = createPool(config, logger);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await verifyTable(this.pool, 'qa_users', this.logger);
    this.initialized = true;
    this.logger.info('PgUserTracker initialized successfully');
  }

  async trackUser(user: TrackedUser): Promise<boolean> {
    if (!this.initialized) {
      this.logger.warn('User tracking unavailable, skipping');
      return false;
    }

    try {
      await this.pool.query(UPSERT_USER, [
        user.id,
        user.username ?? null,
        user.firstName ?? null,
        user.lastName ?? null,
      ]);
      this.logger.debug(`Tracked user ${user.id}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to track user ${user.id}: ${error}`);
      return false;
    }
  }

  async incrementMessageCount(userId: string): Promise<boolean> {
    if (!this.initialized) {
      return false;
    }

    try {
      const result = await this.pool.query(INCREMENT_MESSAGE_COUNT, [userId]);
      return (result.rowCount ?? 0) > 0;
    } catch (error) {
      this.logger.error(`Failed to increment message count for user ${userId}: ${error}`);
      return false;
    }
  }

  async getUserCount(): Promise<number> {
    return this.countRows('SELECT COUNT(*) as count FROM qa_users', 'user count');
  }

  async getActiveUsersToday(): Promise<number> {
    return this.countRows(COUNT_ACTIVE_TODAY, 'active users count');
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('PgUserTracker connection pool closed');
  }

  private async countRows(sql: string, label: string): Promise<number> {
    if (!this.initialized) {
      return 0;
    }

    try {
      const result = await this.pool.query<{ count: string }>(sql);
      return parseInt(result.rows[0]?.count ?? '0', 10);
    } catch (error) {
      this.logger.error(`Failed to get ${label}: ${error}`);
      return 0;
    }
  }
}
