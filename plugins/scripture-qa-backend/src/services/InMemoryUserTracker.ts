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

import type { Logger } from 'winston';
import { IUserTracker } from '../interfaces';
import { TrackedUser } from '../models';

interface UserRecord {
  user: TrackedUser;
  firstSeen: Date;
  lastSeen: Date;
  messageCount: number;
}

/**
 * Start of the current UTC day
 */
export function startOfUtcDay(date: Date): Date {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

/**
 * Process-local usage accounting, lost on restart
 */
export class InMemoryUserTracker implements IUserTracker {
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly users: Map<string, UserRecord> = new Map();

  constructor(logger: Logger, now: () => Date = () => new Date()) {
    this.logger = logger;
    this.now = now;
  }

  async trackUser(user: TrackedUser): Promise<boolean> {
    const seenAt = this.now();
    const existing = this.users.get(user.id);

    if (existing) {
      existing.user = { ...user };
      existing.lastSeen = seenAt;
      this.logger.debug(`Updated user ${user.id}`);
    } else {
      this.users.set(user.id, { user: { ...user }, firstSeen: seenAt, lastSeen: seenAt, messageCount: 0 });
      this.logger.info(`Created new user ${user.id}`);
    }
    return true;
  }

  async incrementMessageCount(userId: string): Promise<boolean> {
    const record = this.users.get(userId);
    if (!record) {
      return false;
    }
    record.messageCount += 1;
    record.lastSeen = this.now();
    return true;
  }

  async getUserCount(): Promise<number> {
    return this.users.size;
  }

  async getActiveUsersToday(): Promise<number> {
    const since = startOfUtcDay(this.now()).getTime();
    let active = 0;
    for (const record of this.users.values()) {
      if (record.lastSeen.getTime() >= since) {
        active += 1;
      }
    }
    return active;
  }

  /**
   * Messages counted for a user, 0 when unknown
   */
  getMessageCount(userId: string): number {
    return this.users.get(userId)?.messageCount ?? 0;
  }
}
