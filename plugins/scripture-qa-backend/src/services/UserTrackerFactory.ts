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
import { ConfigService } from './ConfigService';
import { InMemoryUserTracker } from './InMemoryUserTracker';
import { PgUserTracker } from './PgUserTracker';

/**
 * Factory class for creating the configured user tracker
 */
export class UserTrackerFactory {
  static async create(config: ConfigService, logger: Logger): Promise<IUserTracker> {
    const trackerType = config.getConfig().userTracking;

    logger.info(`Creating user tracker: ${trackerType}`);

    switch (trackerType) {
      case 'postgresql': {
        const tracker = new PgUserTracker(logger, config.getPostgresConfig());

        try {
          await tracker.initialize();
          return tracker;
        } catch (error) {
          logger.error(`Failed to initialize PostgreSQL user tracker: ${error}`);
          logger.warn('Falling back to in-memory user tracking');
          await tracker.close();
          return new InMemoryUserTracker(logger);
        }
      }

      case 'memory':
      default:
        return new InMemoryUserTracker(logger);
    }
  }
}
