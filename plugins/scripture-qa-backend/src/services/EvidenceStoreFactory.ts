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
 * Factory for creating evidence store implementations
 * Implements Factory Pattern for evidence store selection
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IEvidenceStore } from '../interfaces';
import { ConfigService } from './ConfigService';
import { InMemoryEvidenceStore } from './InMemoryEvidenceStore';
import { PgEvidenceStore } from './PgEvidenceStore';

/**
 * Factory class for creating evidence store instances
 * Follows Factory Pattern and Open/Closed Principle
 *
 * Usage:
 * ```typescript
 * const evidenceStore = await EvidenceStoreFactory.create(configService, logger);
 * ```
 */
export class EvidenceStoreFactory {
  /**
   * Create an evidence store based on configuration. A PostgreSQL store that
   * fails to initialize is replaced by the in-memory store.
   */
  static async create(config: ConfigService, logger: Logger): Promise<IEvidenceStore> {
    const storeType = config.getConfig().evidenceStore;

    logger.info(`Creating evidence store: ${storeType}`);

    switch (storeType) {
      case 'postgresql': {
        const store = new PgEvidenceStore(logger, config.getPostgresConfig());

        try {
          await store.initialize();
          logger.info('PostgreSQL evidence store initialized successfully');
          return store;
        } catch (error) {
          logger.error(`Failed to initialize PostgreSQL evidence store: ${error}`);
          logger.warn('Falling back to in-memory evidence store');
          await store.close();
          return new InMemoryEvidenceStore(logger);
        }
      }

      case 'memory':
      default: {
        logger.info('Using in-memory evidence store');
        return new InMemoryEvidenceStore(logger);
      }
    }
  }
}
