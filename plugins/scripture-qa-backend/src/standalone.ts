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
 * Standalone HTTP server
 *
 * @packageDocumentation
 */

import 'dotenv/config';
import express from 'express';
import { createRouter } from './router';
import { loadAppConfig } from './config';
import { createRootLogger, createServiceLogger } from './logger';
import type { Logger } from 'winston';

const API_BASE_PATH = '/api/scripture-qa';

async function main(logger: Logger): Promise<void> {
  const config = loadAppConfig({ configPath: process.env.APP_CONFIG_PATH });
  const port = config.getOptionalNumber('backend.listen.port') ?? 7007;

  const app = express();
  app.use(
    API_BASE_PATH,
    await createRouter({ logger: createServiceLogger(logger, 'scripture-qa-backend'), config })
  );

  app.listen(port, () => {
    logger.info(`Scripture Q&A backend listening on port ${port}, serving ${API_BASE_PATH}`);
  });
}

const rootLogger = createRootLogger();

main(rootLogger).catch(error => {
  rootLogger.error(`Failed to start server: ${error}`);
  process.exit(1);
});
