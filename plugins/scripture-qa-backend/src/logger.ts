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

import winston, { Logger } from 'winston';

/**
 * Root logger for the standalone server. Services receive child loggers from
 * {@link createServiceLogger}.
 */
export function createRootLogger(level: string = process.env.LOG_LEVEL || 'info'): Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.printf(
        ({ timestamp, level: entryLevel, message, service }) =>
          `${timestamp} - ${service ?? 'scripture-qa'} - ${entryLevel.toUpperCase()} - ${message}`
      )
    ),
    transports: [new winston.transports.Console()],
  });
}

/**
 * Child logger whose lines carry `service` in place of the default name.
 */
export function createServiceLogger(root: Logger, service: string): Logger {
  return root.child({ service });
}
