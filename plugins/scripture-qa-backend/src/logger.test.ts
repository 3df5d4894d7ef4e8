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

import { describe, expect, it } from '@jest/globals';
import { Writable } from 'stream';
import winston from 'winston';
import { createRootLogger, createServiceLogger } from './logger';

describe('logger', () => {
  const capture = (level: string) => {
    const lines: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString());
        callback();
      },
    });
    const transport = new winston.transports.Stream({ stream });
    const root = createRootLogger(level);
    root.clear();
    root.add(transport);
    const logged = new Promise<void>(resolve => transport.once('logged', () => resolve()));
    return { root, lines, logged };
  };

  it('names the default service on root log lines', async () => {
    const { root, lines, logged } = capture('info');

    root.info('starting');
    await logged;

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\S+ - scripture-qa - INFO - starting\n$/);
  });

  it('tags service logger lines with the service name', async () => {
    const { root, lines, logged } = capture('info');

    createServiceLogger(root, 'scripture-qa-backend').warn('ready');
    await logged;

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\S+ - scripture-qa-backend - WARN - ready\n$/);
  });
});
