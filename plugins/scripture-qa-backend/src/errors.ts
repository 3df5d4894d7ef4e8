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
 * Error types raised by the collaborators of the answering pipeline
 *
 * @packageDocumentation
 */

/**
 * The language model could not be reached or returned an unusable response
 */
export class OracleUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OracleUnavailableError';
  }
}

/**
 * The evidence store failed to answer a search
 */
export class EvidenceStoreUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EvidenceStoreUnavailableError';
  }
}

/**
 * The overall request deadline passed before an answer was produced
 */
export class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Question was not answered within ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
