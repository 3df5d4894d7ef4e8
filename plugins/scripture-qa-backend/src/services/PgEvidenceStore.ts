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
 * PostgreSQL evidence store implementation using full-text search
 * Provides persistent document storage and keyword search
 *
 * @packageDocumentation
 */

import { Pool } from 'pg';
import type { Logger } from 'winston';
import { IEvidenceStore } from '../interfaces';
import { PostgresConfig, ScriptureDocument, SearchResult } from '../models';
import { EvidenceStoreUnavailableError, errorMessage } from '../errors';
import { createPool, verifyTable } from './postgres';

interface DocumentRow {
  id: string;
  reference: string;
  text: string;
  commentary: string;
  commentary_source: string;
  chapter_number: number;
  chapter_name: string;
  chapter_translation: string;
  verse_number: number;
  language: string;
  score: number | string;
}

const UPSERT_DOCUMENT = `
  INSERT INTO scripture_documents (
    id, reference, text, commentary, commentary_source,
    chapter_number, chapter_name, chapter_translation, verse_number, language
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
  ON CONFLICT (id)
  DO UPDATE SET
    reference = EXCLUDED.reference,
    text = EXCLUDED.text,
    commentary = EXCLUDED.commentary,
    commentary_source = EXCLUDED.commentary_source,
    chapter_number = EXCLUDED.chapter_number,
    chapter_name = EXCLUDED.chapter_name,
    chapter_translation = EXCLUDED.chapter_translation,
    verse_number = EXCLUDED.verse_number,
    language = EXCLUDED.language,
    updated_at = CURRENT_TIMESTAMP
`;

const SEARCH_DOCUMENTS = `
  SELECT
    id, reference, text, commentary, commentary_source,
    chapter_number, chapter_name, chapter_translation, verse_number, language,
    ts_rank(search_vector, plainto_tsquery('english', $1)) AS score
  FROM scripture_documents
  WHERE search_vector @@ plainto_tsquery('english', $1)
  ORDER BY score DESC, id
  LIMIT $2
`;

/**
 * PostgreSQL evidence store using a generated tsvector column
 * Follows Single Responsibility Principle
 *
 * Features:
 * - Persistent document storage shared by every instance
 * - GIN index over text and commentary for keyword search
 * - Corpus replacement in a single transaction
 */
export class PgEvidenceStore implements IEvidenceStore {
  private readonly logger: Logger;
  private readonly pool: Pool;
  private initialized: boolean = false;

  constructor(logger: Logger, config: PostgresConfig) {
    this.logger = logger;
    this.pool = createPool(config, logger);
  }

  /**
   * Verify the connection and schema. Must be called before use.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      this.logger.debug('PgEvidenceStore already initialized');
      return;
    }

    try {
      this.logger.info('Initializing PgEvidenceStore...');
      await verifyTable(this.pool, 'scripture_documents', this.logger);
      this.initialized = true;
      this.logger.info('PgEvidenceStore initialized successfully');
    } catch (error) {
      this.logger.error(`Failed to initialize PgEvidenceStore: ${error}`);
      throw new Error(`PgEvidenceStore initialization failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Replace the stored corpus in one transaction. On failure the previous
   * rows stay in place.
   */
  async replaceAll(documents: ScriptureDocument[]): Promise<void> {
    this.ensureInitialized();

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      const deleted = await client.query('DELETE FROM scripture_documents');
      for (const document of documents) {
        await client.query(UPSERT_DOCUMENT, [
          document.id,
          document.reference,
          document.text,
          document.commentary,
          document.commentarySource,
          document.chapterNumber,
          document.chapterName,
          document.chapterTranslation,
          document.verseNumber,
          document.language,
        ]);
      }

      await client.query('COMMIT');
      this.logger.info(
        `Replaced ${deleted.rowCount ?? 0} documents with ${documents.length} documents`
      );
    } catch (error) {
      await client.query('ROLLBACK');
      this.logger.error(`Failed to replace documents: ${error}`);
      throw error;
    } finally {
      client.release();
    }
  }

  async search(query: string, limit: number): Promise<SearchResult[]> {
    this.ensureInitialized();

    if (query.trim().length === 0 || limit <= 0) {
      return [];
    }

    try {
      const result = await this.pool.query<DocumentRow>(SEARCH_DOCUMENTS, [query, limit]);
      const results = result.rows.map(row => ({
        document: this.toDocument(row),
        score: Number(row.score),
      }));

      this.logger.debug(`Found ${results.length} results for query "${query}"`);
      return results;
    } catch (error) {
      this.logger.error(`Failed to search documents: ${error}`);
      throw new EvidenceStoreUnavailableError(`Evidence search failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async count(): Promise<number> {
    this.ensureInitialized();

    const result = await this.pool.query<{ count: string }>(
      'SELECT COUNT(*) as count FROM scripture_documents'
    );
    return parseInt(result.rows[0]?.count ?? '0', 10);
  }

  /**
   * Close the connection pool
   * Should be called on application shutdown
   */
  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('PgEvidenceStore connection pool closed');
  }

  private toDocument(row: DocumentRow): ScriptureDocument {
    return {
      id: row.id,
      reference: row.reference,
      text: row.text,
      commentary: row.commentary,
      commentarySource: row.commentary_source,
      chapterNumber: row.chapter_number,
      chapterName: row.chapter_name,
      chapterTranslation: row.chapter_translation,
      verseNumber: row.verse_number,
      language: row.language,
    };
  }

  private ensureInitialized(): void {
    if (!this.initialized) {
      throw new Error('PgEvidenceStore not initialized. Call initialize() first.');
    }
  }
}
