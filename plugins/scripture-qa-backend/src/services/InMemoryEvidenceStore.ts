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
 * In-memory lexical evidence store
 * Provides keyword search over the corpus with TF-IDF scoring
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import { IEvidenceStore } from '../interfaces';
import { ScriptureDocument, SearchResult } from '../models';

export type SearchableField = 'text' | 'commentary' | 'chapterName';

const SEARCHABLE_FIELDS: readonly SearchableField[] = ['text', 'commentary', 'chapterName'];

export const DEFAULT_FIELD_BOOSTS: Record<SearchableField, number> = {
  text: 1,
  commentary: 0.5,
  chapterName: 1.5,
};

interface IndexedDocument {
  document: ScriptureDocument;
  termFrequencies: Record<SearchableField, Map<string, number>>;
  lengths: Record<SearchableField, number>;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

function countTerms(tokens: string[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of tokens) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

function emptyFrequencies(): Record<SearchableField, Map<string, number>> {
  return { text: new Map(), commentary: new Map(), chapterName: new Map() };
}

function updateDocumentFrequency(
  documentFrequency: Record<SearchableField, Map<string, number>>,
  entry: IndexedDocument,
  delta: 1 | -1
): void {
  for (const field of SEARCHABLE_FIELDS) {
    const frequencies = documentFrequency[field];
    for (const term of entry.termFrequencies[field].keys()) {
      const next = (frequencies.get(term) ?? 0) + delta;
      if (next > 0) {
        frequencies.set(term, next);
      } else {
        frequencies.delete(term);
      }
    }
  }
}

/**
 * In-memory evidence store using per-field TF-IDF
 * Follows Single Responsibility Principle
 *
 * Note: the index lives in process memory and is rebuilt on every start;
 * use the PostgreSQL store to share one index between instances.
 */
export class InMemoryEvidenceStore implements IEvidenceStore {
  private readonly logger: Logger;
  private readonly boosts: Record<SearchableField, number>;
  private documents: Map<string, IndexedDocument> = new Map();
  private documentFrequency = emptyFrequencies();

  constructor(logger: Logger, boosts: Record<SearchableField, number> = DEFAULT_FIELD_BOOSTS) {
    this.logger = logger;
    this.boosts = boosts;
  }

  /**
   * Builds the new index aside and swaps it in; searches never see a partial index.
   */
  async replaceAll(documents: ScriptureDocument[]): Promise<void> {
    const entries = new Map<string, IndexedDocument>();
    const documentFrequency = emptyFrequencies();

    for (const document of documents) {
      const existing = entries.get(document.id);
      if (existing) {
        updateDocumentFrequency(documentFrequency, existing, -1);
      }

      const entry = this.analyze(document);
      entries.set(document.id, entry);
      updateDocumentFrequency(documentFrequency, entry, 1);
    }

    const previous = this.documents.size;
    this.documents = entries;
    this.documentFrequency = documentFrequency;
    this.logger.info(`Replaced ${previous} documents with ${entries.size} documents`);
  }

  async search(query: string, limit: number): Promise<SearchResult[]> {
    const terms = Array.from(new Set(tokenize(query)));
    if (terms.length === 0 || limit <= 0) {
      return [];
    }

    const total = this.documents.size;
    const results: SearchResult[] = [];

    for (const entry of this.documents.values()) {
      let score = 0;
      for (const field of SEARCHABLE_FIELDS) {
        const length = entry.lengths[field];
        if (length === 0) {
          continue;
        }
        let fieldScore = 0;
        for (const term of terms) {
          const frequency = entry.termFrequencies[field].get(term);
          if (!frequency) {
            continue;
          }
          const documentFrequency = this.documentFrequency[field].get(term) ?? 1;
          fieldScore += (frequency / Math.sqrt(length)) * Math.log(1 + total / documentFrequency);
        }
        score += this.boosts[field] * fieldScore;
      }

      if (score > 0) {
        results.push({ document: entry.document, score });
      }
    }

    // Array.prototype.sort is stable: ties keep index order
    results.sort((a, b) => b.score - a.score);
    const topResults = results.slice(0, limit);

    this.logger.debug(`Found ${topResults.length} results for query "${query}"`);
    return topResults;
  }

  async count(): Promise<number> {
    return this.documents.size;
  }

  private analyze(document: ScriptureDocument): IndexedDocument {
    const termFrequencies = emptyFrequencies();
    const lengths: Record<SearchableField, number> = { text: 0, commentary: 0, chapterName: 0 };

    for (const field of SEARCHABLE_FIELDS) {
      const tokens = tokenize(document[field]);
      termFrequencies[field] = countTerms(tokens);
      lengths[field] = tokens.length;
    }

    return { document, termFrequencies, lengths };
  }
}
