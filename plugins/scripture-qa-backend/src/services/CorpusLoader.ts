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
 * Loads the annotated scripture corpus from a JSON file
 *
 * @packageDocumentation
 */

import { promises as fs } from 'fs';
import path from 'path';
import type { Logger } from 'winston';
import { z } from 'zod';
import { ICorpusLoader, ServiceDependencies } from '../interfaces';
import { ScriptureDocument } from '../models';
import { errorMessage } from '../errors';

/**
 * One verse record as stored in the corpus file
 */
export const CorpusRecordSchema = z.object({
  surah_number: z.coerce.number().int().positive(),
  surah_name: z.string(),
  surah_translation: z.string().default(''),
  ayah_number: z.coerce.number().int().positive(),
  reference: z.string().min(1),
  text: z.string(),
  language: z.string().default('en'),
  tafsir_text: z.string().default(''),
  tafsir_source: z.string().default(''),
});

export type CorpusRecord = z.infer<typeof CorpusRecordSchema>;

export function toScriptureDocument(record: CorpusRecord): ScriptureDocument {
  return {
    id: `${record.surah_number}:${record.ayah_number}`,
    reference: record.reference,
    text: record.text,
    commentary: record.tafsir_text,
    commentarySource: record.tafsir_source,
    chapterNumber: record.surah_number,
    chapterName: record.surah_name,
    chapterTranslation: record.surah_translation,
    verseNumber: record.ayah_number,
    language: record.language,
  };
}

/**
 * Reads the corpus file named by `scriptureQa.corpus.path`.
 * Records that do not match the expected shape are skipped with a warning.
 */
export class CorpusLoader implements ICorpusLoader {
  private readonly logger: Logger;
  private readonly corpusPath: string;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    this.corpusPath = path.resolve(dependencies.config.getConfig().corpus.path);
  }

  async load(): Promise<ScriptureDocument[]> {
    this.logger.info(`Loading corpus from ${this.corpusPath}`);

    let data: unknown;
    try {
      data = JSON.parse(await fs.readFile(this.corpusPath, 'utf8'));
    } catch (error) {
      this.logger.error(`Failed to read corpus: ${error}`);
      throw new Error(`Failed to load corpus from ${this.corpusPath}: ${errorMessage(error)}`);
    }

    if (!Array.isArray(data)) {
      throw new Error(`Corpus file ${this.corpusPath} must contain a JSON array`);
    }

    const documents: ScriptureDocument[] = [];
    data.forEach((entry: unknown, position) => {
      const parsed = CorpusRecordSchema.safeParse(entry);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        this.logger.warn(`Skipping corpus record ${position}: ${issues.join('; ')}`);
        return;
      }
      documents.push(toScriptureDocument(parsed.data));
    });

    this.logger.info(`Loaded ${documents.length} of ${data.length} corpus records`);
    return documents;
  }
}
