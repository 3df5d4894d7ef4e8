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

import type { IConfigService } from '../interfaces';
import type { ScriptureDocument, ScriptureQaConfig } from '../models';

export const createTestConfig = (
  overrides: Partial<ScriptureQaConfig> = {}
): ScriptureQaConfig => ({
  llm: {
    provider: 'ollama',
    defaultModel: 'test-model',
    ollamaBaseUrl: 'http://localhost:11434',
    openai: { baseUrl: 'http://localhost:8080/v1', apiKey: 'test-secret' },
  },
  rag: {
    strategy: 'agentic',
    maxIterations: 5,
    searchResultLimit: 3,
    forceFinalAnswer: false,
    requestTimeoutMs: 60000,
  },
  corpus: { path: 'data/corpus.json', indexOnStartup: false },
  evidenceStore: 'memory',
  userTracking: 'memory',
  ...overrides,
});

export const createConfigService = (config: ScriptureQaConfig = createTestConfig()): IConfigService => ({
  getConfig: () => config,
});

export const createDocument = (
  id: string,
  overrides: Partial<ScriptureDocument> = {}
): ScriptureDocument => ({
  id,
  reference: `Chapter ${id}`,
  text: `Text of ${id}`,
  commentary: `Commentary on ${id}`,
  commentarySource: 'Test Commentary',
  chapterNumber: 1,
  chapterName: 'Opening',
  chapterTranslation: 'The Opening',
  verseNumber: 1,
  language: 'en',
  ...overrides,
});
