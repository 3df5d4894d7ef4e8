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
import { LLMServiceFactory } from './LLMServiceFactory';
import { OllamaLLMService } from './OllamaLLMService';
import { OpenAILLMService } from './OpenAILLMService';
import { createMockLogger } from '../__fixtures__/logger';
import { createConfigService, createTestConfig } from '../__fixtures__/config';

describe('LLMServiceFactory', () => {
  const configFor = (provider: 'ollama' | 'openai') => {
    const base = createTestConfig();
    return createConfigService({ ...base, llm: { ...base.llm, provider } });
  };

  it('creates the Ollama client for the ollama provider', () => {
    const logger = createMockLogger();

    const service = LLMServiceFactory.create({ logger, config: configFor('ollama') });

    expect(service).toBeInstanceOf(OllamaLLMService);
    expect(logger.info).toHaveBeenCalledWith('Creating LLM service: ollama');
  });

  it('creates the OpenAI-compatible client for the openai provider', () => {
    const service = LLMServiceFactory.create({
      logger: createMockLogger(),
      config: configFor('openai'),
    });

    expect(service).toBeInstanceOf(OpenAILLMService);
  });
});
