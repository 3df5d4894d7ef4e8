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

import { afterAll, afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import { RAGService } from './RAGService';
import { InMemoryEvidenceStore } from './InMemoryEvidenceStore';
import type { IRAGStrategy, RAGContext } from '../rag/types';
import { RAGStrategyFactory } from '../rag';
import { FAILURE_ANSWERS, UNFORMATTED_ANSWER_FALLBACK } from '../rag/answers';
import { OracleUnavailableError } from '../errors';
import type { ICorpusLoader, IEvidenceStore, ILLMService } from '../interfaces';
import { createMockLogger } from '../__fixtures__/logger';
import { createConfigService, createDocument, createTestConfig } from '../__fixtures__/config';

describe('RAGService', () => {
  const strategyFactorySpy = jest.spyOn(RAGStrategyFactory, 'create');
  const mockStrategy = (): jest.Mocked<IRAGStrategy> => ({
    name: 'mock',
    retrieve: jest.fn<IRAGStrategy['retrieve']>(async () => []),
    answer: jest.fn<IRAGStrategy['answer']>(async () => ({
      answer: 'ok',
      sources: [],
      model: 'test-model',
    })),
  });

  let strategy: jest.Mocked<IRAGStrategy>;
  let evidenceStore: jest.Mocked<IEvidenceStore>;
  let corpusLoader: jest.Mocked<ICorpusLoader>;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    strategy = mockStrategy();
    strategyFactorySpy.mockReturnValue(strategy);
    evidenceStore = {
      replaceAll: jest.fn<IEvidenceStore['replaceAll']>(async () => undefined),
      search: jest.fn<IEvidenceStore['search']>(async () => []),
      count: jest.fn<IEvidenceStore['count']>(async () => 0),
    };
    corpusLoader = {
      load: jest.fn<ICorpusLoader['load']>(async () => [createDocument('1:1'), createDocument('1:2')]),
    };
    logger = createMockLogger();
  });

  afterEach(() => {
    strategyFactorySpy.mockReset();
  });

  afterAll(() => {
    strategyFactorySpy.mockRestore();
  });

  const buildService = (requestTimeoutMs = 60000) => {
    const llmService: ILLMService = {
      chat: async () => 'ok',
      healthCheck: async () => true,
    };
    const base = createTestConfig();

    return new RAGService({
      logger,
      config: createConfigService({ ...base, rag: { ...base.rag, requestTimeoutMs } }),
      llmService,
      evidenceStore,
      corpusLoader,
    });
  };

  describe('answerQuestion', () => {
    it('delegates to the configured strategy with the default model', async () => {
      const service = buildService();

      const response = await service.answerQuestion('What is patience?', { maxIterations: 2 });

      expect(response).toEqual({ answer: 'ok', sources: [], model: 'test-model' });
      expect(strategy.answer).toHaveBeenCalledWith(
        expect.objectContaining({ query: 'What is patience?', model: 'test-model', maxIterations: 2 })
      );
    });

    it('replaces an empty answer with the fallback text', async () => {
      strategy.answer.mockResolvedValueOnce({ answer: '   ', sources: [] });
      const service = buildService();

      const response = await service.answerQuestion('Question');

      expect(response.answer).toBe(UNFORMATTED_ANSWER_FALLBACK);
    });

    it('answers with the technical difficulties apology when the LLM is unavailable', async () => {
      strategy.answer.mockRejectedValueOnce(new OracleUnavailableError('Chat completion failed: quota'));
      const service = buildService();

      const response = await service.answerQuestion('Question');

      expect(response).toEqual({
        answer: FAILURE_ANSWERS.oracle_unavailable,
        sources: [],
        model: 'test-model',
        failure: 'oracle_unavailable',
      });
    });

    it('answers with the general apology on unexpected errors', async () => {
      strategy.answer.mockRejectedValueOnce(new Error('boom'));
      const service = buildService();

      const response = await service.answerQuestion('Question');

      expect(response.answer).toBe(FAILURE_ANSWERS.internal_error);
      expect(response.failure).toBe('internal_error');
      expect(logger.error).toHaveBeenCalledWith('Answering question failed (internal_error): Error: boom');
    });

    it('aborts the strategy and apologizes when the deadline passes', async () => {
      let received: RAGContext | undefined;
      strategy.answer.mockImplementationOnce(context => {
        received = context;
        return new Promise<never>(() => undefined);
      });
      const service = buildService(20);

      const response = await service.answerQuestion('Question');

      expect(response.answer).toBe(FAILURE_ANSWERS.timeout);
      expect(response.failure).toBe('timeout');
      expect(received?.signal?.aborted).toBe(true);
    });

    it('returns the answer text from ask', async () => {
      strategy.answer.mockResolvedValueOnce({ answer: 'Be patient.', sources: [] });
      const service = buildService();

      await expect(service.ask('Question')).resolves.toBe('Be patient.');
    });
  });

  describe('indexing', () => {
    it('replaces the evidence store contents with the loaded corpus', async () => {
      evidenceStore.count.mockResolvedValue(2);
      const service = buildService();

      await service.indexAllDocuments();

      expect(evidenceStore.replaceAll).toHaveBeenCalledWith([createDocument('1:1'), createDocument('1:2')]);
      const status = await service.getIndexingStatus();
      expect(status.inProgress).toBe(false);
      expect(status.documentCount).toBe(2);
      expect(status.lastIndexTime).toBeInstanceOf(Date);
    });

    it('skips indexing while another run is in progress', async () => {
      const service = buildService();

      await Promise.all([service.indexAllDocuments(), service.indexAllDocuments()]);

      expect(corpusLoader.load).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith('Indexing already in progress, skipping');
    });

    it('propagates loader failures and resets the progress flag', async () => {
      corpusLoader.load.mockRejectedValueOnce(new Error('missing corpus'));
      const service = buildService();

      await expect(service.indexAllDocuments()).rejects.toThrow('missing corpus');

      const status = await service.getIndexingStatus();
      expect(status.inProgress).toBe(false);
      expect(status.lastIndexTime).toBeNull();
      expect(evidenceStore.replaceAll).not.toHaveBeenCalled();
    });

    it('keeps the previous documents searchable when a reindex fails', async () => {
      const store = new InMemoryEvidenceStore(logger);
      await store.replaceAll([createDocument('0:1')]);
      jest.spyOn(store, 'replaceAll').mockRejectedValueOnce(new Error('disk full'));
      const service = new RAGService({
        logger,
        config: createConfigService(),
        llmService: { chat: async () => 'ok', healthCheck: async () => true },
        evidenceStore: store,
        corpusLoader,
      });

      await expect(service.indexAllDocuments()).rejects.toThrow('disk full');

      await expect(store.count()).resolves.toBe(1);
      await expect(service.getIndexingStatus()).resolves.toEqual({
        inProgress: false,
        lastIndexTime: null,
        documentCount: 1,
      });
    });
  });

  it('retrieves context through the strategy', async () => {
    strategy.retrieve.mockResolvedValueOnce([createDocument('2:7')]);
    const service = buildService();

    await expect(service.retrieveContext('dawn', 4)).resolves.toEqual([createDocument('2:7')]);
    expect(strategy.retrieve).toHaveBeenCalledWith({ query: 'dawn', limit: 4 });
  });
});
