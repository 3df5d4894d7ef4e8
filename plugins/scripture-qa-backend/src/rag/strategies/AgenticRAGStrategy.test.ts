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

import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { AgenticRAGStrategy, normalizeQuery } from './AgenticRAGStrategy';
import type { IEvidenceStore, ILLMService } from '../../interfaces';
import type { ScriptureQaConfig } from '../../models';
import { CONTEXT_ANSWER_FALLBACK, UNFORMATTED_ANSWER_FALLBACK } from '../answers';
import { FINAL_ITERATION_INSTRUCTION } from '../prompts';
import { EvidenceStoreUnavailableError, OracleUnavailableError } from '../../errors';
import { createMockLogger } from '../../__fixtures__/logger';
import { createConfigService, createDocument, createTestConfig } from '../../__fixtures__/config';

const SEARCH = (...keywords: string[]) => JSON.stringify({ action: 'SEARCH', reasoning: 'look it up', keywords });
const ANSWER = (answer: string) => JSON.stringify({ action: 'ANSWER', answer });
const ANSWER_CONTEXT = (answer: string) => JSON.stringify({ action: 'ANSWER_CONTEXT', answer });

describe('AgenticRAGStrategy', () => {
  let llmService: jest.Mocked<ILLMService>;
  let evidenceStore: jest.Mocked<IEvidenceStore>;
  let logger: ReturnType<typeof createMockLogger>;

  const buildStrategy = (config: ScriptureQaConfig = createTestConfig()) =>
    new AgenticRAGStrategy({
      logger,
      config: createConfigService(config),
      llmService,
      evidenceStore,
    });

  const scriptOracle = (...responses: string[]) => {
    for (const response of responses) {
      llmService.chat.mockResolvedValueOnce(response);
    }
  };

  const promptAt = (call: number): string => llmService.chat.mock.calls[call][0][0].content;

  const contextSize = (prompt: string): number => prompt.split('commentary_source:').length - 1;

  beforeEach(() => {
    logger = createMockLogger();
    llmService = {
      chat: jest.fn<ILLMService['chat']>().mockResolvedValue(SEARCH('unscripted')),
      healthCheck: jest.fn<ILLMService['healthCheck']>().mockResolvedValue(true),
    };
    evidenceStore = {
      replaceAll: jest.fn<IEvidenceStore['replaceAll']>(),
      count: jest.fn<IEvidenceStore['count']>().mockResolvedValue(0),
      search: jest
        .fn<IEvidenceStore['search']>()
        .mockImplementation(async query => [{ document: createDocument(query), score: 1 }]),
    };
  });

  describe('scenarios', () => {
    it('answers directly from knowledge in a single call', async () => {
      scriptOracle(ANSWER('X'));

      const result = await buildStrategy().answer({ query: 'Question', maxIterations: 1 });

      expect(result.answer).toBe('X');
      expect(llmService.chat).toHaveBeenCalledTimes(1);
      expect(evidenceStore.search).not.toHaveBeenCalled();
    });

    it('searches once and answers from context', async () => {
      scriptOracle(SEARCH('patience'), ANSWER_CONTEXT('Y'));

      const result = await buildStrategy().answer({ query: 'Question', maxIterations: 2 });

      expect(result.answer).toBe('Y');
      expect(llmService.chat).toHaveBeenCalledTimes(2);
      expect(evidenceStore.search).toHaveBeenCalledTimes(1);
      expect(evidenceStore.search).toHaveBeenCalledWith('patience', 3);
      expect(result.sources).toEqual([createDocument('patience')]);
      expect(result.searchQueries).toEqual(['patience']);
    });

    it('stops on the budget when every decision is a search', async () => {
      scriptOracle(SEARCH('patience'), SEARCH('perseverance'));

      const strategy = buildStrategy();
      const result = await strategy.answer({ query: 'Question', maxIterations: 2 });

      expect(llmService.chat).toHaveBeenCalledTimes(2);
      expect(result.answer).toBe(UNFORMATTED_ANSWER_FALLBACK);
      expect(result.action).toEqual({ action: 'SEARCH', reasoning: 'look it up', keywords: ['perseverance'] });
      expect(result.iterations).toBe(2);
    });
  });

  describe('agenticSearch', () => {
    const options = { model: 'test-model', limit: 3, forceFinalAnswer: false };

    it.each([1, 2, 3, 5])('terminates within %i oracle calls', async maxIterations => {
      const outcome = await buildStrategy().agenticSearch('Question', { ...options, maxIterations });

      expect(llmService.chat).toHaveBeenCalledTimes(maxIterations);
      expect(outcome.oracleCalls).toBe(maxIterations);
      expect(outcome.reason).toBe('budget_exhausted');
    });

    it('treats a budget below one as a single iteration', async () => {
      await buildStrategy().agenticSearch('Question', { ...options, maxIterations: 0 });

      expect(llmService.chat).toHaveBeenCalledTimes(1);
    });

    it('only ever grows the accumulated evidence', async () => {
      scriptOracle(SEARCH('a'), SEARCH('b', 'c'), SEARCH(), ANSWER_CONTEXT('done'));

      const outcome = await buildStrategy().agenticSearch('Question', { ...options, maxIterations: 5 });

      const sizes = [0, 1, 2, 3].map(call => contextSize(promptAt(call)));
      expect(sizes).toEqual([0, 1, 3, 3]);
      expect(outcome.evidence.map(document => document.id)).toEqual(['a', 'b', 'c']);
    });

    it('records a repeated keyword once but searches it every time', async () => {
      scriptOracle(SEARCH('patience'), SEARCH('patience'), ANSWER('done'));

      const outcome = await buildStrategy().agenticSearch('Question', { ...options, maxIterations: 3 });

      expect(outcome.issuedQueries).toEqual(['patience']);
      expect(evidenceStore.search).toHaveBeenCalledTimes(2);
      expect(promptAt(2)).toContain('<SEARCH_QUERIES>\npatience\n</SEARCH_QUERIES>');
      expect(outcome.evidence).toHaveLength(2);
    });

    it('searches duplicate keywords of one decision in order', async () => {
      scriptOracle(SEARCH('mercy', 'mercy', 'justice'), ANSWER('done'));

      const outcome = await buildStrategy().agenticSearch('Question', { ...options, maxIterations: 2 });

      expect(evidenceStore.search.mock.calls.map(call => call[0])).toEqual(['mercy', 'mercy', 'justice']);
      expect(outcome.evidence.map(document => document.id)).toEqual(['mercy', 'mercy', 'justice']);
      expect(outcome.issuedQueries).toEqual(['mercy', 'justice']);
    });

    it('shows previous actions to the oracle', async () => {
      scriptOracle(SEARCH('patience'), ANSWER('done'));

      const outcome = await buildStrategy().agenticSearch('Question', { ...options, maxIterations: 2 });

      expect(promptAt(1)).toContain(
        '<PREVIOUS_ACTIONS>\n{"action":"SEARCH","reasoning":"look it up","keywords":["patience"]}\n</PREVIOUS_ACTIONS>'
      );
      expect(outcome.history).toHaveLength(2);
    });

    it('advances past a search without keywords', async () => {
      scriptOracle('{"action":"SEARCH"}', '{"action":"SEARCH","keywords":[]}');

      const outcome = await buildStrategy().agenticSearch('Question', { ...options, maxIterations: 2 });

      expect(llmService.chat).toHaveBeenCalledTimes(2);
      expect(evidenceStore.search).not.toHaveBeenCalled();
      expect(outcome.iterations).toBe(2);
    });

    it('ends immediately on malformed output', async () => {
      const prose = 'Patience is a virtue mentioned often.';
      scriptOracle(prose);

      const outcome = await buildStrategy().agenticSearch('Question', { ...options, maxIterations: 3 });

      expect(outcome.reason).toBe('malformed');
      expect(outcome.action).toEqual({ action: 'MALFORMED', rawText: prose });
      expect(outcome.history).toEqual([]);
      expect(llmService.chat).toHaveBeenCalledTimes(1);
    });

    it('continues when one keyword search fails', async () => {
      evidenceStore.search.mockImplementation(async query => {
        if (query === 'broken') {
          throw new EvidenceStoreUnavailableError('index offline');
        }
        return [{ document: createDocument(query), score: 1 }];
      });
      scriptOracle(SEARCH('broken', 'mercy'), ANSWER_CONTEXT('done'));

      const outcome = await buildStrategy().agenticSearch('Question', { ...options, maxIterations: 3 });

      expect(outcome.reason).toBe('answered');
      expect(outcome.evidence.map(document => document.id)).toEqual(['mercy']);
      expect(logger.warn).toHaveBeenCalledWith(
        '[AgenticRAG] Search for "broken" failed, treating as no results: EvidenceStoreUnavailableError: index offline'
      );
    });

    it('asks for one final answer when forced', async () => {
      scriptOracle(SEARCH('patience'), ANSWER('Z'));

      const outcome = await buildStrategy().agenticSearch('Question', {
        ...options,
        maxIterations: 1,
        forceFinalAnswer: true,
      });

      expect(outcome.reason).toBe('forced_answer');
      expect(outcome.action).toEqual({ action: 'ANSWER', answer: 'Z' });
      expect(outcome.oracleCalls).toBe(2);
      expect(promptAt(1)).toContain(FINAL_ITERATION_INSTRUCTION);
    });

    it('refuses to start when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      await expect(
        buildStrategy().agenticSearch('Question', { ...options, maxIterations: 3, signal: controller.signal })
      ).rejects.toThrow('Agentic search aborted');
      expect(llmService.chat).not.toHaveBeenCalled();
    });
  });

  describe('answer', () => {
    it('uses the fallback text when an answer has no content', async () => {
      scriptOracle('{"action":"ANSWER_CONTEXT"}');

      const result = await buildStrategy().answer({ query: 'Question' });

      expect(result.answer).toBe(CONTEXT_ANSWER_FALLBACK);
    });

    it('returns malformed output as the answer', async () => {
      scriptOracle('Just some prose.');

      const result = await buildStrategy().answer({ query: 'Question' });

      expect(result.answer).toBe('Just some prose.');
      expect(llmService.chat).toHaveBeenCalledTimes(1);
    });

    it('answers with the answer field of an object without an action', async () => {
      scriptOracle('{"answer":"X"}');

      const result = await buildStrategy().answer({ query: 'Question' });

      expect(result.answer).toBe('X');
      expect(result.action).toEqual({ action: 'ANSWER', answer: 'X' });
      expect(llmService.chat).toHaveBeenCalledTimes(1);
    });

    it('applies the configured final answer policy', async () => {
      const base = createTestConfig();
      scriptOracle(SEARCH('patience'), ANSWER('Forced'));

      const result = await buildStrategy({ ...base, rag: { ...base.rag, forceFinalAnswer: true } }).answer({
        query: 'Question',
        maxIterations: 1,
      });

      expect(result.answer).toBe('Forced');
    });

    it('wraps oracle failures', async () => {
      llmService.chat.mockRejectedValueOnce(new Error('quota exceeded'));

      const answer = buildStrategy().answer({ query: 'Question' });

      await expect(answer).rejects.toBeInstanceOf(OracleUnavailableError);
      await expect(answer).rejects.toThrow('Chat completion failed: quota exceeded');
    });
  });

  it('retrieves documents for a single query', async () => {
    const documents = await buildStrategy().retrieve({ query: 'dawn', limit: 2 });

    expect(evidenceStore.search).toHaveBeenCalledWith('dawn', 2);
    expect(documents).toEqual([createDocument('dawn')]);
  });

  it('normalizes queries for bookkeeping', () => {
    expect(normalizeQuery('  Patience   in  Hardship ')).toBe('patience in hardship');
  });
});
