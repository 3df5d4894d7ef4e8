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
 * RAG Service implementation
 * Orchestrates indexing and question answering
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  ICorpusLoader,
  IConfigService,
  IEvidenceStore,
  IRAGService,
  RAGServiceDependencies,
} from '../interfaces';
import { IndexingStatus, ScriptureDocument } from '../models';
import { RAGStrategyFactory } from '../rag';
import { FAILURE_ANSWERS, UNFORMATTED_ANSWER_FALLBACK } from '../rag/answers';
import { IRAGStrategy, RAGAnswer, RAGFailure, RAGQuestionOptions } from '../rag/types';
import { OracleUnavailableError, RequestTimeoutError } from '../errors';

function classifyFailure(error: unknown): RAGFailure {
  if (error instanceof RequestTimeoutError) {
    return 'timeout';
  }
  if (error instanceof OracleUnavailableError) {
    return 'oracle_unavailable';
  }
  return 'internal_error';
}

/**
 * Service that orchestrates the RAG pipeline
 * Follows Single Responsibility and Open/Closed principles
 */
export class RAGService implements IRAGService {
  private readonly logger: Logger;
  private readonly evidenceStore: IEvidenceStore;
  private readonly corpusLoader: ICorpusLoader;
  private readonly configService: IConfigService;
  private readonly strategy: IRAGStrategy;

  private indexingInProgress = false;
  private lastIndexTime: Date | null = null;

  constructor(dependencies: RAGServiceDependencies) {
    this.logger = dependencies.logger;
    this.evidenceStore = dependencies.evidenceStore;
    this.corpusLoader = dependencies.corpusLoader;
    this.configService = dependencies.config;
    this.strategy = RAGStrategyFactory.create(dependencies);
  }

  /**
   * Load the corpus and rebuild the evidence store
   */
  async indexAllDocuments(): Promise<void> {
    if (this.indexingInProgress) {
      this.logger.warn('Indexing already in progress, skipping');
      return;
    }

    try {
      this.indexingInProgress = true;
      this.logger.info('Starting full document indexing');

      const documents = await this.corpusLoader.load();
      await this.evidenceStore.replaceAll(documents);

      this.lastIndexTime = new Date();
      this.logger.info(`Indexing complete: ${documents.length} documents`);
    } catch (error) {
      this.logger.error(`Indexing failed: ${error}`);
      throw error;
    } finally {
      this.indexingInProgress = false;
    }
  }

  /**
   * Retrieve relevant documents for a query
   */
  async retrieveContext(query: string, limit?: number): Promise<ScriptureDocument[]> {
    try {
      return await this.strategy.retrieve({ query, limit });
    } catch (error) {
      this.logger.error(`Context retrieval failed: ${error}`);
      throw error;
    }
  }

  /**
   * Answer a question with the active strategy under the request deadline.
   * Every failure is turned into an apology; the returned answer is never empty.
   */
  async answerQuestion(question: string, options: RAGQuestionOptions = {}): Promise<RAGAnswer> {
    const config = this.configService.getConfig();
    const model = options.model || config.llm.defaultModel;
    const timeoutMs = config.rag.requestTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new RequestTimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      const result = await Promise.race([
        this.strategy.answer({ ...options, query: question, model, signal: controller.signal }),
        deadline,
      ]);

      if (result.answer.trim().length === 0) {
        this.logger.warn('Strategy returned an empty answer, using fallback');
        return { ...result, answer: UNFORMATTED_ANSWER_FALLBACK };
      }
      return result;
    } catch (error) {
      const failure = classifyFailure(error);
      this.logger.error(`Answering question failed (${failure}): ${error}`);
      return { answer: FAILURE_ANSWERS[failure], sources: [], model, failure };
    } finally {
      clearTimeout(timer);
    }
  }

  async ask(question: string): Promise<string> {
    const result = await this.answerQuestion(question);
    return result.answer;
  }

  /**
   * Get indexing status
   */
  async getIndexingStatus(): Promise<IndexingStatus> {
    return {
      inProgress: this.indexingInProgress,
      lastIndexTime: this.lastIndexTime,
      documentCount: await this.evidenceStore.count(),
    };
  }
}
