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

import type { Logger } from 'winston';
import { IRAGStrategy, RAGAnswer, RAGContext } from '../types';
import {
  ILLMService,
  IEvidenceStore,
  IConfigService,
  RAGStrategyDependencies,
} from '../../interfaces';
import { ChatMessage, ScriptureDocument } from '../../models';
import { buildGroundedSystemPrompt } from '../prompts';
import { OracleUnavailableError, errorMessage } from '../../errors';

/**
 * Single-pass strategy: one search with the question itself, one completion.
 */
export class SimpleRAGStrategy implements IRAGStrategy {
  readonly name = 'simple';

  private readonly logger: Logger;
  private readonly llmService: ILLMService;
  private readonly evidenceStore: IEvidenceStore;
  private readonly configService: IConfigService;

  constructor(dependencies: RAGStrategyDependencies) {
    this.logger = dependencies.logger;
    this.llmService = dependencies.llmService;
    this.evidenceStore = dependencies.evidenceStore;
    this.configService = dependencies.config;
  }

  async retrieve(context: RAGContext): Promise<ScriptureDocument[]> {
    const limit = context.limit ?? this.configService.getConfig().rag.searchResultLimit;
    this.logger.info(`[SimpleRAG] Retrieving context (limit=${limit})`);

    try {
      const results = await this.evidenceStore.search(context.query, limit);
      const documents = results.map(result => result.document);
      this.logger.info(`[SimpleRAG] Retrieved ${documents.length} relevant documents`);
      return documents;
    } catch (error) {
      this.logger.warn(`[SimpleRAG] Search failed, continuing without context: ${error}`);
      return [];
    }
  }

  async answer(context: RAGContext): Promise<RAGAnswer> {
    const documents = await this.retrieve(context);
    const model = context.model || this.configService.getConfig().llm.defaultModel;

    if (documents.length === 0) {
      this.logger.warn('[SimpleRAG] No relevant context found, falling back to direct LLM');
      const fallback = await this.complete([{ role: 'user', content: context.query }], model);
      return {
        answer: fallback,
        sources: [],
        model,
      };
    }

    const messages: ChatMessage[] = [
      { role: 'system', content: buildGroundedSystemPrompt(documents) },
      { role: 'user', content: context.query },
    ];

    const answer = await this.complete(messages, model);
    this.logger.info('[SimpleRAG] Successfully generated answer');

    return {
      answer,
      sources: documents,
      model,
    };
  }

  private async complete(messages: ChatMessage[], model: string): Promise<string> {
    try {
      return await this.llmService.chat(messages, model);
    } catch (error) {
      this.logger.error(`[SimpleRAG] LLM call failed: ${error}`);
      if (error instanceof OracleUnavailableError) {
        throw error;
      }
      throw new OracleUnavailableError(`Chat completion failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
