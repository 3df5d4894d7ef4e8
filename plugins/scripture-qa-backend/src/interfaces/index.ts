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
 * Service interfaces following SOLID principles
 *
 * @packageDocumentation
 */

import type { Logger } from 'winston';
import {
  ChatMessage,
  IndexingStatus,
  ScriptureDocument,
  SearchResult,
  ScriptureQaConfig,
  TrackedUser,
} from '../models';
import type { RAGAnswer, RAGQuestionOptions } from '../rag/types';

/**
 * Interface for LLM service operations
 * Single Responsibility: Handles all LLM-related operations
 */
export interface ILLMService {
  /**
   * Generate a chat completion
   */
  chat(messages: ChatMessage[], model?: string): Promise<string>;

  /**
   * Check whether the model endpoint is reachable
   */
  healthCheck(): Promise<boolean>;
}

/**
 * Interface for the lexical evidence store
 * Single Responsibility: Indexes the corpus and answers keyword queries
 */
export interface IEvidenceStore {
  /**
   * Atomically replace the indexed corpus. When this rejects, the previous
   * documents remain searchable.
   */
  replaceAll(documents: ScriptureDocument[]): Promise<void>;

  /**
   * Ranked search, at most `limit` results, empty when nothing matches
   */
  search(query: string, limit: number): Promise<SearchResult[]>;

  /**
   * Number of indexed documents
   */
  count(): Promise<number>;
}

/**
 * Interface for reading the corpus from static storage
 */
export interface ICorpusLoader {
  load(): Promise<ScriptureDocument[]>;
}

/**
 * Interface for usage accounting
 * Implementations report failures as `false` or `0` instead of throwing.
 */
export interface IUserTracker {
  trackUser(user: TrackedUser): Promise<boolean>;
  incrementMessageCount(userId: string): Promise<boolean>;
  getUserCount(): Promise<number>;
  getActiveUsersToday(): Promise<number>;
}

/**
 * Interface for RAG operations
 * Single Responsibility: Orchestrates the RAG pipeline
 */
export interface IRAGService {
  /**
   * Load the corpus and (re)populate the evidence store
   */
  indexAllDocuments(): Promise<void>;

  /**
   * Retrieve relevant documents for a query
   */
  retrieveContext(query: string, limit?: number): Promise<ScriptureDocument[]>;

  /**
   * Answer a user question with the active strategy. Never rejects.
   */
  answerQuestion(question: string, options?: RAGQuestionOptions): Promise<RAGAnswer>;

  /**
   * Answer a user question and return only the displayable text. Never rejects.
   */
  ask(question: string): Promise<string>;

  /**
   * Report whether indexing runs and how many documents are indexed
   */
  getIndexingStatus(): Promise<IndexingStatus>;
}

/**
 * Interface for configuration management
 * Single Responsibility: Manages plugin configuration
 */
export interface IConfigService {
  /**
   * Get the complete configuration
   */
  getConfig(): ScriptureQaConfig;
}

/**
 * Dependencies for service construction
 */
export interface ServiceDependencies {
  logger: Logger;
  config: IConfigService;
}

/**
 * Dependencies shared by every RAG strategy
 */
export interface RAGStrategyDependencies extends ServiceDependencies {
  llmService: ILLMService;
  evidenceStore: IEvidenceStore;
}

/**
 * Dependencies for RAG service construction
 */
export interface RAGServiceDependencies extends RAGStrategyDependencies {
  corpusLoader: ICorpusLoader;
}
