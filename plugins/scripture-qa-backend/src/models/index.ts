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
 * Domain models and data structures
 *
 * @packageDocumentation
 */

/**
 * Represents a chat message sent to the language model
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * A single verse of the corpus together with its commentary.
 *
 * Only `reference`, `text`, `commentary` and `commentarySource` are read by
 * the answering pipeline; the remaining fields belong to the search index.
 */
export interface ScriptureDocument {
  id: string;
  reference: string;
  text: string;
  commentary: string;
  commentarySource: string;
  chapterNumber: number;
  chapterName: string;
  chapterTranslation: string;
  verseNumber: number;
  language: string;
}

/**
 * Represents a ranked search hit
 */
export interface SearchResult {
  document: ScriptureDocument;
  score: number;
}

/**
 * A person asking questions through the delivery channel
 */
export interface TrackedUser {
  id: string;
  username?: string;
  firstName?: string;
  lastName?: string;
}

/**
 * Request payload for asking a question
 */
export interface AskQuestionRequest {
  question: string;
  model?: string;
  maxIterations?: number;
  user?: TrackedUser;
}

/**
 * Response payload for a question answer
 */
export interface AskQuestionResponse {
  answer: string;
  sources: ScriptureDocument[];
  model: string;
  action?: string;
  iterations?: number;
  searchQueries?: string[];
}

/**
 * Progress of corpus indexing
 */
export interface IndexingStatus {
  inProgress: boolean;
  lastIndexTime: Date | null;
  documentCount: number;
}

/**
 * PostgreSQL connection configuration
 */
export interface PostgresConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
  maxConnections?: number;
  idleTimeoutMillis?: number;
  connectionTimeoutMillis?: number;
}

export type StorageType = 'memory' | 'postgresql';

export type LLMProvider = 'ollama' | 'openai';

export type RAGStrategyName = 'agentic' | 'simple';

/**
 * Language model configuration
 */
export interface LLMConfig {
  provider: LLMProvider;
  defaultModel: string;
  ollamaBaseUrl: string;
  openai: {
    baseUrl: string;
    apiKey?: string;
  };
}

/**
 * Retrieval loop configuration
 */
export interface RAGConfig {
  strategy: RAGStrategyName;
  maxIterations: number;
  searchResultLimit: number;
  forceFinalAnswer: boolean;
  requestTimeoutMs: number;
}

/**
 * Configuration for the scripture Q&A backend
 */
export interface ScriptureQaConfig {
  llm: LLMConfig;
  rag: RAGConfig;
  corpus: {
    path: string;
    indexOnStartup: boolean;
  };
  evidenceStore: StorageType;
  userTracking: StorageType;
  postgresql?: PostgresConfig;
}
