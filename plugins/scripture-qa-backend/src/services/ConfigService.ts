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
 * Configuration service implementation
 * Manages plugin configuration with type-safe access
 *
 * @packageDocumentation
 */

import { Config } from '@backstage/config';
import { IConfigService } from '../interfaces';
import {
  LLMConfig,
  LLMProvider,
  PostgresConfig,
  RAGConfig,
  RAGStrategyName,
  ScriptureQaConfig,
  StorageType,
} from '../models';

const LLM_PROVIDERS: readonly LLMProvider[] = ['ollama', 'openai'];
const RAG_STRATEGIES: readonly RAGStrategyName[] = ['agentic', 'simple'];
const STORAGE_TYPES: readonly StorageType[] = ['memory', 'postgresql'];

function oneOf<T extends string>(
  key: string,
  value: string | undefined,
  options: readonly T[],
  fallback: T
): T {
  if (value === undefined) {
    return fallback;
  }
  const match = options.find(option => option === value);
  if (!match) {
    throw new Error(`Invalid value "${value}" for ${key}, expected one of: ${options.join(', ')}`);
  }
  return match;
}

/**
 * Configuration service that wraps Backstage Config
 * Follows Single Responsibility Principle
 */
export class ConfigService implements IConfigService {
  private readonly config: Config;
  private readonly cachedConfig: ScriptureQaConfig;

  constructor(config: Config) {
    this.config = config;
    this.cachedConfig = this.loadConfig();
  }

  /**
   * Load and validate configuration
   */
  private loadConfig(): ScriptureQaConfig {
    const evidenceStore = this.loadStorageType('scriptureQa.evidenceStore.type');
    const userTracking = this.loadStorageType('scriptureQa.userTracking.type');
    const needsPostgres = evidenceStore === 'postgresql' || userTracking === 'postgresql';

    return {
      llm: this.loadLLMConfig(),
      rag: this.loadRAGConfig(),
      corpus: {
        path: this.config.getOptionalString('scriptureQa.corpus.path') || 'data/quran_with_tafsir.json',
        indexOnStartup: this.config.getOptionalBoolean('scriptureQa.corpus.indexOnStartup') ?? true,
      },
      evidenceStore,
      userTracking,
      postgresql: needsPostgres ? this.loadPostgresConfig() : undefined,
    };
  }

  private loadLLMConfig(): LLMConfig {
    const provider = oneOf(
      'scriptureQa.llm.provider',
      this.config.getOptionalString('scriptureQa.llm.provider'),
      LLM_PROVIDERS,
      'openai'
    );
    const apiKey = this.config.getOptionalString('scriptureQa.llm.openai.apiKey');

    if (provider === 'openai' && !apiKey) {
      throw new Error('scriptureQa.llm.openai.apiKey (OPENAI_API_KEY) is required for the openai provider');
    }

    return {
      provider,
      defaultModel: this.config.getOptionalString('scriptureQa.llm.defaultModel') || 'gpt-4o-mini',
      ollamaBaseUrl: this.config.getOptionalString('scriptureQa.llm.ollamaBaseUrl') || 'http://localhost:11434',
      openai: {
        baseUrl: this.config.getOptionalString('scriptureQa.llm.openai.baseUrl') || 'https://api.openai.com/v1',
        apiKey,
      },
    };
  }

  private loadRAGConfig(): RAGConfig {
    const maxIterations = this.config.getOptionalNumber('scriptureQa.rag.maxIterations') ?? 3;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new Error('scriptureQa.rag.maxIterations must be a positive integer');
    }

    return {
      strategy: oneOf(
        'scriptureQa.rag.strategy',
        this.config.getOptionalString('scriptureQa.rag.strategy'),
        RAG_STRATEGIES,
        'agentic'
      ),
      maxIterations,
      searchResultLimit: this.config.getOptionalNumber('scriptureQa.rag.searchResultLimit') || 5,
      forceFinalAnswer: this.config.getOptionalBoolean('scriptureQa.rag.forceFinalAnswer') ?? false,
      requestTimeoutMs: this.config.getOptionalNumber('scriptureQa.rag.requestTimeoutMs') || 60000,
    };
  }

  private loadStorageType(key: string): StorageType {
    return oneOf(key, this.config.getOptionalString(key), STORAGE_TYPES, 'memory');
  }

  /**
   * Load PostgreSQL configuration with validation
   */
  private loadPostgresConfig(): PostgresConfig {
    const host = this.config.getOptionalString('scriptureQa.postgresql.host') || 'localhost';
    const port = this.config.getOptionalNumber('scriptureQa.postgresql.port') || 5432;
    const database = this.config.getOptionalString('scriptureQa.postgresql.database') || 'scripture_qa';
    const user = this.config.getOptionalString('scriptureQa.postgresql.user') || 'scripture_qa';
    const password = this.config.getOptionalString('scriptureQa.postgresql.password') || '';
    const ssl = this.config.getOptionalBoolean('scriptureQa.postgresql.ssl') ?? false;
    const maxConnections = this.config.getOptionalNumber('scriptureQa.postgresql.maxConnections') || 10;
    const idleTimeoutMillis = this.config.getOptionalNumber('scriptureQa.postgresql.idleTimeoutMillis') || 30000;
    const connectionTimeoutMillis =
      this.config.getOptionalNumber('scriptureQa.postgresql.connectionTimeoutMillis') || 5000;

    if (!password) {
      throw new Error('PostgreSQL password is required when a postgresql store is configured');
    }
    if (port < 1 || port > 65535) {
      throw new Error('PostgreSQL port must be between 1 and 65535');
    }

    return {
      host,
      port,
      database,
      user,
      password,
      ssl,
      maxConnections,
      idleTimeoutMillis,
      connectionTimeoutMillis,
    };
  }

  getConfig(): ScriptureQaConfig {
    return this.cachedConfig;
  }

  /**
   * Get PostgreSQL configuration
   * Throws error if not configured
   */
  getPostgresConfig(): PostgresConfig {
    if (!this.cachedConfig.postgresql) {
      throw new Error('PostgreSQL is not configured');
    }
    return this.cachedConfig.postgresql;
  }
}
