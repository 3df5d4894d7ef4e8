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
 * Loading of app-config.yaml plus environment overrides for the standalone server
 *
 * @packageDocumentation
 */

import fs from 'fs';
import { parse } from 'yaml';
import { AppConfig, Config, ConfigReader } from '@backstage/config';
import type { JsonObject, JsonValue } from '@backstage/types';

type EnvValueKind = 'string' | 'number' | 'boolean';

const ENV_MAPPINGS: Array<{ env: string; path: string; kind: EnvValueKind }> = [
  { env: 'PORT', path: 'backend.listen.port', kind: 'number' },
  { env: 'LLM_PROVIDER', path: 'scriptureQa.llm.provider', kind: 'string' },
  { env: 'LLM_MODEL', path: 'scriptureQa.llm.defaultModel', kind: 'string' },
  { env: 'OLLAMA_BASE_URL', path: 'scriptureQa.llm.ollamaBaseUrl', kind: 'string' },
  { env: 'OPENAI_API_KEY', path: 'scriptureQa.llm.openai.apiKey', kind: 'string' },
  { env: 'OPENAI_BASE_URL', path: 'scriptureQa.llm.openai.baseUrl', kind: 'string' },
  { env: 'RAG_STRATEGY', path: 'scriptureQa.rag.strategy', kind: 'string' },
  { env: 'RAG_MAX_ITERATIONS', path: 'scriptureQa.rag.maxIterations', kind: 'number' },
  { env: 'RAG_SEARCH_RESULT_LIMIT', path: 'scriptureQa.rag.searchResultLimit', kind: 'number' },
  { env: 'RAG_REQUEST_TIMEOUT_MS', path: 'scriptureQa.rag.requestTimeoutMs', kind: 'number' },
  { env: 'RAG_FORCE_FINAL_ANSWER', path: 'scriptureQa.rag.forceFinalAnswer', kind: 'boolean' },
  { env: 'CORPUS_PATH', path: 'scriptureQa.corpus.path', kind: 'string' },
  { env: 'EVIDENCE_STORE_TYPE', path: 'scriptureQa.evidenceStore.type', kind: 'string' },
  { env: 'USER_TRACKING_TYPE', path: 'scriptureQa.userTracking.type', kind: 'string' },
  { env: 'POSTGRES_HOST', path: 'scriptureQa.postgresql.host', kind: 'string' },
  { env: 'POSTGRES_PORT', path: 'scriptureQa.postgresql.port', kind: 'number' },
  { env: 'POSTGRES_DB', path: 'scriptureQa.postgresql.database', kind: 'string' },
  { env: 'POSTGRES_USER', path: 'scriptureQa.postgresql.user', kind: 'string' },
  { env: 'POSTGRES_PASSWORD', path: 'scriptureQa.postgresql.password', kind: 'string' },
];

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function convert(env: string, raw: string, kind: EnvValueKind): JsonValue {
  switch (kind) {
    case 'number': {
      const value = Number(raw);
      if (Number.isNaN(value)) {
        throw new Error(`Environment variable ${env} must be a number, got "${raw}"`);
      }
      return value;
    }
    case 'boolean':
      return raw === 'true' || raw === '1';
    case 'string':
      return raw;
  }
}

function nest(path: string, value: JsonValue): JsonObject {
  const [key, ...rest] = path.split('.');
  return { [key]: rest.length === 0 ? value : nest(rest.join('.'), value) };
}

/**
 * One config layer per known environment variable that is set. Empty values are ignored.
 */
export function readEnvConfigs(env: NodeJS.ProcessEnv): AppConfig[] {
  const configs: AppConfig[] = [];
  for (const { env: name, path, kind } of ENV_MAPPINGS) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== '') {
      configs.push({ context: `env:${name}`, data: nest(path, convert(name, raw.trim(), kind)) });
    }
  }
  return configs;
}

export function readConfigFile(configPath: string): JsonObject {
  if (!fs.existsSync(configPath)) {
    return {};
  }
  const data: unknown = parse(fs.readFileSync(configPath, 'utf8'));
  if (data === null || data === undefined) {
    return {};
  }
  if (!isJsonObject(data)) {
    throw new Error(`Config file ${configPath} must contain a mapping at the top level`);
  }
  return data;
}

/**
 * Environment variables take precedence over the config file.
 */
export function loadAppConfig(
  options: { configPath?: string; env?: NodeJS.ProcessEnv } = {}
): Config {
  const configPath = options.configPath ?? 'app-config.yaml';
  return ConfigReader.fromConfigs([
    { context: configPath, data: readConfigFile(configPath) },
    ...readEnvConfigs(options.env ?? process.env),
  ]);
}
