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
 * LLM Service implementation for Ollama integration
 * Handles all interactions with the Ollama API
 *
 * @packageDocumentation
 */

import fetch from 'node-fetch';
import type { Logger } from 'winston';
import { z } from 'zod';
import { ILLMService, IConfigService, ServiceDependencies } from '../interfaces';
import { ChatMessage } from '../models';
import { OracleUnavailableError, errorMessage } from '../errors';

const OllamaChatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string(),
  }),
  done: z.boolean().optional(),
});

/**
 * Service for interacting with Ollama LLM
 * Follows Single Responsibility and Dependency Inversion principles
 */
export class OllamaLLMService implements ILLMService {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly baseUrl: string;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    this.baseUrl = this.configService.getConfig().llm.ollamaBaseUrl;
  }

  /**
   * Generate a chat completion using Ollama
   */
  async chat(messages: ChatMessage[], model?: string): Promise<string> {
    const modelName = model || this.configService.getConfig().llm.defaultModel;

    this.logger.info(`Generating chat completion with model: ${modelName}`);

    try {
      const response = await fetch(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          model: modelName,
          messages,
          stream: false,
        }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`Ollama API error (${response.status}): ${errorText}`);
      }

      const parsed = OllamaChatResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('Invalid response format from Ollama');
      }

      return parsed.data.message.content;
    } catch (error) {
      this.logger.error(`Failed to generate chat completion: ${error}`);
      throw new OracleUnavailableError(`Chat completion failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Health check for Ollama service
   */
  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch (error) {
      this.logger.error(`Ollama health check failed: ${error}`);
      return false;
    }
  }
}
