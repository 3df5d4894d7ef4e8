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
 * LLM Service for OpenAI-compatible chat completion endpoints
 *
 * @packageDocumentation
 */

import fetch from 'node-fetch';
import type { Logger } from 'winston';
import { z } from 'zod';
import { ILLMService, IConfigService, ServiceDependencies } from '../interfaces';
import { ChatMessage } from '../models';
import { OracleUnavailableError, errorMessage } from '../errors';

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          role: z.string(),
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

/**
 * Service for OpenAI (or any server speaking the same chat completions API)
 */
export class OpenAILLMService implements ILLMService {
  private readonly logger: Logger;
  private readonly configService: IConfigService;
  private readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(dependencies: ServiceDependencies) {
    this.logger = dependencies.logger;
    this.configService = dependencies.config;
    const { openai } = this.configService.getConfig().llm;
    this.baseUrl = openai.baseUrl.replace(/\/+$/, '');
    this.apiKey = openai.apiKey ?? '';
  }

  async chat(messages: ChatMessage[], model?: string): Promise<string> {
    const modelName = model || this.configService.getConfig().llm.defaultModel;

    this.logger.info(`Generating chat completion with model: ${modelName}`);

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({ model: modelName, messages }),
      });

      if (!response.ok) {
        const errorText = await response.text();
        throw new Error(`OpenAI API error (${response.status}): ${errorText}`);
      }

      const parsed = ChatCompletionResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error('Invalid response format from OpenAI');
      }

      return parsed.data.choices[0].message.content ?? '';
    } catch (error) {
      this.logger.error(`Failed to generate chat completion: ${error}`);
      throw new OracleUnavailableError(`Chat completion failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/models`, {
        headers: { Authorization: `Bearer ${this.apiKey}` },
      });
      return response.ok;
    } catch (error) {
      this.logger.error(`OpenAI health check failed: ${error}`);
      return false;
    }
  }
}
