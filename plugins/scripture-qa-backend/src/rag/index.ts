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
 * RAG strategies and the factory selecting between them
 *
 * @packageDocumentation
 */

import { RAGStrategyDependencies } from '../interfaces';
import { IRAGStrategy } from './types';
import { AgenticRAGStrategy } from './strategies/AgenticRAGStrategy';
import { SimpleRAGStrategy } from './strategies/SimpleRAGStrategy';

/**
 * Creates the strategy named by `scriptureQa.rag.strategy`
 */
export class RAGStrategyFactory {
  static create(dependencies: RAGStrategyDependencies): IRAGStrategy {
    const name = dependencies.config.getConfig().rag.strategy;
    dependencies.logger.info(`Using RAG strategy: ${name}`);

    switch (name) {
      case 'simple':
        return new SimpleRAGStrategy(dependencies);
      case 'agentic':
      default:
        return new AgenticRAGStrategy(dependencies);
    }
  }
}

export { AgenticRAGStrategy, SimpleRAGStrategy };
export * from './actions';
export * from './answers';
export * from './context';
export * from './prompts';
export * from './types';
