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
  IConfigService,
  IEvidenceStore,
  ILLMService,
  RAGStrategyDependencies,
} from '../../interfaces';
import { ScriptureDocument } from '../../models';
import { AgentAction, isSearchAction, parseAgentAction } from '../actions';
import { resolveAnswerText } from '../answers';
import { buildAgenticPrompt } from '../prompts';
import { OracleUnavailableError, errorMessage } from '../../errors';

/**
 * Mutable state of one question, owned by a single `agenticSearch` call.
 */
export interface LoopState {
  iteration: number;
  /** normalized query -> first spelling seen */
  issuedQueries: Map<string, string>;
  evidence: ScriptureDocument[];
  history: AgentAction[];
}

export type StopReason = 'answered' | 'malformed' | 'budget_exhausted' | 'forced_answer';

export interface AgenticSearchOptions {
  model: string;
  maxIterations: number;
  limit: number;
  forceFinalAnswer: boolean;
  signal?: AbortSignal;
}

export interface AgenticSearchOutcome {
  action: AgentAction;
  reason: StopReason;
  iterations: number;
  oracleCalls: number;
  issuedQueries: string[];
  evidence: ScriptureDocument[];
  history: AgentAction[];
}

export function normalizeQuery(query: string): string {
  return query.trim().replace(/\s+/g, ' ').toLowerCase();
}

export function createLoopState(): LoopState {
  return {
    iteration: 0,
    issuedQueries: new Map(),
    evidence: [],
    history: [],
  };
}

function recordQueries(issued: Map<string, string>, keywords: readonly string[]): void {
  for (const keyword of keywords) {
    const key = normalizeQuery(keyword);
    if (!issued.has(key)) {
      issued.set(key, keyword);
    }
  }
}

/**
 * Iterative strategy: the model decides on every turn whether to search the
 * corpus again or to answer, until it answers or the iteration budget runs out.
 */
export class AgenticRAGStrategy implements IRAGStrategy {
  readonly name = 'agentic';

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
    return this.searchKeyword(context.query, limit);
  }

  async answer(context: RAGContext): Promise<RAGAnswer> {
    const config = this.configService.getConfig();
    const model = context.model || config.llm.defaultModel;

    const outcome = await this.agenticSearch(context.query, {
      model,
      maxIterations: context.maxIterations ?? config.rag.maxIterations,
      limit: context.limit ?? config.rag.searchResultLimit,
      forceFinalAnswer: config.rag.forceFinalAnswer,
      signal: context.signal,
    });

    this.logger.info(
      `[AgenticRAG] Finished after ${outcome.oracleCalls} LLM call(s): ${outcome.reason}`
    );

    return {
      answer: resolveAnswerText(outcome.action),
      sources: outcome.evidence,
      model,
      action: outcome.action,
      iterations: outcome.iterations,
      searchQueries: outcome.issuedQueries,
    };
  }

  /**
   * Run the decide / search loop for one question.
   *
   * Terminates after at most `maxIterations` LLM calls (one more when
   * `forceFinalAnswer` is set and the budget ran out on a SEARCH).
   */
  async agenticSearch(question: string, options: AgenticSearchOptions): Promise<AgenticSearchOutcome> {
    const maxIterations = Math.max(1, Math.floor(options.maxIterations));
    const state = createLoopState();
    let oracleCalls = 0;

    const finish = (action: AgentAction, reason: StopReason): AgenticSearchOutcome => ({
      action,
      reason,
      iterations: state.iteration,
      oracleCalls,
      issuedQueries: Array.from(state.issuedQueries.values()),
      evidence: state.evidence,
      history: state.history,
    });

    const promptFor = (iteration: number) =>
      buildAgenticPrompt({
        question,
        issuedQueries: Array.from(state.issuedQueries.values()),
        evidence: state.evidence,
        history: state.history,
        iteration,
        maxIterations,
      });

    while (true) {
      this.ensureNotAborted(options.signal);
      this.logger.info(
        `[AgenticRAG] Iteration #${state.iteration} for question: ${question.substring(0, 50)}...`
      );

      const action = await this.decide(promptFor(state.iteration), options.model);
      oracleCalls += 1;

      if (action.action === 'MALFORMED') {
        this.logger.warn('[AgenticRAG] LLM response is not a valid action, answering with raw text');
        return finish(action, 'malformed');
      }

      state.history.push(action);

      if (!isSearchAction(action)) {
        return finish(action, 'answered');
      }

      recordQueries(state.issuedQueries, action.keywords);
      await this.collectEvidence(state, action.keywords, options.limit);

      state.iteration += 1;
      if (state.iteration >= maxIterations) {
        this.logger.info(`[AgenticRAG] Iteration budget of ${maxIterations} exhausted`);
        if (!options.forceFinalAnswer) {
          return finish(action, 'budget_exhausted');
        }

        this.ensureNotAborted(options.signal);
        const finalAction = await this.decide(promptFor(state.iteration), options.model);
        oracleCalls += 1;
        if (finalAction.action !== 'MALFORMED') {
          state.history.push(finalAction);
        }
        return finish(finalAction, 'forced_answer');
      }
    }
  }

  private async decide(prompt: string, model: string): Promise<AgentAction> {
    let raw: string;
    try {
      raw = await this.llmService.chat([{ role: 'user', content: prompt }], model);
    } catch (error) {
      this.logger.error(`[AgenticRAG] LLM call failed: ${error}`);
      if (error instanceof OracleUnavailableError) {
        throw error;
      }
      throw new OracleUnavailableError(`Chat completion failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const action = parseAgentAction(raw);
    this.logger.info(`[AgenticRAG] Agent action: ${action.action}`);
    return action;
  }

  /**
   * Keywords are searched concurrently; results are appended in keyword order.
   */
  private async collectEvidence(
    state: LoopState,
    keywords: readonly string[],
    limit: number
  ): Promise<void> {
    const batches = await Promise.all(keywords.map(keyword => this.searchKeyword(keyword, limit)));
    for (const batch of batches) {
      state.evidence.push(...batch);
    }
    this.logger.info(
      `[AgenticRAG] Ran ${keywords.length} search(es), context now holds ${state.evidence.length} documents`
    );
  }

  /**
   * A failing search counts as zero results so the loop can continue.
   */
  private async searchKeyword(keyword: string, limit: number): Promise<ScriptureDocument[]> {
    try {
      const results = await this.evidenceStore.search(keyword, limit);
      return results.map(result => result.document);
    } catch (error) {
      this.logger.warn(`[AgenticRAG] Search for "${keyword}" failed, treating as no results: ${error}`);
      return [];
    }
  }

  private ensureNotAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new Error('Agentic search aborted');
    }
  }
}
