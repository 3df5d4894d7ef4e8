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
 * Decisions the reasoning step can commit to, and the parser that turns raw
 * model output into one of them.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

export interface SearchAction {
  action: 'SEARCH';
  reasoning: string;
  keywords: string[];
}

export interface AnswerFromContextAction {
  action: 'ANSWER_CONTEXT';
  answer?: string;
}

export interface AnswerFromKnowledgeAction {
  action: 'ANSWER';
  answer?: string;
}

/**
 * Produced locally when the model output is not a recognizable decision.
 */
export interface MalformedAction {
  action: 'MALFORMED';
  rawText: string;
}

export type AgentAction =
  | SearchAction
  | AnswerFromContextAction
  | AnswerFromKnowledgeAction
  | MalformedAction;

const KeywordsSchema = z
  .array(z.unknown())
  .catch([])
  .transform(items =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map(item => item.trim())
      .filter(item => item.length > 0)
  );

const AnswerSchema = z
  .string()
  .optional()
  .catch(undefined)
  .transform(value => (value !== undefined && value.trim().length > 0 ? value : undefined));

const DecisionSchema = z.object({
  action: z.string().optional().catch(undefined),
  reasoning: z.string().catch(''),
  keywords: KeywordsSchema,
  answer: AnswerSchema,
});

const FENCED_BLOCK = /^```[a-zA-Z]*\s*\n([\s\S]*?)\n?```$/;

function unwrapCodeFence(text: string): string {
  const trimmed = text.trim();
  const match = FENCED_BLOCK.exec(trimmed);
  return match ? match[1] : trimmed;
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Interpret raw model output as an {@link AgentAction}. Never throws:
 * output that is not a JSON object becomes a `MALFORMED` action carrying the
 * original text. An object whose `action` is not SEARCH or ANSWER_CONTEXT,
 * including a missing or non-string one, is a final answer.
 */
export function parseAgentAction(rawText: string): AgentAction {
  const parsed = DecisionSchema.safeParse(tryParseJson(unwrapCodeFence(rawText)));
  if (!parsed.success) {
    return { action: 'MALFORMED', rawText };
  }

  const decision = parsed.data;
  switch (decision.action) {
    case 'SEARCH':
      return { action: 'SEARCH', reasoning: decision.reasoning, keywords: decision.keywords };
    case 'ANSWER_CONTEXT':
      return { action: 'ANSWER_CONTEXT', answer: decision.answer };
    default:
      return { action: 'ANSWER', answer: decision.answer };
  }
}

/**
 * One-line JSON rendering used when showing previous actions to the model.
 */
export function serializeAgentAction(action: AgentAction): string {
  switch (action.action) {
    case 'SEARCH':
      return JSON.stringify({
        action: action.action,
        reasoning: action.reasoning,
        keywords: action.keywords,
      });
    case 'ANSWER_CONTEXT':
    case 'ANSWER':
      return JSON.stringify({ action: action.action, answer: action.answer });
    case 'MALFORMED':
      return JSON.stringify({ action: action.action, raw_text: action.rawText });
  }
}

export function isSearchAction(action: AgentAction): action is SearchAction {
  return action.action === 'SEARCH';
}
