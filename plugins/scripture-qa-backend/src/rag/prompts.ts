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
 * Prompt construction for the retrieval strategies
 *
 * @packageDocumentation
 */

import { ScriptureDocument } from '../models';
import { AgentAction, serializeAgentAction } from './actions';
import { renderEvidence } from './context';

/**
 * Everything the agentic prompt is built from.
 */
export interface AgenticPromptInput {
  question: string;
  issuedQueries: readonly string[];
  evidence: readonly ScriptureDocument[];
  history: readonly AgentAction[];
  iteration: number;
  maxIterations: number;
}

export const FINAL_ITERATION_INSTRUCTION =
  'This is your last iteration. Do not search again: answer now with ANSWER_CONTEXT or ANSWER, giving the best answer the available information allows.';

const OUTPUT_TEMPLATES = `To search, reply with:

{
"action": "SEARCH",
"reasoning": "<why these searches help>",
"keywords": ["search query 1", "search query 2", ...]
}

To answer from the CONTEXT, reply with:

{
"action": "ANSWER_CONTEXT",
"answer": "<your answer>",
"source": "CONTEXT"
}

If the CONTEXT does not contain the answer, answer from your own knowledge with:

{
"action": "ANSWER",
"answer": "<your answer>",
"source": "OWN_KNOWLEDGE"
}`;

export function isFinalIteration(iteration: number, maxIterations: number): boolean {
  return iteration >= maxIterations - 1;
}

/**
 * Build the prompt for one iteration of the agentic loop.
 */
export function buildAgenticPrompt(input: AgenticPromptInput): string {
  const budget = isFinalIteration(input.iteration, input.maxIterations)
    ? `\n${FINAL_ITERATION_INSTRUCTION}\n`
    : '';

  return `You are an Imam and a teacher of the Qur'an.

A person asks a QUESTION. Answer it from the CONTEXT; when the CONTEXT is
insufficient you may use your own knowledge. The CONTEXT starts out empty and
is built from Qur'an verses and tafsir (commentary) that you retrieve by searching.
SEARCH_QUERIES lists the queries already used to fill the CONTEXT.
PREVIOUS_ACTIONS lists the actions you already took.

When answering:
- Use clear, respectful and simple language.
- Quote the Qur'an or tafsir directly when relevant.
- Always give the surah and ayah reference (for example Surah Al-Fatiha 1:5).
- When the verse alone does not answer the QUESTION and you rely on tafsir, label that part 'Tafsir clarification'.

Available actions:
- SEARCH the Qur'an and tafsir database to add material to the CONTEXT
- ANSWER_CONTEXT: answer the question from the CONTEXT
- ANSWER: answer the question from your own knowledge

Build search queries from the QUESTION and what the CONTEXT already shows,
exploring the topic in depth. Never reuse a query from SEARCH_QUERIES and never
repeat an action from PREVIOUS_ACTIONS.

You may take at most ${input.maxIterations} iterations for this question.
Current iteration: ${input.iteration}.
${budget}
Reply with a single JSON object and nothing else.

${OUTPUT_TEMPLATES}

<QUESTION>
${input.question}
</QUESTION>

<SEARCH_QUERIES>
${input.issuedQueries.join('\n')}
</SEARCH_QUERIES>

<CONTEXT>
${renderEvidence(input.evidence)}
</CONTEXT>

<PREVIOUS_ACTIONS>
${input.history.map(serializeAgentAction).join('\n')}
</PREVIOUS_ACTIONS>`;
}

/**
 * System prompt for the single-pass strategy.
 */
export function buildGroundedSystemPrompt(evidence: readonly ScriptureDocument[]): string {
  return `You are a teacher of the Qur'an answering questions with the passages below.
Quote the verses you rely on and always give the surah and ayah reference.
When you rely on tafsir, label that part 'Tafsir clarification'.
If the passages do not answer the question, say so.

Context:
${renderEvidence(evidence)}`;
}
