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

import type { AgentAction } from './actions';
import type { RAGFailure } from './types';

export const CONTEXT_ANSWER_FALLBACK =
  'I found relevant passages but could not format an answer properly.';

export const KNOWLEDGE_ANSWER_FALLBACK =
  'I could not find specific passages about this topic and could not compose an answer from general knowledge either.';

export const UNFORMATTED_ANSWER_FALLBACK =
  'I processed your question but encountered an issue with the response format.';

export const FAILURE_ANSWERS: Record<RAGFailure, string> = {
  oracle_unavailable:
    "I apologize, but I'm experiencing technical difficulties. Please try again later.",
  timeout:
    'I apologize, but answering your question took too long. Please try again with a more specific question.',
  internal_error:
    'I apologize, but I encountered an error while processing your question. Please try again.',
};

/**
 * Extract the user-facing text from the terminal action of a loop.
 * Always returns a non-empty string.
 */
export function resolveAnswerText(action: AgentAction): string {
  switch (action.action) {
    case 'ANSWER_CONTEXT':
      return action.answer ?? CONTEXT_ANSWER_FALLBACK;
    case 'ANSWER':
      return action.answer ?? KNOWLEDGE_ANSWER_FALLBACK;
    case 'MALFORMED':
      return action.rawText.trim().length > 0 ? action.rawText : UNFORMATTED_ANSWER_FALLBACK;
    case 'SEARCH':
      return UNFORMATTED_ANSWER_FALLBACK;
  }
}
