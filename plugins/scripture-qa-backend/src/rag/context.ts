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

import { ScriptureDocument } from '../models';

/**
 * Render accumulated evidence as one text block, in the order the documents
 * were retrieved. Duplicates are kept and nothing is truncated.
 */
export function renderEvidence(documents: readonly ScriptureDocument[]): string {
  return documents
    .map(
      doc =>
        `chapter: ${doc.chapterName}\n` +
        `reference: ${doc.reference}\n` +
        `text: ${doc.text}\n` +
        `commentary: ${doc.commentary}\n` +
        `commentary_source: ${doc.commentarySource}\n\n`
    )
    .join('');
}
