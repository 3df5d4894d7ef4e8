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
 * Informational texts served alongside answers
 *
 * @packageDocumentation
 */

export const INFO_TOPICS = ['start', 'help', 'about', 'language'] as const;

export type InfoTopic = (typeof INFO_TOPICS)[number];

const INFO_TEXTS: Record<InfoTopic, string> = {
  start: `*Welcome to the Qur'an Q&A assistant*

Ask a question about the Qur'an and I will look for the verses and tafsir
(commentary) that speak to it, then answer with references.

*How answers are built:*
- I search the verses and tafsir, sometimes several times for one question
- Each answer cites the surah and ayah it relies on
- When the sources are silent I say so, and answer from general knowledge

*Try asking:*
- "What does the Qur'an say about patience?"
- "How is charity described?"
- "What is said about keeping promises?"

*Topics:* start, help, about, language`,

  help: `*Asking questions*

Write your question in plain language. Specific questions get better answers:
ask about a topic, a story or a concept rather than a single word.

*Every answer contains:*
- Quotes from the verses with their surah and ayah reference
- Tafsir, labelled as a clarification, where the verse alone is not enough

*Endpoints:*
- POST / with { "question": "..." } to ask
- GET /search?q=... to see the matching passages
- GET /info/about for more on how this works`,

  about: `*About this assistant*

Answers come from an iterative retrieval loop. A language model reads your
question and decides whether to search the verse and tafsir index or to
answer. Search results are added to its context, and it may search again
with new queries until it can answer or its search budget runs out.

*Sources:* the verse texts and the tafsir shipped with the corpus. Answers
that go beyond them are marked as general knowledge.

This is a study aid. For questions of religious practice, consult a
qualified scholar.`,

  language: `*Languages*

*Available:* English, for both the verses and the tafsir.

Questions asked in other languages are answered in English for now. Further
translations depend on the corpus being extended with them.`,
};

export function isInfoTopic(topic: string): topic is InfoTopic {
  return INFO_TOPICS.some(candidate => candidate === topic);
}

export function getInfoText(topic: InfoTopic): string {
  return INFO_TEXTS[topic];
}
