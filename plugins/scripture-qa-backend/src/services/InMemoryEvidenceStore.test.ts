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

import { beforeEach, describe, expect, it } from '@jest/globals';
import { InMemoryEvidenceStore, tokenize } from './InMemoryEvidenceStore';
import { createMockLogger } from '../__fixtures__/logger';
import { createDocument } from '../__fixtures__/config';

describe('InMemoryEvidenceStore', () => {
  const inText = createDocument('d1', {
    text: 'Patience in hardship brings reward',
    commentary: '',
    chapterName: 'Opening',
  });
  const inCommentary = createDocument('d2', {
    text: 'Prayer at dawn',
    commentary: 'Patience is mentioned here too',
    chapterName: 'Opening',
  });
  const inChapterName = createDocument('d3', {
    text: 'Charity',
    commentary: '',
    chapterName: 'Patience',
  });

  let store: InMemoryEvidenceStore;

  beforeEach(async () => {
    store = new InMemoryEvidenceStore(createMockLogger());
    await store.replaceAll([inText, inCommentary, inChapterName]);
  });

  const ids = async (query: string, limit = 10) =>
    (await store.search(query, limit)).map(result => result.document.id);

  it('ranks matches by boosted field scores', async () => {
    await expect(ids('patience')).resolves.toEqual(['d3', 'd1', 'd2']);
  });

  it('bounds the number of results', async () => {
    await expect(ids('patience', 2)).resolves.toEqual(['d3', 'd1']);
  });

  it('returns only documents with a positive score', async () => {
    const results = await store.search('dawn', 10);

    expect(results.map(result => result.document.id)).toEqual(['d2']);
    expect(results[0].score).toBeGreaterThan(0);
  });

  it('returns nothing for unmatched, blank or unbounded queries', async () => {
    await expect(ids('astronomy')).resolves.toEqual([]);
    await expect(ids('  !? ')).resolves.toEqual([]);
    await expect(ids('patience', 0)).resolves.toEqual([]);
  });

  it('keeps index order for equal scores', async () => {
    await store.replaceAll([
      createDocument('first', { text: 'mercy', commentary: '' }),
      createDocument('second', { text: 'mercy', commentary: '' }),
    ]);

    await expect(ids('mercy')).resolves.toEqual(['first', 'second']);
  });

  it('replaces the whole corpus', async () => {
    await store.replaceAll([createDocument('d4', { text: 'Mercy', commentary: '', chapterName: 'Opening' })]);

    await expect(store.count()).resolves.toBe(1);
    await expect(ids('patience')).resolves.toEqual([]);
    await expect(ids('mercy')).resolves.toEqual(['d4']);
  });

  it('keeps the last of several documents sharing an id', async () => {
    await store.replaceAll([
      createDocument('d1', { text: 'Patience', commentary: '' }),
      createDocument('d1', { text: 'Mercy', commentary: '' }),
    ]);

    await expect(store.count()).resolves.toBe(1);
    await expect(ids('patience')).resolves.toEqual([]);
    await expect(ids('mercy')).resolves.toEqual(['d1']);
  });

  it('empties the store when given no documents', async () => {
    await store.replaceAll([]);

    await expect(store.count()).resolves.toBe(0);
    await expect(ids('patience')).resolves.toEqual([]);
  });
});

describe('tokenize', () => {
  it('lowercases letters and numbers and drops punctuation', () => {
    expect(tokenize('Ṣabr and PATIENCE, verse 2:153!')).toEqual(['ṣabr', 'and', 'patience', 'verse', '2', '153']);
  });
});
