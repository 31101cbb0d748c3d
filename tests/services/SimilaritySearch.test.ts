import { describe, expect, it } from 'vitest';
import { LookupUnavailableError } from '../../src/domain/errors.js';
import { InMemoryGraphStore } from '../../src/graph/InMemoryGraphStore.js';
import { PostgresSimilaritySearch } from '../../src/services/PostgresSimilaritySearch.js';
import { InMemorySimilaritySearch, diceSimilarity } from '../../src/services/SimilaritySearch.js';
import { FakeDb, node } from '../fixtures.js';

describe('diceSimilarity', () => {
  it('is 1 for names equal after normalization', () => {
    expect(diceSimilarity('RSL', ' rsl ')).toBe(1);
  });

  it('scores shared character bigrams', () => {
    expect(diceSimilarity('night', 'nacht')).toBe(0.25);
    expect(diceSimilarity('Rent Stabilization Law', 'Rent Stabilization Laws')).toBeCloseTo(42 / 43);
  });

  it('is 0 for empty or single-character names', () => {
    expect(diceSimilarity('', '')).toBe(0);
    expect(diceSimilarity('a', 'ab')).toBe(0);
  });
});

describe('InMemorySimilaritySearch', () => {
  it('ranks nodes of the requested kind and stops at the limit', async () => {
    const store = new InMemoryGraphStore();
    await store.upsertNode(node('law:2', { name: 'Rent Stabilization Laws' }), null);
    await store.upsertNode(node('law:1', { name: 'Rent Stabilization Law' }), null);
    await store.upsertNode(node('law:3', { name: 'Eviction' }), null);
    await store.upsertNode(node('issue:1', { kind: 'issue', name: 'Rent Stabilization Law' }), null);

    const hits = await new InMemorySimilaritySearch(store).findSimilar('Rent Stabilization Law', 'law', 2);

    expect(hits.map((h) => h.nodeId)).toEqual(['law:1', 'law:2']);
    expect(hits[0].score).toBe(1);
  });
});

describe('PostgresSimilaritySearch', () => {
  it('reads trigram scores for the kind', async () => {
    const db = new FakeDb([
      [
        { id: 'law:1', score: '0.83' },
        { id: 5, score: 1 },
      ],
    ]);

    const hits = await new PostgresSimilaritySearch(db).findSimilar('RSL', 'law', 3);

    expect(hits).toEqual([{ nodeId: 'law:1', score: 0.83 }]);
    expect(db.queries[0].values).toEqual(['RSL', 'law', 3]);
  });

  it('raises LookupUnavailableError on any failure', async () => {
    const db = new FakeDb([new Error('boom')]);

    const error = await new PostgresSimilaritySearch(db).findSimilar('RSL', 'law', 3).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LookupUnavailableError);
    expect(error).toMatchObject({ message: 'Similarity search failed: boom' });
  });
});
