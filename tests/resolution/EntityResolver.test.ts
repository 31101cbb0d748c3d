import { beforeEach, describe, expect, it } from 'vitest';
import { ResolutionSettings } from '../../src/config/resolution.js';
import { NodeKind } from '../../src/domain/types.js';
import { InMemoryGraphStore } from '../../src/graph/InMemoryGraphStore.js';
import { EntityResolver, ResolvableConcept } from '../../src/resolution/EntityResolver.js';
import { ResolutionContext } from '../../src/resolution/ResolutionContext.js';
import { JudgmentPair, JudgmentResult, JudgmentService } from '../../src/services/JudgmentService.js';
import { SimilarityHit, SimilaritySearch } from '../../src/services/SimilaritySearch.js';
import { node, sequentialIds, settings } from '../fixtures.js';

class FakeSimilarity implements SimilaritySearch {
  readonly calls: string[] = [];

  constructor(private answer: (name: string) => Promise<SimilarityHit[]> | SimilarityHit[]) {}

  async findSimilar(name: string, _kind: NodeKind, _limit: number): Promise<SimilarityHit[]> {
    this.calls.push(name);
    return this.answer(name);
  }
}

class FakeJudgment implements JudgmentService {
  readonly batches: JudgmentPair[][] = [];

  constructor(private verdict: (pairs: JudgmentPair[]) => Promise<JudgmentResult[]> | JudgmentResult[]) {}

  async judgeBatch(pairs: JudgmentPair[]): Promise<JudgmentResult[]> {
    this.batches.push(pairs);
    return this.verdict(pairs);
  }
}

const matchAll = (pairs: JudgmentPair[]): JudgmentResult[] => pairs.map(() => ({ status: 'matched' }));
const rejectAll = (pairs: JudgmentPair[]): JudgmentResult[] => pairs.map(() => ({ status: 'not_matched' }));

function concept(provisionalId: string, name = 'Rent Stabilization Law'): ResolvableConcept {
  return { provisionalId, kind: 'law', name };
}

describe('EntityResolver', () => {
  let store: InMemoryGraphStore;

  beforeEach(async () => {
    store = new InMemoryGraphStore();
    await store.upsertNode(node('law:rsl', { name: 'RSL' }), null);
  });

  function resolver(similarity: SimilaritySearch, judgment: JudgmentService, overrides: Partial<ResolutionSettings> = {}) {
    return new EntityResolver(similarity, judgment, store, settings(overrides), sequentialIds());
  }

  it('auto-merges at or above the auto-merge threshold without judgment', async () => {
    const judgment = new FakeJudgment(rejectAll);
    const similarity = new FakeSimilarity(() => [{ nodeId: 'law:rsl', score: 0.95 }]);

    const output = await resolver(similarity, judgment).resolve([concept('c1')], new ResolutionContext('doc-1'));

    expect(output.resolutions.get('c1')).toEqual({
      provisionalId: 'c1',
      nodeId: 'law:rsl',
      existing: true,
      decision: 'auto_merged',
    });
    expect(output.candidates).toEqual([
      { provisionalId: 'c1', candidateId: 'law:rsl', score: 0.95, outcome: 'auto_merge' },
    ]);
    expect(output.stats.autoMerged).toBe(1);
    expect(judgment.batches).toEqual([]);
  });

  it('creates a new node below the judgment threshold', async () => {
    const similarity = new FakeSimilarity(() => [{ nodeId: 'law:rsl', score: 0.5 }]);

    const output = await resolver(similarity, new FakeJudgment(matchAll)).resolve(
      [concept('c1')],
      new ResolutionContext('doc-1')
    );

    expect(output.resolutions.get('c1')).toEqual({
      provisionalId: 'c1',
      nodeId: 'law:new-1',
      existing: false,
      decision: 'created',
    });
    expect(output.candidates[0].outcome).toBe('create_new');
    expect(output.stats.created).toBe(1);
  });

  it('uses the best of the returned candidates', async () => {
    const similarity = new FakeSimilarity(() => [
      { nodeId: 'law:other', score: 0.6 },
      { nodeId: 'law:rsl', score: 0.97 },
    ]);

    const output = await resolver(similarity, new FakeJudgment(rejectAll)).resolve(
      [concept('c1')],
      new ResolutionContext('doc-1')
    );

    expect(output.resolutions.get('c1')?.nodeId).toBe('law:rsl');
  });

  it('merges an ambiguous pair when judgment confirms it', async () => {
    const judgment = new FakeJudgment(matchAll);
    const similarity = new FakeSimilarity(() => [{ nodeId: 'law:rsl', score: 0.8 }]);

    const output = await resolver(similarity, judgment).resolve([concept('c1')], new ResolutionContext('doc-1'));

    expect(output.resolutions.get('c1')).toMatchObject({
      nodeId: 'law:rsl',
      existing: true,
      decision: 'judgment_confirmed',
    });
    expect(output.candidates[0].outcome).toBe('needs_judgment');
    expect(judgment.batches).toEqual([
      [
        {
          incoming: { name: 'Rent Stabilization Law', kind: 'law', description: undefined },
          existing: { name: 'RSL', kind: 'law', description: undefined },
        },
      ],
    ]);
    expect(output.stats.judgmentConfirmed).toBe(1);
  });

  it('keeps an ambiguous pair apart when judgment rejects it', async () => {
    const similarity = new FakeSimilarity(() => [{ nodeId: 'law:rsl', score: 0.8 }]);

    const output = await resolver(similarity, new FakeJudgment(rejectAll)).resolve(
      [concept('c1')],
      new ResolutionContext('doc-1')
    );

    expect(output.resolutions.get('c1')).toMatchObject({
      nodeId: 'law:new-1',
      existing: false,
      decision: 'judgment_rejected',
    });
    expect(output.stats.judgmentRejected).toBe(1);
  });

  it('creates a new node when the ambiguous candidate has vanished', async () => {
    const judgment = new FakeJudgment(matchAll);
    const similarity = new FakeSimilarity(() => [{ nodeId: 'law:gone', score: 0.8 }]);

    const output = await resolver(similarity, judgment).resolve([concept('c1')], new ResolutionContext('doc-1'));

    expect(output.resolutions.get('c1')).toMatchObject({ nodeId: 'law:new-1', decision: 'created' });
    expect(judgment.batches).toEqual([]);
  });

  it('creates a new node when the lookup fails', async () => {
    const similarity = new FakeSimilarity(() => {
      throw new Error('index offline');
    });

    const output = await resolver(similarity, new FakeJudgment(matchAll)).resolve(
      [concept('c1')],
      new ResolutionContext('doc-1')
    );

    expect(output.resolutions.get('c1')).toMatchObject({ nodeId: 'law:new-1', decision: 'lookup_failed' });
    expect(output.stats).toMatchObject({ lookupFailures: 1, created: 1 });
  });

  it('creates a new node when the lookup times out', async () => {
    const similarity = new FakeSimilarity(() => new Promise<SimilarityHit[]>(() => {}));

    const output = await resolver(similarity, new FakeJudgment(matchAll), { similarityTimeoutMs: 10 }).resolve(
      [concept('c1')],
      new ResolutionContext('doc-1')
    );

    expect(output.resolutions.get('c1')?.decision).toBe('lookup_failed');
  });

  it('treats a failing judgment call as unavailable and never merges', async () => {
    const similarity = new FakeSimilarity(() => [{ nodeId: 'law:rsl', score: 0.8 }]);
    const judgment = new FakeJudgment(() => {
      throw new Error('model overloaded');
    });

    const output = await resolver(similarity, judgment).resolve([concept('c1')], new ResolutionContext('doc-1'));

    expect(output.resolutions.get('c1')).toMatchObject({
      nodeId: 'law:new-1',
      existing: false,
      decision: 'judgment_failed',
    });
    expect(output.stats.judgmentFailures).toBe(1);
  });

  it('pads missing verdicts as unavailable', async () => {
    await store.upsertNode(node('law:hpd', { name: 'HPD Code' }), null);
    const similarity = new FakeSimilarity((name) => [
      { nodeId: name === 'RSL Law' ? 'law:rsl' : 'law:hpd', score: 0.8 },
    ]);
    const judgment = new FakeJudgment(() => [{ status: 'matched' }]);

    const output = await resolver(similarity, judgment).resolve(
      [concept('c1', 'RSL Law'), concept('c2', 'Housing Code')],
      new ResolutionContext('doc-1')
    );

    expect(output.resolutions.get('c1')?.decision).toBe('judgment_confirmed');
    expect(output.resolutions.get('c2')?.decision).toBe('judgment_failed');
  });

  it('judges ambiguous pairs in batches of the configured size', async () => {
    const concepts = Array.from({ length: 12 }, (_, i) => concept(`c${i}`, `Local Law ${i}`));
    const similarity = new FakeSimilarity(() => [{ nodeId: 'law:rsl', score: 0.8 }]);
    const judgment = new FakeJudgment(matchAll);

    const output = await resolver(similarity, judgment).resolve(concepts, new ResolutionContext('doc-1'));

    expect(judgment.batches.map((b) => b.length).sort((a, b) => b - a)).toEqual([10, 2]);
    expect(output.stats.judgmentConfirmed).toBe(12);
  });

  it('looks up a repeated name once and reuses the decision', async () => {
    const similarity = new FakeSimilarity(() => [{ nodeId: 'law:rsl', score: 0.99 }]);

    const output = await resolver(similarity, new FakeJudgment(matchAll)).resolve(
      [concept('c1'), concept('c2', 'rent  stabilization LAW')],
      new ResolutionContext('doc-1')
    );

    expect(similarity.calls).toEqual(['Rent Stabilization Law']);
    expect(output.resolutions.get('c2')?.nodeId).toBe('law:rsl');
    expect(output.stats.cacheHits).toBe(1);
  });

  it('answers from the context cache without a lookup', async () => {
    const context = new ResolutionContext('doc-1');
    context.remember('law', 'Rent Stabilization Law', { nodeId: 'law:rsl', existing: true });
    const similarity = new FakeSimilarity(() => []);

    const output = await resolver(similarity, new FakeJudgment(matchAll)).resolve([concept('c1')], context);

    expect(similarity.calls).toEqual([]);
    expect(output.resolutions.get('c1')).toEqual({
      provisionalId: 'c1',
      nodeId: 'law:rsl',
      existing: true,
      decision: 'cached',
    });
    expect(output.stats.cacheHits).toBe(1);
  });
});
