import { InMemoryGraphStore } from '../../src/graph/InMemoryGraphStore.js';
import { node } from '../fixtures.js';

/**
 * Two issues (one with no applicable law), two laws reached from opposite
 * APPLIES_TO orientations, two remedies and three evidence types.
 */
export async function housingGraph(store = new InMemoryGraphStore()): Promise<InMemoryGraphStore> {
  const nodes = [
    node('issue:heat', { kind: 'issue', name: 'No heat' }),
    node('issue:mold', { kind: 'issue', name: 'Mold' }),
    node('law:whab', {
      name: 'Warranty of Habitability',
      jurisdiction: 'New York',
      details: { kind: 'law', citation: 'RPL § 235-b' },
    }),
    node('law:nj', { name: 'NJ Habitability Act', jurisdiction: 'New Jersey', authority: 'persuasive_authority' }),
    node('remedy:abate', { kind: 'remedy', name: 'Rent abatement' }),
    node('remedy:hp', { kind: 'remedy', name: 'HP action', authority: 'official_interpretive' }),
    node('evidence:photos', {
      kind: 'evidence_type',
      name: 'Photos',
      details: { kind: 'evidence_type', isCritical: true },
    }),
    node('evidence:timeline', { kind: 'evidence_type', name: 'Timeline of events' }),
    node('evidence:complaint', { kind: 'evidence_type', name: 'Complaint to 311' }),
  ];
  for (const n of nodes) {
    await store.upsertNode(n, null);
  }

  await store.getOrCreateEdge({ sourceId: 'law:whab', targetId: 'issue:heat', type: 'APPLIES_TO' });
  await store.getOrCreateEdge({ sourceId: 'issue:heat', targetId: 'law:nj', type: 'APPLIES_TO' });
  await store.getOrCreateEdge({ sourceId: 'law:whab', targetId: 'remedy:abate', type: 'ENABLES' });
  await store.getOrCreateEdge({ sourceId: 'law:whab', targetId: 'remedy:hp', type: 'ENABLES' });
  await store.getOrCreateEdge({
    sourceId: 'remedy:abate',
    targetId: 'evidence:photos',
    type: 'REQUIRES',
    evidenceLevel: 'required',
  });
  await store.getOrCreateEdge({ sourceId: 'remedy:abate', targetId: 'evidence:timeline', type: 'REQUIRES' });
  await store.getOrCreateEdge({ sourceId: 'remedy:abate', targetId: 'evidence:complaint', type: 'REQUIRES' });
  await store.getOrCreateEdge({ sourceId: 'remedy:hp', targetId: 'evidence:complaint', type: 'REQUIRES' });

  return store;
}
