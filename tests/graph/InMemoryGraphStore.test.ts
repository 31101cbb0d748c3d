import { beforeEach, describe, expect, it } from 'vitest';
import { ConcurrentMergeConflictError, MissingEndpointError } from '../../src/domain/errors.js';
import { InMemoryGraphStore } from '../../src/graph/InMemoryGraphStore.js';
import { node } from '../fixtures.js';

describe('InMemoryGraphStore', () => {
  let store: InMemoryGraphStore;

  beforeEach(async () => {
    store = new InMemoryGraphStore();
    await store.upsertNode(node('law:1', { name: 'Warranty of Habitability' }), null);
    await store.upsertNode(node('issue:1', { kind: 'issue', name: 'No heat' }), null);
    await store.upsertNode(node('remedy:1', { kind: 'remedy', name: 'Rent abatement' }), null);
  });

  describe('upsertNode', () => {
    it('bumps the version on a matching compare-and-swap', async () => {
      const current = await store.getNode('law:1');
      expect(current?.version).toBe(1);

      const version = await store.upsertNode(node('law:1', { name: 'Warranty of Habitability (RPL 235-b)' }), 1);

      expect(version).toBe(2);
      expect((await store.getNode('law:1'))?.node.name).toBe('Warranty of Habitability (RPL 235-b)');
    });

    it('rejects a stale expected version', async () => {
      await store.upsertNode(node('law:1'), 1);

      await expect(store.upsertNode(node('law:1'), 1)).rejects.toThrow(ConcurrentMergeConflictError);
    });

    it('rejects creating a node that already exists', async () => {
      await expect(store.upsertNode(node('law:1'), null)).rejects.toThrow('Node law:1 already exists');
    });

    it('hands out copies', async () => {
      const read = await store.getNode('law:1');
      read?.node.sourceIds.push('tampered');

      expect((await store.getNode('law:1'))?.node.sourceIds).toEqual(['doc-1']);
    });
  });

  describe('edges', () => {
    it('creates an edge once', async () => {
      const edge = { sourceId: 'law:1', targetId: 'issue:1', type: 'APPLIES_TO' as const };

      expect((await store.getOrCreateEdge(edge)).created).toBe(true);
      expect((await store.getOrCreateEdge({ ...edge, strength: 0.3 })).created).toBe(false);
      expect(await store.hasEdge(edge)).toBe(true);
      expect(store.listEdges()).toEqual([edge]);
    });

    it('refuses an edge to an unknown node', async () => {
      const error = await store
        .getOrCreateEdge({ sourceId: 'law:1', targetId: 'issue:404', type: 'APPLIES_TO' })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(MissingEndpointError);
      expect(error).toMatchObject({ nodeId: 'issue:404' });
    });
  });

  describe('traverse', () => {
    beforeEach(async () => {
      await store.getOrCreateEdge({ sourceId: 'issue:1', targetId: 'law:1', type: 'APPLIES_TO' });
      await store.getOrCreateEdge({ sourceId: 'law:1', targetId: 'remedy:1', type: 'ENABLES' });
    });

    it('follows edges in the requested direction', async () => {
      const outbound = await store.traverse('law:1', { relation: 'APPLIES_TO', direction: 'outbound' }, 10);
      const inbound = await store.traverse('law:1', { relation: 'APPLIES_TO', direction: 'inbound' }, 10);
      const any = await store.traverse('issue:1', { relation: 'APPLIES_TO', direction: 'any' }, 10);

      expect(outbound).toEqual([]);
      expect(inbound.map((h) => h.node.id)).toEqual(['issue:1']);
      expect(any.map((h) => h.node.id)).toEqual(['law:1']);
    });

    it('keeps only neighbours of the requested kinds', async () => {
      const step = { relation: 'ENABLES', direction: 'outbound', targetKinds: ['procedure'] } as const;

      expect(await store.traverse('law:1', step, 10)).toEqual([]);
    });

    it('stops at the limit', async () => {
      await store.getOrCreateEdge({ sourceId: 'remedy:1', targetId: 'law:1', type: 'APPLIES_TO' });

      const hits = await store.traverse('law:1', { relation: 'APPLIES_TO', direction: 'any' }, 1);

      expect(hits).toHaveLength(1);
      expect(hits[0].edge).toEqual({ sourceId: 'issue:1', targetId: 'law:1', type: 'APPLIES_TO' });
    });
  });

  it('lists nodes by kind', () => {
    expect(store.listNodes('remedy').map((n) => n.id)).toEqual(['remedy:1']);
    expect(store.listNodes()).toHaveLength(3);
  });
});
