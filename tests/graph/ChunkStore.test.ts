import { describe, expect, it } from 'vitest';
import { GraphStoreUnavailableError } from '../../src/domain/errors.js';
import { InMemoryChunkStore, PostgresChunkStore } from '../../src/graph/ChunkStore.js';
import { FakeDb, pgError } from '../fixtures.js';

describe('InMemoryChunkStore', () => {
  it('indexes links in both directions without repeats', async () => {
    const chunks = new InMemoryChunkStore();
    await chunks.link('law:1', 'chunk-1');
    await chunks.link('law:1', 'chunk-2');
    await chunks.link('law:1', 'chunk-1');
    await chunks.link('issue:1', 'chunk-1');

    expect(await chunks.chunksForNode('law:1')).toEqual(['chunk-1', 'chunk-2']);
    expect(await chunks.nodesForChunk('chunk-1')).toEqual(['law:1', 'issue:1']);
    expect(await chunks.nodesForChunk('chunk-9')).toEqual([]);
  });
});

describe('PostgresChunkStore', () => {
  it('inserts links idempotently', async () => {
    const db = new FakeDb();
    await new PostgresChunkStore(db).link('law:1', 'chunk-1');

    expect(db.queries[0].text).toContain('ON CONFLICT (node_id, chunk_id) DO NOTHING');
    expect(db.queries[0].values).toEqual(['law:1', 'chunk-1']);
  });

  it('reads one column of ids', async () => {
    const db = new FakeDb([[{ value: 'chunk-1' }, { value: 'chunk-2' }]]);

    expect(await new PostgresChunkStore(db).chunksForNode('law:1')).toEqual(['chunk-1', 'chunk-2']);
  });

  it('maps connection failures to GraphStoreUnavailableError', async () => {
    const db = new FakeDb([pgError('57P01', 'terminating connection due to administrator command')]);

    await expect(new PostgresChunkStore(db).nodesForChunk('chunk-1')).rejects.toThrow(GraphStoreUnavailableError);
  });
});
