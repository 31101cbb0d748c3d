import { Queryable } from '../config/database.js';
import { GraphStoreUnavailableError } from '../domain/errors.js';
import { isConnectionFailure } from './pgErrors.js';

/**
 * Bidirectional linkage between concept nodes and text chunks
 */
export interface ChunkStore {
  link(nodeId: string, chunkId: string): Promise<void>;
  chunksForNode(nodeId: string): Promise<string[]>;
  nodesForChunk(chunkId: string): Promise<string[]>;
}

export class InMemoryChunkStore implements ChunkStore {
  private byNode = new Map<string, string[]>();
  private byChunk = new Map<string, string[]>();

  async link(nodeId: string, chunkId: string): Promise<void> {
    addUnique(this.byNode, nodeId, chunkId);
    addUnique(this.byChunk, chunkId, nodeId);
  }

  async chunksForNode(nodeId: string): Promise<string[]> {
    return [...(this.byNode.get(nodeId) ?? [])];
  }

  async nodesForChunk(chunkId: string): Promise<string[]> {
    return [...(this.byChunk.get(chunkId) ?? [])];
  }
}

function addUnique(index: Map<string, string[]>, key: string, value: string): void {
  const values = index.get(key);
  if (!values) {
    index.set(key, [value]);
  } else if (!values.includes(value)) {
    values.push(value);
  }
}

/**
 * Chunk links in the node_chunks table
 */
export class PostgresChunkStore implements ChunkStore {
  constructor(private db: Queryable) {}

  async link(nodeId: string, chunkId: string): Promise<void> {
    await this.run(
      `INSERT INTO node_chunks (node_id, chunk_id) VALUES ($1, $2)
       ON CONFLICT (node_id, chunk_id) DO NOTHING`,
      [nodeId, chunkId]
    );
  }

  async chunksForNode(nodeId: string): Promise<string[]> {
    return this.column(
      'SELECT chunk_id AS value FROM node_chunks WHERE node_id = $1 ORDER BY linked_at, chunk_id',
      nodeId
    );
  }

  async nodesForChunk(chunkId: string): Promise<string[]> {
    return this.column(
      'SELECT node_id AS value FROM node_chunks WHERE chunk_id = $1 ORDER BY linked_at, node_id',
      chunkId
    );
  }

  private async column(text: string, key: string): Promise<string[]> {
    const result = await this.run(text, [key]);
    const values: string[] = [];
    for (const row of result.rows) {
      const value: unknown = row.value;
      if (typeof value === 'string') values.push(value);
    }
    return values;
  }

  private async run(text: string, values: unknown[]) {
    try {
      return await this.db.query(text, values);
    } catch (error) {
      if (isConnectionFailure(error)) {
        throw new GraphStoreUnavailableError('Chunk store unreachable', { cause: error });
      }
      throw error;
    }
  }
}
