import { NodeKind } from '../domain/types.js';
import { InMemoryGraphStore } from '../graph/InMemoryGraphStore.js';
import { normalizeName } from '../utils/text.js';

export interface SimilarityHit {
  nodeId: string;
  /** Normalized to [0, 1] */
  score: number;
}

/**
 * Text-similarity ranking over existing nodes of one kind.
 * Raises LookupUnavailableError when the backing index cannot be reached.
 */
export interface SimilaritySearch {
  findSimilar(name: string, kind: NodeKind, limit: number): Promise<SimilarityHit[]>;
}

/**
 * Character bigram Dice coefficient over normalized names
 */
export function diceSimilarity(a: string, b: string): number {
  const left = normalizeName(a);
  const right = normalizeName(b);
  if (left === right) return left.length > 0 ? 1 : 0;
  if (left.length < 2 || right.length < 2) return 0;

  const bigrams = new Map<string, number>();
  for (let i = 0; i < left.length - 1; i++) {
    const gram = left.slice(i, i + 2);
    bigrams.set(gram, (bigrams.get(gram) ?? 0) + 1);
  }

  let shared = 0;
  for (let i = 0; i < right.length - 1; i++) {
    const gram = right.slice(i, i + 2);
    const count = bigrams.get(gram) ?? 0;
    if (count > 0) {
      bigrams.set(gram, count - 1);
      shared++;
    }
  }

  return (2 * shared) / (left.length - 1 + (right.length - 1));
}

/**
 * Similarity search over an in-memory graph store
 */
export class InMemorySimilaritySearch implements SimilaritySearch {
  constructor(private store: InMemoryGraphStore) {}

  async findSimilar(name: string, kind: NodeKind, limit: number): Promise<SimilarityHit[]> {
    return this.store
      .listNodes(kind)
      .map((node) => ({ nodeId: node.id, score: diceSimilarity(name, node.name) }))
      .filter((hit) => hit.score > 0)
      .sort((a, b) => b.score - a.score || a.nodeId.localeCompare(b.nodeId))
      .slice(0, limit);
  }
}
