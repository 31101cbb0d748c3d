import { ExtractedRelationship, RelationshipEdge, edgeKey } from '../domain/types.js';
import { GraphStore } from '../graph/GraphStore.js';

export interface RewriteResult {
  edges: RelationshipEdge[];
  droppedSelfLoops: number;
  droppedDuplicates: number;
  droppedExisting: number;
  /** Edges whose endpoint has no resolved id (unknown or failed concept) */
  droppedUnresolved: number;
}

/**
 * Relationship Rewriter
 *
 * Points extracted edges at resolved node ids and drops what would become a
 * self-loop, a duplicate within the batch, or an edge the graph already has.
 */
export class RelationshipRewriter {
  constructor(private store: Pick<GraphStore, 'hasEdge'>) {}

  async rewrite(
    relationships: readonly ExtractedRelationship[],
    mapping: ReadonlyMap<string, string>
  ): Promise<RewriteResult> {
    const result: RewriteResult = {
      edges: [],
      droppedSelfLoops: 0,
      droppedDuplicates: 0,
      droppedExisting: 0,
      droppedUnresolved: 0,
    };
    const seen = new Set<string>();

    for (const relationship of relationships) {
      const sourceId = mapping.get(relationship.sourceId);
      const targetId = mapping.get(relationship.targetId);

      if (!sourceId || !targetId) {
        result.droppedUnresolved++;
        continue;
      }
      if (sourceId === targetId) {
        result.droppedSelfLoops++;
        continue;
      }

      const edge: RelationshipEdge = { ...relationship, sourceId, targetId };
      const key = edgeKey(edge);
      if (seen.has(key)) {
        result.droppedDuplicates++;
        continue;
      }
      seen.add(key);

      if (await this.store.hasEdge(edge)) {
        result.droppedExisting++;
        continue;
      }

      result.edges.push(edge);
    }

    return result;
  }
}
