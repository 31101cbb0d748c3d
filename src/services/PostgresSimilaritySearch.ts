import { Queryable } from '../config/database.js';
import { LookupUnavailableError } from '../domain/errors.js';
import { NodeKind } from '../domain/types.js';
import { SimilarityHit, SimilaritySearch } from './SimilaritySearch.js';

/**
 * Trigram similarity (pg_trgm) over node names of the same kind
 */
export class PostgresSimilaritySearch implements SimilaritySearch {
  constructor(private db: Queryable) {}

  async findSimilar(name: string, kind: NodeKind, limit: number): Promise<SimilarityHit[]> {
    try {
      const result = await this.db.query(
        `SELECT id, similarity(lower(name), lower($1)) AS score
         FROM concept_nodes
         WHERE kind = $2 AND lower(name) % lower($1)
         ORDER BY score DESC, id
         LIMIT $3`,
        [name, kind, limit]
      );

      const hits: SimilarityHit[] = [];
      for (const row of result.rows) {
        const id: unknown = row.id;
        const score = Number(row.score);
        if (typeof id === 'string' && Number.isFinite(score)) {
          hits.push({ nodeId: id, score: Math.min(1, Math.max(0, score)) });
        }
      }
      return hits;
    } catch (error) {
      throw new LookupUnavailableError(
        `Similarity search failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}
