import fs from 'fs/promises';
import pg from 'pg';
import { fileURLToPath } from 'url';
import { Queryable } from '../config/database.js';
import {
  ConcurrentMergeConflictError,
  GraphStoreUnavailableError,
  MissingEndpointError,
} from '../domain/errors.js';
import { ConceptNode, EdgeRef, RelationshipEdge, VersionedNode } from '../domain/types.js';
import { createLogger } from '../utils/logger.js';
import { validator } from '../utils/validators.js';
import { EdgeWriteResult, GraphStore, TraversalHit, TraversalStep } from './GraphStore.js';
import { FOREIGN_KEY_VIOLATION, isConnectionFailure, pgErrorCode } from './pgErrors.js';
import { EdgeRow, isConceptNode, isEdgeRow, isVersionRow } from './rowSchemas.js';

const SCHEMA_PATH = fileURLToPath(new URL('../../sql/schema.sql', import.meta.url));

/**
 * PostgreSQL Graph Store
 *
 * Nodes are JSONB documents with an integer version used for compare-and-swap.
 * Edges are keyed by (source_id, target_id, type) with foreign keys to nodes.
 */
export class PostgresGraphStore implements GraphStore {
  private logger = createLogger('PostgresGraphStore');

  constructor(private db: Queryable) {}

  /**
   * Apply sql/schema.sql (idempotent)
   */
  async ensureSchema(): Promise<void> {
    const ddl = await fs.readFile(SCHEMA_PATH, 'utf-8');
    await this.run(ddl);
    this.logger.info('Graph schema ensured');
  }

  async getNode(id: string): Promise<VersionedNode | null> {
    const result = await this.run('SELECT document, version FROM concept_nodes WHERE id = $1', [id]);
    const row = result.rows[0];
    if (!row) return null;

    return { node: this.parseNode(row.document), version: this.parseVersion(row) };
  }

  async upsertNode(node: ConceptNode, expectedVersion: number | null): Promise<number> {
    const document = JSON.stringify(node);

    const result =
      expectedVersion === null
        ? await this.run(
            `INSERT INTO concept_nodes (id, kind, name, document, version)
             VALUES ($1, $2, $3, $4::jsonb, 1)
             ON CONFLICT (id) DO NOTHING
             RETURNING version`,
            [node.id, node.kind, node.name, document]
          )
        : await this.run(
            `UPDATE concept_nodes
             SET kind = $2, name = $3, document = $4::jsonb, version = version + 1, updated_at = NOW()
             WHERE id = $1 AND version = $5
             RETURNING version`,
            [node.id, node.kind, node.name, document, expectedVersion]
          );

    const row = result.rows[0];
    if (!row) {
      throw new ConcurrentMergeConflictError(node.id, expectedVersion);
    }
    return this.parseVersion(row);
  }

  async getOrCreateEdge(edge: RelationshipEdge): Promise<EdgeWriteResult> {
    let inserted: pg.QueryResult<pg.QueryResultRow>;
    try {
      inserted = await this.run(
        `INSERT INTO relationship_edges (source_id, target_id, type, strength, evidence_level, attributes)
         VALUES ($1, $2, $3, $4, $5, $6::jsonb)
         ON CONFLICT (source_id, target_id, type) DO NOTHING
         RETURNING source_id`,
        [
          edge.sourceId,
          edge.targetId,
          edge.type,
          edge.strength ?? null,
          edge.evidenceLevel ?? null,
          JSON.stringify(edge.attributes ?? {}),
        ]
      );
    } catch (error) {
      if (pgErrorCode(error) === FOREIGN_KEY_VIOLATION) {
        const missing = (await this.getNode(edge.sourceId)) ? edge.targetId : edge.sourceId;
        throw new MissingEndpointError(missing);
      }
      throw error;
    }

    if (inserted.rows.length > 0) {
      return { edge, created: true };
    }

    const existing = await this.run(
      `SELECT source_id, target_id, type, strength, evidence_level, attributes
       FROM relationship_edges
       WHERE source_id = $1 AND target_id = $2 AND type = $3`,
      [edge.sourceId, edge.targetId, edge.type]
    );
    const row = existing.rows[0];
    return { edge: row ? this.parseEdge(row) : edge, created: false };
  }

  async hasEdge(ref: EdgeRef): Promise<boolean> {
    const result = await this.run(
      `SELECT 1 FROM relationship_edges WHERE source_id = $1 AND target_id = $2 AND type = $3`,
      [ref.sourceId, ref.targetId, ref.type]
    );
    return result.rows.length > 0;
  }

  async traverse(startId: string, step: TraversalStep, limit: number): Promise<TraversalHit[]> {
    const result = await this.run(
      `SELECT e.source_id, e.target_id, e.type, e.strength, e.evidence_level, e.attributes,
              n.document
       FROM relationship_edges e
       JOIN concept_nodes n
         ON n.id = CASE WHEN e.source_id = $1 AND $3 THEN e.target_id ELSE e.source_id END
       WHERE e.type = $2
         AND (($3 AND e.source_id = $1) OR ($4 AND e.target_id = $1))
         AND ($5::text[] IS NULL OR n.kind = ANY($5::text[]))
       ORDER BY e.created_at, e.source_id, e.target_id
       LIMIT $6`,
      [
        startId,
        step.relation,
        step.direction !== 'inbound',
        step.direction !== 'outbound',
        step.targetKinds ? [...step.targetKinds] : null,
        limit,
      ]
    );

    return result.rows.map((row) => ({
      node: this.parseNode(row.document),
      edge: this.parseEdge(row),
    }));
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /**
   * Run a query, mapping connection-level failures to GraphStoreUnavailableError
   */
  private async run(text: string, values?: unknown[]): Promise<pg.QueryResult<pg.QueryResultRow>> {
    try {
      return await this.db.query(text, values);
    } catch (error) {
      if (isConnectionFailure(error)) {
        this.logger.error('Graph store unreachable', {
          error: error instanceof Error ? error.message : String(error),
        });
        throw new GraphStoreUnavailableError('Graph store unreachable', { cause: error });
      }
      throw error;
    }
  }

  private parseNode(document: unknown): ConceptNode {
    const result = validator.validate(isConceptNode, document);
    if (!result.data) {
      throw new Error(`Stored node document is malformed:\n${validator.formatErrors(result.errors)}`);
    }
    return result.data;
  }

  private parseVersion(row: unknown): number {
    const result = validator.validate(isVersionRow, row);
    if (!result.data) {
      throw new Error(`Stored node version is malformed:\n${validator.formatErrors(result.errors)}`);
    }
    return result.data.version;
  }

  private parseEdge(row: unknown): RelationshipEdge {
    const result = validator.validate(isEdgeRow, row);
    if (!result.data) {
      throw new Error(`Stored edge is malformed:\n${validator.formatErrors(result.errors)}`);
    }
    return toEdge(result.data);
  }
}

function toEdge(row: EdgeRow): RelationshipEdge {
  const edge: RelationshipEdge = {
    sourceId: row.source_id,
    targetId: row.target_id,
    type: row.type,
  };
  if (row.strength !== null) edge.strength = row.strength;
  if (row.evidence_level !== null) edge.evidenceLevel = row.evidence_level;
  if (Object.keys(row.attributes).length > 0) edge.attributes = row.attributes;
  return edge;
}
