import pLimit from 'p-limit';
import { ResolutionSettings } from '../config/resolution.js';
import { ConcurrentMergeConflictError, InvalidBatchError, MissingEndpointError } from '../domain/errors.js';
import {
  ConceptNode,
  ExtractedConcept,
  ExtractedRelationship,
  ExtractionBatch,
  IncomingConcept,
  VersionedNode,
} from '../domain/types.js';
import { ChunkStore } from '../graph/ChunkStore.js';
import { GraphStore } from '../graph/GraphStore.js';
import { JudgmentService } from '../services/JudgmentService.js';
import { SimilaritySearch } from '../services/SimilaritySearch.js';
import { IngestionLogger } from '../utils/logger.js';
import { unionInto } from '../utils/text.js';
import { validator } from '../utils/validators.js';
import { isExtractionBatch } from './batchSchema.js';
import { PendingConcept, deduplicateConcepts } from './deduplicate.js';
import { AttributeConflict, createNodeFromIncoming, mergeNode } from './EntityMerger.js';
import {
  CandidateMatch,
  EntityResolver,
  NodeIdFactory,
  ResolverStats,
  mintNodeId,
} from './EntityResolver.js';
import { inferRelationships } from './RelationshipInference.js';
import { RelationshipRewriter } from './RelationshipRewriter.js';
import { ResolutionContext } from './ResolutionContext.js';

export interface NodeFailure {
  nodeId: string;
  provisionalIds: string[];
  reason: string;
}

export interface WriteStats {
  nodesCreated: number;
  nodesMerged: number;
  nodesUnchanged: number;
  /** Resolved to an existing node that was no longer stored */
  staleMatches: number;
  /** Node written, but its chunk list could not be refreshed from the chunk store */
  chunkRefreshConflicts: number;
}

export interface RelationshipStats {
  received: number;
  inferred: number;
  created: number;
  alreadyPresent: number;
  droppedSelfLoops: number;
  droppedDuplicates: number;
  droppedUnresolved: number;
  droppedMissingEndpoint: number;
}

export interface ResolutionReport {
  sourceId: string;
  conceptsReceived: number;
  conceptsAfterDedup: number;
  resolution: ResolverStats;
  writes: WriteStats;
  relationships: RelationshipStats;
  mergeFailures: NodeFailure[];
  attributeConflicts: AttributeConflict[];
  candidates: CandidateMatch[];
  /** Provisional id -> resolved node id, for concepts that were written */
  mapping: Record<string, string>;
}

export interface ConsolidationDependencies {
  store: GraphStore;
  chunks: ChunkStore;
  similarity: SimilaritySearch;
  judgment: JudgmentService;
  settings: ResolutionSettings;
  mintId?: NodeIdFactory;
}

type WriteOutcome = 'created' | 'merged' | 'unchanged';

/**
 * Consolidation Pipeline
 *
 * resolveAndMerge: validate -> dedupe within the document -> (infer) ->
 * resolve -> merge nodes -> link chunks -> rewrite and write edges.
 *
 * Per-concept failures are counted in the report. Only an unreachable graph
 * store (or another unexpected store error) and an invalid batch throw.
 */
export class ConsolidationPipeline {
  private resolver: EntityResolver;
  private rewriter: RelationshipRewriter;
  private mintId: NodeIdFactory;

  constructor(private deps: ConsolidationDependencies) {
    this.mintId = deps.mintId ?? mintNodeId;
    this.resolver = new EntityResolver(deps.similarity, deps.judgment, deps.store, deps.settings, this.mintId);
    this.rewriter = new RelationshipRewriter(deps.store);
  }

  async resolveAndMerge(input: unknown): Promise<ResolutionReport> {
    const batch = this.validate(input);
    const { source } = batch;
    const log = new IngestionLogger(source.sourceId, 'Consolidation');
    log.started({ concepts: batch.concepts.length, relationships: batch.relationships.length });

    try {
      const context = new ResolutionContext(source.sourceId);

      // Provenance + within-document dedupe
      const pending = deduplicateConcepts(
        batch.concepts.map((concept) => ({
          provisionalId: concept.provisionalId,
          incoming: toIncoming(batch, concept),
        }))
      );

      const relationships: ExtractedRelationship[] = [...batch.relationships];
      let inferredCount = 0;
      if (this.deps.settings.inferRelationships) {
        const inferred = inferRelationships(pending, batch.relationships);
        inferredCount = inferred.length;
        relationships.push(...inferred);
        log.debug('Inferred relationships', { count: inferredCount });
      }

      log.statusChange('extracted', 'resolving', { concepts: pending.length });
      const resolved = await this.resolver.resolve(
        pending.map(({ provisionalIds, incoming }) => ({
          provisionalId: provisionalIds[0],
          kind: incoming.kind,
          name: incoming.name,
          description: incoming.description,
        })),
        context
      );

      log.statusChange('resolving', 'merging');
      const report: ResolutionReport = {
        sourceId: source.sourceId,
        conceptsReceived: batch.concepts.length,
        conceptsAfterDedup: pending.length,
        resolution: resolved.stats,
        writes: { nodesCreated: 0, nodesMerged: 0, nodesUnchanged: 0, staleMatches: 0, chunkRefreshConflicts: 0 },
        relationships: {
          received: batch.relationships.length,
          inferred: inferredCount,
          created: 0,
          alreadyPresent: 0,
          droppedSelfLoops: 0,
          droppedDuplicates: 0,
          droppedUnresolved: 0,
          droppedMissingEndpoint: 0,
        },
        mergeFailures: [],
        attributeConflicts: [],
        candidates: resolved.candidates,
        mapping: {},
      };

      // Writes to one node run in order; distinct nodes run concurrently
      const byNode = new Map<string, { existing: boolean; items: PendingConcept[] }>();
      for (const item of pending) {
        const resolution = resolved.resolutions.get(item.provisionalIds[0]);
        if (!resolution) continue;
        const group = byNode.get(resolution.nodeId);
        if (group) group.items.push(item);
        else byNode.set(resolution.nodeId, { existing: resolution.existing, items: [item] });
      }

      const mapping = new Map<string, string>();
      const limit = pLimit(this.deps.settings.lookupConcurrency);
      await Promise.all(
        [...byNode.entries()].map(([nodeId, group]) =>
          limit(() => this.applyGroup(nodeId, group.existing, group.items, report, mapping, log))
        )
      );
      report.mapping = Object.fromEntries(mapping);

      log.statusChange('merging', 'linking');
      const rewritten = await this.rewriter.rewrite(relationships, mapping);
      report.relationships.droppedSelfLoops = rewritten.droppedSelfLoops;
      report.relationships.droppedDuplicates = rewritten.droppedDuplicates;
      report.relationships.droppedUnresolved = rewritten.droppedUnresolved;
      report.relationships.alreadyPresent = rewritten.droppedExisting;

      for (const edge of rewritten.edges) {
        try {
          const { created } = await this.deps.store.getOrCreateEdge(edge);
          if (created) report.relationships.created++;
          else report.relationships.alreadyPresent++;
        } catch (error) {
          if (!(error instanceof MissingEndpointError)) throw error;
          report.relationships.droppedMissingEndpoint++;
          log.warn('Dropped edge with missing endpoint', {
            sourceId: edge.sourceId,
            targetId: edge.targetId,
            type: edge.type,
            missing: error.nodeId,
          });
        }
      }

      log.completed({
        ...report.resolution,
        ...report.writes,
        edgesCreated: report.relationships.created,
        mergeFailures: report.mergeFailures.length,
        attributeConflicts: report.attributeConflicts.length,
      });
      return report;
    } catch (error) {
      log.failed(error);
      throw error;
    }
  }

  // ==========================================================================
  // Node writes
  // ==========================================================================

  private async applyGroup(
    resolvedId: string,
    resolvedExisting: boolean,
    items: PendingConcept[],
    report: ResolutionReport,
    mapping: Map<string, string>,
    log: IngestionLogger
  ): Promise<void> {
    let nodeId = resolvedId;

    for (const item of items) {
      let conflicts: AttributeConflict[] = [];

      try {
        const outcome = await this.writeWithRetry(nodeId, (current) => {
          if (current) {
            const merged = mergeNode(current.node, item.incoming);
            conflicts = merged.attributeConflicts;
            return merged.changes.length > 0 ? { node: merged.node, outcome: 'merged' } : null;
          }

          conflicts = [];
          if (resolvedExisting && nodeId === resolvedId) {
            // Matched node is gone; start a fresh one instead
            report.writes.staleMatches++;
            nodeId = this.mintId(item.incoming.kind);
          }
          return { node: createNodeFromIncoming(nodeId, item.incoming), outcome: 'created' };
        });

        if (conflicts.length > 0) {
          report.attributeConflicts.push(...conflicts);
          log.warn('Attribute conflicts kept first value', {
            nodeId,
            keys: conflicts.map((c) => c.key),
          });
        }

        if (outcome === 'created') report.writes.nodesCreated++;
        else if (outcome === 'merged') report.writes.nodesMerged++;
        else report.writes.nodesUnchanged++;

        for (const provisionalId of item.provisionalIds) {
          mapping.set(provisionalId, nodeId);
        }
      } catch (error) {
        if (!(error instanceof ConcurrentMergeConflictError)) throw error;
        report.mergeFailures.push({ nodeId, provisionalIds: item.provisionalIds, reason: error.message });
        log.warn('Merge abandoned after repeated conflicts', {
          nodeId,
          name: item.incoming.name,
          attempts: this.deps.settings.maxMergeAttempts,
        });
        continue;
      }

      await this.linkChunks(nodeId, item.incoming.chunkIds, report, log);
    }
  }

  /**
   * Read-modify-write under compare-and-swap. `build` sees the current state
   * on every attempt and returns null when nothing needs writing.
   */
  private async writeWithRetry(
    nodeId: string,
    build: (current: VersionedNode | null) => { node: ConceptNode; outcome: WriteOutcome } | null
  ): Promise<WriteOutcome> {
    const attempts = this.deps.settings.maxMergeAttempts;

    for (let attempt = 1; ; attempt++) {
      const current = await this.deps.store.getNode(nodeId);
      const next = build(current);
      if (!next) return 'unchanged';

      try {
        await this.deps.store.upsertNode(next.node, current ? current.version : null);
        return next.outcome;
      } catch (error) {
        if (!(error instanceof ConcurrentMergeConflictError) || attempt >= attempts) throw error;
      }
    }
  }

  /**
   * Link chunk ids and refresh the node's chunk list from the chunk store
   */
  private async linkChunks(
    nodeId: string,
    chunkIds: readonly string[],
    report: ResolutionReport,
    log: IngestionLogger
  ): Promise<void> {
    if (chunkIds.length === 0) return;

    for (const chunkId of chunkIds) {
      await this.deps.chunks.link(nodeId, chunkId);
    }
    const linked = await this.deps.chunks.chunksForNode(nodeId);

    try {
      await this.writeWithRetry(nodeId, (current) => {
        if (!current) return null;
        const merged = unionInto(current.node.chunkIds, linked);
        if (merged.length === current.node.chunkIds.length) return null;
        return { node: { ...current.node, chunkIds: merged }, outcome: 'merged' };
      });
    } catch (error) {
      if (!(error instanceof ConcurrentMergeConflictError)) throw error;
      // Links are stored; the node's copy catches up on its next merge
      report.writes.chunkRefreshConflicts++;
      log.warn('Chunk list refresh abandoned after repeated conflicts', { nodeId, linked: linked.length });
    }
  }

  private validate(input: unknown): ExtractionBatch {
    const result = validator.validate(isExtractionBatch, input);
    if (!result.data) {
      throw new InvalidBatchError(`Invalid extraction batch:\n${validator.formatErrors(result.errors)}`);
    }

    const batch = result.data;
    const seen = new Set<string>();
    for (const concept of batch.concepts) {
      if (seen.has(concept.provisionalId)) {
        throw new InvalidBatchError(`Duplicate provisional id '${concept.provisionalId}'`);
      }
      seen.add(concept.provisionalId);

      if (concept.details && concept.details.kind !== concept.kind) {
        throw new InvalidBatchError(
          `Concept '${concept.provisionalId}' is a ${concept.kind} but carries ${concept.details.kind} details`
        );
      }
    }
    return batch;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function toIncoming(batch: ExtractionBatch, concept: ExtractedConcept): IncomingConcept {
  const { source } = batch;
  return {
    kind: concept.kind,
    name: concept.name.trim(),
    description: concept.description,
    authority: concept.authority ?? source.authority,
    jurisdiction: concept.jurisdiction ?? source.jurisdiction,
    attributes: { ...concept.attributes },
    quotes: concept.quote ? [{ ...concept.quote, sourceId: source.sourceId }] : [],
    sourceId: source.sourceId,
    chunkIds: concept.chunkIds ?? batch.chunkIds ?? [],
    details: concept.details,
  };
}
