import { randomUUID } from 'crypto';
import pLimit from 'p-limit';
import { ResolutionSettings } from '../config/resolution.js';
import { ConceptNode, NodeKind } from '../domain/types.js';
import { GraphStore } from '../graph/GraphStore.js';
import { JudgmentPair, JudgmentResult, JudgmentService } from '../services/JudgmentService.js';
import { SimilarityHit, SimilaritySearch } from '../services/SimilaritySearch.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import { conceptKey } from './deduplicate.js';
import { ResolutionContext } from './ResolutionContext.js';

const logger = createLogger('EntityResolver');

export interface ResolvableConcept {
  provisionalId: string;
  kind: NodeKind;
  name: string;
  description?: string;
}

export type MatchOutcome = 'auto_merge' | 'needs_judgment' | 'create_new';

/**
 * Transient record of the best candidate found for a concept
 */
export interface CandidateMatch {
  provisionalId: string;
  candidateId: string;
  score: number;
  outcome: MatchOutcome;
}

export type ResolutionDecision =
  | 'auto_merged'
  | 'judgment_confirmed'
  | 'judgment_rejected'
  | 'judgment_failed'
  | 'lookup_failed'
  | 'created'
  | 'cached';

export interface ResolvedConcept {
  provisionalId: string;
  nodeId: string;
  /** True when nodeId names a node already in the graph */
  existing: boolean;
  decision: ResolutionDecision;
}

export interface ResolverStats {
  autoMerged: number;
  judgmentConfirmed: number;
  judgmentRejected: number;
  created: number;
  cacheHits: number;
  lookupFailures: number;
  judgmentFailures: number;
}

export interface ResolverOutput {
  resolutions: Map<string, ResolvedConcept>;
  candidates: CandidateMatch[];
  stats: ResolverStats;
}

export type NodeIdFactory = (kind: NodeKind) => string;

export const mintNodeId: NodeIdFactory = (kind) => `${kind}:${randomUUID()}`;

interface AmbiguousPair {
  group: ResolvableConcept[];
  candidate: ConceptNode;
}

type LookupOutcome = { type: 'failed'; reason: string } | { type: 'found'; best: SimilarityHit | undefined };

export function emptyResolverStats(): ResolverStats {
  return {
    autoMerged: 0,
    judgmentConfirmed: 0,
    judgmentRejected: 0,
    created: 0,
    cacheHits: 0,
    lookupFailures: 0,
    judgmentFailures: 0,
  };
}

/**
 * Entity Resolver
 *
 * Maps each concept of one document to an existing node or a freshly minted
 * id. Similarity lookups run concurrently across concepts; ambiguous pairs
 * are judged in batches. A failed lookup or judgment never merges.
 */
export class EntityResolver {
  constructor(
    private similarity: SimilaritySearch,
    private judgment: JudgmentService,
    private store: Pick<GraphStore, 'getNode'>,
    private settings: ResolutionSettings,
    private mintId: NodeIdFactory = mintNodeId
  ) {}

  async resolve(concepts: readonly ResolvableConcept[], context: ResolutionContext): Promise<ResolverOutput> {
    const output: ResolverOutput = {
      resolutions: new Map(),
      candidates: [],
      stats: emptyResolverStats(),
    };

    // Same kind + name share one decision
    const groups = new Map<string, ResolvableConcept[]>();
    for (const concept of concepts) {
      const key = conceptKey(concept.kind, concept.name);
      const group = groups.get(key);
      if (group) group.push(concept);
      else groups.set(key, [concept]);
    }

    const fresh: ResolvableConcept[][] = [];
    for (const group of groups.values()) {
      const cached = context.get(group[0].kind, group[0].name);
      if (cached) {
        output.stats.cacheHits += group.length;
        for (const concept of group) {
          output.resolutions.set(concept.provisionalId, {
            provisionalId: concept.provisionalId,
            ...cached,
            decision: 'cached',
          });
        }
        continue;
      }
      output.stats.cacheHits += group.length - 1;
      fresh.push(group);
    }

    const limit = pLimit(this.settings.lookupConcurrency);
    const lookups = await Promise.all(fresh.map((group) => limit(() => this.lookup(group[0], context))));

    const pendingFetch: Array<{ group: ResolvableConcept[]; best: SimilarityHit }> = [];

    fresh.forEach((group, index) => {
      const lookup = lookups[index];
      const lead = group[0];

      if (lookup.type === 'failed') {
        output.stats.lookupFailures++;
        this.settleNew(output, context, group, 'lookup_failed');
        return;
      }

      const best = lookup.best;
      if (!best || best.score < this.settings.judgmentThreshold) {
        if (best) this.record(output, lead, best, 'create_new');
        this.settleNew(output, context, group, 'created');
        return;
      }

      if (best.score >= this.settings.autoMergeThreshold) {
        this.record(output, lead, best, 'auto_merge');
        output.stats.autoMerged++;
        this.settle(output, context, group, best.nodeId, true, 'auto_merged');
        logger.debug('Auto-merged', { sourceId: context.sourceId, name: lead.name, score: best.score });
        return;
      }

      this.record(output, lead, best, 'needs_judgment');
      pendingFetch.push({ group, best });
    });

    const fetched = await Promise.all(
      pendingFetch.map(({ group, best }) =>
        limit(async () => ({ group, candidate: (await this.store.getNode(best.nodeId))?.node }))
      )
    );

    const ambiguous: AmbiguousPair[] = [];
    for (const { group, candidate } of fetched) {
      if (candidate) {
        ambiguous.push({ group, candidate });
      } else {
        // Candidate vanished between lookup and judgment
        this.settleNew(output, context, group, 'created');
      }
    }

    await this.judgeAll(ambiguous, output, context);

    logger.info('Resolution complete', { sourceId: context.sourceId, concepts: concepts.length, ...output.stats });
    return output;
  }

  // ==========================================================================
  // Lookup and judgment
  // ==========================================================================

  private async lookup(concept: ResolvableConcept, context: ResolutionContext): Promise<LookupOutcome> {
    try {
      const hits = await withTimeout(
        this.similarity.findSimilar(concept.name, concept.kind, this.settings.candidateLimit),
        this.settings.similarityTimeoutMs,
        'similarity search'
      );

      const best = hits
        .slice(0, this.settings.candidateLimit)
        .reduce<SimilarityHit | undefined>((top, hit) => (!top || hit.score > top.score ? hit : top), undefined);

      return { type: 'found', best };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn('Similarity lookup failed, creating new node', {
        sourceId: context.sourceId,
        name: concept.name,
        kind: concept.kind,
        error: reason,
      });
      return { type: 'failed', reason };
    }
  }

  private async judgeAll(
    ambiguous: AmbiguousPair[],
    output: ResolverOutput,
    context: ResolutionContext
  ): Promise<void> {
    if (ambiguous.length === 0) return;

    const batches: AmbiguousPair[][] = [];
    for (let i = 0; i < ambiguous.length; i += this.settings.judgmentBatchSize) {
      batches.push(ambiguous.slice(i, i + this.settings.judgmentBatchSize));
    }

    logger.debug('Judging ambiguous pairs', {
      sourceId: context.sourceId,
      pairs: ambiguous.length,
      calls: batches.length,
    });

    const verdicts = await Promise.all(batches.map((batch) => this.judgeBatch(batch, context)));

    batches.forEach((batch, batchIndex) => {
      batch.forEach(({ group, candidate }, index) => {
        const verdict = verdicts[batchIndex][index];
        const lead = group[0];

        switch (verdict.status) {
          case 'matched':
            output.stats.judgmentConfirmed++;
            this.settle(output, context, group, candidate.id, true, 'judgment_confirmed');
            logger.debug('Judgment confirmed merge', {
              sourceId: context.sourceId,
              name: lead.name,
              existing: candidate.name,
            });
            break;
          case 'not_matched':
            output.stats.judgmentRejected++;
            this.settleNew(output, context, group, 'judgment_rejected');
            break;
          case 'unavailable':
            output.stats.judgmentFailures++;
            this.settleNew(output, context, group, 'judgment_failed');
            break;
        }
      });
    });
  }

  /**
   * One judgment call. Timeouts, throws and short answers all degrade to
   * `unavailable` for the affected pairs.
   */
  private async judgeBatch(batch: AmbiguousPair[], context: ResolutionContext): Promise<JudgmentResult[]> {
    const pairs: JudgmentPair[] = batch.map(({ group, candidate }) => ({
      incoming: { name: group[0].name, kind: group[0].kind, description: group[0].description },
      existing: { name: candidate.name, kind: candidate.kind, description: candidate.description },
    }));

    try {
      const results = await withTimeout(
        this.judgment.judgeBatch(pairs),
        this.settings.judgmentTimeoutMs,
        'entity judgment'
      );

      return pairs.map(
        (_, index): JudgmentResult =>
          results[index] ?? { status: 'unavailable', reason: 'No verdict returned for pair' }
      );
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn('Judgment unavailable, keeping pairs apart', {
        sourceId: context.sourceId,
        pairs: pairs.length,
        error: reason,
      });
      return pairs.map((): JudgmentResult => ({ status: 'unavailable', reason }));
    }
  }

  // ==========================================================================
  // Bookkeeping
  // ==========================================================================

  private record(output: ResolverOutput, concept: ResolvableConcept, hit: SimilarityHit, outcome: MatchOutcome) {
    output.candidates.push({
      provisionalId: concept.provisionalId,
      candidateId: hit.nodeId,
      score: hit.score,
      outcome,
    });
  }

  private settleNew(
    output: ResolverOutput,
    context: ResolutionContext,
    group: ResolvableConcept[],
    decision: ResolutionDecision
  ) {
    output.stats.created++;
    this.settle(output, context, group, this.mintId(group[0].kind), false, decision);
  }

  private settle(
    output: ResolverOutput,
    context: ResolutionContext,
    group: ResolvableConcept[],
    nodeId: string,
    existing: boolean,
    decision: ResolutionDecision
  ) {
    context.remember(group[0].kind, group[0].name, { nodeId, existing });
    for (const concept of group) {
      output.resolutions.set(concept.provisionalId, {
        provisionalId: concept.provisionalId,
        nodeId,
        existing,
        decision,
      });
    }
  }
}
