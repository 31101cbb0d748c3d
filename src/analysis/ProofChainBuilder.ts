import { ConceptNode } from '../domain/types.js';
import { GraphStore, TraversalHit } from '../graph/GraphStore.js';
import { createLogger } from '../utils/logger.js';
import { coversRequirement, looselyMatches, normalizeName } from '../utils/text.js';
import { ChainVerifier } from './ChainVerifier.js';
import {
  ChainHop,
  HopNode,
  ProofChain,
  ProofChainCoverage,
  ProofChainQuery,
  RequiredEvidence,
  UnsupportedIssue,
} from './types.js';

const logger = createLogger('ProofChainBuilder');

const DEFAULT_CHAIN_LIMIT = 10;
const DEFAULT_FANOUT = 50;

export function toHopNode(node: ConceptNode): HopNode {
  const citation = (node.details.kind === 'law' ? node.details.citation : undefined) ?? node.bestQuote?.sourceReference;
  return {
    id: node.id,
    kind: node.kind,
    name: node.name,
    authority: node.authority,
    ...(node.jurisdiction ? { jurisdiction: node.jurisdiction } : {}),
    ...(citation ? { citation } : {}),
  };
}

/**
 * Case-insensitive substring match either way. Nodes without a
 * jurisdiction, and queries without one, always match.
 */
export function matchesJurisdiction(nodeJurisdiction: string | undefined, filter: string | undefined): boolean {
  if (!filter || !nodeJurisdiction) return true;
  return looselyMatches(nodeJurisdiction, filter);
}

/**
 * Required evidence split into what the user reports and what is missing
 */
export function partitionEvidence(
  required: readonly string[],
  present: readonly string[]
): { satisfied: string[]; missing: string[] } {
  const satisfied: string[] = [];
  const missing: string[] = [];
  const seen = new Set<string>();

  for (const item of required) {
    const key = normalizeName(item);
    if (seen.has(key)) continue;
    seen.add(key);

    if (present.some((p) => coversRequirement(item, p))) satisfied.push(item);
    else missing.push(item);
  }
  return { satisfied, missing };
}

/**
 * Proof-Chain Builder
 *
 * Walks issue -APPLIES_TO- law -ENABLES-> remedy -REQUIRES-> evidence.
 * APPLIES_TO is matched in either direction; extraction stores it
 * law -> issue. Issues are traversed in parallel; nothing is written.
 */
export class ProofChainBuilder {
  private verifier: ChainVerifier;

  constructor(
    private store: GraphStore,
    private fanout: number = DEFAULT_FANOUT
  ) {
    this.verifier = new ChainVerifier(store);
  }

  async buildProofChains(issueIds: readonly string[], query: ProofChainQuery = {}): Promise<ProofChain[]> {
    return (await this.buildProofChainsWithCoverage(issueIds, query)).chains;
  }

  async buildProofChainsWithCoverage(
    issueIds: readonly string[],
    query: ProofChainQuery = {}
  ): Promise<ProofChainCoverage> {
    const uniqueIds = [...new Set(issueIds)];
    const perIssue = await Promise.all(uniqueIds.map((issueId) => this.chainsForIssue(issueId, query)));

    const coverage: ProofChainCoverage = { chains: [], unsupported: [] };
    for (const result of perIssue) {
      if (Array.isArray(result)) {
        coverage.chains.push(...result);
      } else {
        coverage.unsupported.push(result);
        logger.warn('Issue has no proof chain', { issueId: result.issueId, reason: result.reason });
      }
    }

    logger.debug('Proof chains built', {
      issues: uniqueIds.length,
      chains: coverage.chains.length,
      unsupported: coverage.unsupported.length,
    });
    return coverage;
  }

  private async chainsForIssue(issueId: string, query: ProofChainQuery): Promise<ProofChain[] | UnsupportedIssue> {
    const stored = await this.store.getNode(issueId);
    if (!stored || stored.node.kind !== 'issue') {
      return { issueId, reason: 'issue_not_found' };
    }

    const limit = query.limit ?? DEFAULT_CHAIN_LIMIT;
    const issue = toHopNode(stored.node);
    const chains: ProofChain[] = [];

    const laws = (
      await this.store.traverse(
        issueId,
        { relation: 'APPLIES_TO', direction: 'any', targetKinds: ['law'] },
        this.fanout
      )
    ).filter((hit) => matchesJurisdiction(hit.node.jurisdiction, query.jurisdiction));

    for (const lawHit of dedupeHits(laws)) {
      if (chains.length >= limit) break;

      const remedies = (
        await this.store.traverse(
          lawHit.node.id,
          { relation: 'ENABLES', direction: 'outbound', targetKinds: ['remedy'] },
          this.fanout
        )
      ).filter((hit) => matchesJurisdiction(hit.node.jurisdiction, query.jurisdiction));

      if (remedies.length === 0) {
        chains.push(await this.assemble(issue, lawHit, undefined, [], query));
        continue;
      }

      for (const remedyHit of dedupeHits(remedies)) {
        if (chains.length >= limit) break;

        const evidence = await this.store.traverse(
          remedyHit.node.id,
          { relation: 'REQUIRES', direction: 'outbound', targetKinds: ['evidence_type'] },
          this.fanout
        );
        chains.push(await this.assemble(issue, lawHit, remedyHit, dedupeHits(evidence), query));
      }
    }

    if (chains.length === 0) {
      return { issueId, reason: 'no_graph_support' };
    }
    return chains;
  }

  private async assemble(
    issue: HopNode,
    lawHit: TraversalHit,
    remedyHit: TraversalHit | undefined,
    evidenceHits: TraversalHit[],
    query: ProofChainQuery
  ): Promise<ProofChain> {
    const law = toHopNode(lawHit.node);
    const remedy = remedyHit ? toHopNode(remedyHit.node) : undefined;

    const evidence: RequiredEvidence[] = evidenceHits.map((hit) => ({
      node: toHopNode(hit.node),
      ...(hit.edge.evidenceLevel ? { level: hit.edge.evidenceLevel } : {}),
      isCritical: hit.node.details.kind === 'evidence_type' && hit.node.details.isCritical === true,
    }));

    const hops: ChainHop[] = [{ node: issue }, { node: law, edge: lawHit.edge }];
    if (remedyHit && remedy) hops.push({ node: remedy, edge: remedyHit.edge });
    evidenceHits.forEach((hit, index) => hops.push({ node: evidence[index].node, edge: hit.edge }));

    const completeness = (1 + (remedy ? 1 : 0) + (evidence.length > 0 ? 1 : 0)) / 3;
    const { satisfied, missing } = query.evidencePresent
      ? partitionEvidence(
          evidence.map((e) => e.node.name),
          query.evidencePresent
        )
      : { satisfied: [], missing: evidence.map((e) => e.node.name) };

    const chain: ProofChain = {
      issue,
      law,
      ...(remedy ? { remedy } : {}),
      evidence,
      hops,
      completeness,
      satisfiedEvidence: satisfied,
      missingEvidence: missing,
      verification: {
        graphPathExists: false,
        lawsApplyToIssue: false,
        remediesEnabledByLaws: false,
        unconfirmedEdges: [],
      },
    };
    chain.verification = await this.verifier.verify(chain);
    return chain;
  }
}

function dedupeHits(hits: TraversalHit[]): TraversalHit[] {
  const seen = new Set<string>();
  return hits.filter((hit) => {
    if (seen.has(hit.node.id)) return false;
    seen.add(hit.node.id);
    return true;
  });
}
