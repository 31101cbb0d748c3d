import { authorityRank, authorityWeight } from '../domain/authority.js';
import { looselyMatches } from '../utils/text.js';
import { partitionEvidence } from './ProofChainBuilder.js';
import { evidenceStrength } from './EvidenceGap.js';
import { ProofChain, RemedyOption } from './types.js';

const WEIGHTS = {
  evidence: 0.4,
  authority: 0.3,
  jurisdiction: 0.2,
  retrieval: 0.1,
} as const;

export const MIN_PROBABILITY = 0.1;
export const MAX_PROBABILITY = 0.95;
export const DEFAULT_RETRIEVAL_SCORE = 0.5;

export interface RankingOptions {
  jurisdiction?: string;
  /** Retrieval relevance per remedy id, in [0, 1] */
  retrievalScores?: ReadonlyMap<string, number>;
}

export function clampProbability(score: number): number {
  return Math.min(MAX_PROBABILITY, Math.max(MIN_PROBABILITY, score));
}

/**
 * Score every remedy reachable through the chains:
 *
 *   0.4 * evidence strength + 0.3 * enabling-law authority weight
 *   + 0.2 * jurisdiction match + 0.1 * retrieval score
 *
 * A remedy reached by several chains keeps its best score. Sorted by score,
 * then authority rank, then name.
 */
export function rankRemedies(
  chains: readonly ProofChain[],
  evidencePresent: readonly string[],
  options: RankingOptions = {}
): RemedyOption[] {
  const best = new Map<string, RemedyOption>();

  for (const chain of chains) {
    const { remedy, law } = chain;
    if (!remedy) continue;

    const { satisfied, missing } = partitionEvidence(
      chain.evidence.map((e) => e.node.name),
      evidencePresent
    );
    const strength = evidenceStrength(satisfied.length, satisfied.length + missing.length);
    const authority = authorityWeight(law.authority);
    const remedyJurisdiction = remedy.jurisdiction ?? law.jurisdiction;
    const jurisdictionMatch =
      options.jurisdiction && remedyJurisdiction && looselyMatches(options.jurisdiction, remedyJurisdiction) ? 1 : 0;
    const retrievalScore = options.retrievalScores?.get(remedy.id) ?? DEFAULT_RETRIEVAL_SCORE;

    const score =
      WEIGHTS.evidence * strength +
      WEIGHTS.authority * authority +
      WEIGHTS.jurisdiction * jurisdictionMatch +
      WEIGHTS.retrieval * retrievalScore;

    const option: RemedyOption = {
      remedyId: remedy.id,
      name: remedy.name,
      authority: remedy.authority,
      ...(remedyJurisdiction ? { jurisdiction: remedyJurisdiction } : {}),
      enablingLawId: law.id,
      enablingLawName: law.name,
      ...(law.citation ? { citation: law.citation } : {}),
      evidenceStrength: strength,
      authorityWeight: authority,
      jurisdictionMatch,
      retrievalScore,
      score,
      probability: clampProbability(score),
      missingEvidence: missing,
    };

    const current = best.get(remedy.id);
    if (!current || option.score > current.score) {
      best.set(remedy.id, option);
    }
  }

  return [...best.values()].sort(
    (a, b) =>
      b.score - a.score ||
      authorityRank(b.authority) - authorityRank(a.authority) ||
      a.name.localeCompare(b.name)
  );
}
