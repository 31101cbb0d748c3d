import { EdgeRef } from '../domain/types.js';
import { GraphStore } from '../graph/GraphStore.js';
import { ProofChain, StrengthLabel, VerificationStatus } from './types.js';

/**
 * Downgrade factors, applied in order. Each failing check multiplies the
 * strength by `factor` but will not push it below `floor`; a value already
 * under the floor is left alone.
 */
const DOWNGRADES: ReadonlyArray<{ check: keyof Omit<VerificationStatus, 'unconfirmedEdges'>; factor: number; floor: number }> = [
  { check: 'graphPathExists', factor: 0.3, floor: 0.1 },
  { check: 'lawsApplyToIssue', factor: 0.5, floor: 0.2 },
  { check: 'remediesEnabledByLaws', factor: 0.7, floor: 0.3 },
];

export function enforceStrength(strength: number, status: VerificationStatus): number {
  let adjusted = strength;
  for (const { check, factor, floor } of DOWNGRADES) {
    if (!status[check]) {
      adjusted = Math.min(adjusted, Math.max(adjusted * factor, floor));
    }
  }
  return adjusted;
}

export function strengthLabel(strength: number): StrengthLabel {
  if (strength >= 0.7) return 'strong';
  if (strength >= 0.4) return 'moderate';
  return 'weak';
}

/**
 * Issue-level status: a check passes when any chain passes it
 */
export function combineStatuses(statuses: readonly VerificationStatus[]): VerificationStatus {
  return {
    graphPathExists: statuses.some((s) => s.graphPathExists),
    lawsApplyToIssue: statuses.some((s) => s.lawsApplyToIssue),
    remediesEnabledByLaws: statuses.some((s) => s.remediesEnabledByLaws),
    unconfirmedEdges: statuses.flatMap((s) => s.unconfirmedEdges),
  };
}

/**
 * Chain Verifier
 *
 * Re-checks chain hops against the graph, independently of how the chain
 * was built.
 */
export class ChainVerifier {
  constructor(private store: Pick<GraphStore, 'hasEdge'>) {}

  /**
   * @param hopIndices hops to check; all hops when omitted. Out-of-range
   *   indices and the issue hop (0) are ignored.
   */
  async verify(chain: ProofChain, hopIndices?: readonly number[]): Promise<VerificationStatus> {
    const indices = hopIndices ?? chain.hops.map((_, index) => index);
    const unconfirmedEdges: EdgeRef[] = [];
    let checked = 0;

    for (const index of new Set(indices)) {
      const edge = chain.hops[index]?.edge;
      if (index === 0 || !edge) continue;
      checked++;
      if (!(await this.store.hasEdge(edge))) {
        unconfirmedEdges.push({ sourceId: edge.sourceId, targetId: edge.targetId, type: edge.type });
      }
    }

    const lawsApplyToIssue =
      (await this.store.hasEdge({ sourceId: chain.law.id, targetId: chain.issue.id, type: 'APPLIES_TO' })) ||
      (await this.store.hasEdge({ sourceId: chain.issue.id, targetId: chain.law.id, type: 'APPLIES_TO' }));

    const remediesEnabledByLaws =
      chain.remedy !== undefined &&
      (await this.store.hasEdge({ sourceId: chain.law.id, targetId: chain.remedy.id, type: 'ENABLES' }));

    return {
      graphPathExists: checked > 0 && unconfirmedEdges.length === 0,
      lawsApplyToIssue,
      remediesEnabledByLaws,
      unconfirmedEdges,
    };
  }
}
