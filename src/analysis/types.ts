import { AuthorityLevel, EdgeRef, EvidenceLevel, NodeKind, RelationshipEdge } from '../domain/types.js';

/**
 * Node as it appears inside a proof chain
 */
export interface HopNode {
  id: string;
  kind: NodeKind;
  name: string;
  authority: AuthorityLevel;
  jurisdiction?: string;
  citation?: string;
}

export interface ChainHop {
  node: HopNode;
  /** Edge that reached this node, as stored; absent on the issue hop */
  edge?: RelationshipEdge;
}

export interface RequiredEvidence {
  node: HopNode;
  level?: EvidenceLevel;
  isCritical: boolean;
}

export interface VerificationStatus {
  graphPathExists: boolean;
  lawsApplyToIssue: boolean;
  remediesEnabledByLaws: boolean;
  /** Edges asserted by the checked hops that the graph does not have */
  unconfirmedEdges: EdgeRef[];
}

/**
 * Issue -> law -> remedy -> required evidence, read from the graph.
 * Hop 0 is the issue, hop 1 the law, then the remedy when there is one,
 * then one hop per evidence item.
 */
export interface ProofChain {
  issue: HopNode;
  law: HopNode;
  remedy?: HopNode;
  evidence: RequiredEvidence[];
  hops: ChainHop[];
  completeness: number;
  satisfiedEvidence: string[];
  missingEvidence: string[];
  verification: VerificationStatus;
}

export type UnsupportedReason = 'no_graph_support' | 'issue_not_found';

export interface UnsupportedIssue {
  issueId: string;
  reason: UnsupportedReason;
}

export interface ProofChainCoverage {
  chains: ProofChain[];
  unsupported: UnsupportedIssue[];
}

export interface ProofChainQuery {
  jurisdiction?: string;
  /** Maximum chains per issue */
  limit?: number;
  /** When given, chains carry satisfied/missing evidence */
  evidencePresent?: readonly string[];
}

export interface RemedyOption {
  remedyId: string;
  name: string;
  authority: AuthorityLevel;
  jurisdiction?: string;
  enablingLawId: string;
  enablingLawName: string;
  citation?: string;
  evidenceStrength: number;
  authorityWeight: number;
  jurisdictionMatch: number;
  retrievalScore: number;
  score: number;
  /** score clamped to [0.10, 0.95] */
  probability: number;
  missingEvidence: string[];
}

export type StrengthLabel = 'strong' | 'moderate' | 'weak';
