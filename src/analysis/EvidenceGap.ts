import { normalizeName } from '../utils/text.js';
import { partitionEvidence } from './ProofChainBuilder.js';
import { ProofChain } from './types.js';

export interface ObtainingHint {
  item: string;
  method: string;
}

export interface EvidenceGap {
  required: string[];
  present: string[];
  missing: string[];
  /** Missing items flagged critical on the evidence node */
  missingCritical: string[];
  /** min(1, |present| / max(1, |required|)) */
  evidenceStrength: number;
  howToObtain: ObtainingHint[];
}

export function evidenceStrength(presentCount: number, requiredCount: number): number {
  return Math.min(1, presentCount / Math.max(1, requiredCount));
}

/**
 * How to get hold of an evidence item, by keyword
 */
export function obtainingMethod(item: string): string {
  const lower = item.toLowerCase();
  if (lower.includes('notice')) {
    return 'Request a copy from the landlord; check certified mail records; photograph posted notices';
  }
  if (lower.includes('rent') && lower.includes('payment')) {
    return 'Gather canceled checks, bank statements, receipts and money order stubs';
  }
  if (lower.includes('photo')) {
    return 'Take timestamped photos or videos and document every condition';
  }
  if (lower.includes('correspondence')) {
    return 'Save all emails, texts and letters; request repair logs from the landlord';
  }
  if (lower.includes('complaint')) {
    return 'File a complaint with the local housing agency and request an inspection';
  }
  return 'Consult with legal aid or a tenant advocacy organization for guidance';
}

/**
 * Evidence gap over the union of the chains' required evidence
 */
export function analyzeEvidenceGap(chains: readonly ProofChain[], evidencePresent: readonly string[]): EvidenceGap {
  const required: string[] = [];
  const critical = new Set<string>();
  const seen = new Set<string>();

  for (const chain of chains) {
    for (const { node, isCritical } of chain.evidence) {
      const key = normalizeName(node.name);
      if (isCritical) critical.add(key);
      if (seen.has(key)) continue;
      seen.add(key);
      required.push(node.name);
    }
  }

  const { satisfied, missing } = partitionEvidence(required, evidencePresent);

  return {
    required,
    present: satisfied,
    missing,
    missingCritical: missing.filter((item) => critical.has(normalizeName(item))),
    evidenceStrength: evidenceStrength(satisfied.length, required.length),
    howToObtain: missing.map((item) => ({ item, method: obtainingMethod(item) })),
  };
}
