import { ExtractedRelationship, NodeKind, RelationshipType } from '../domain/types.js';
import { meaningfulTokens, tokenOverlap } from '../utils/text.js';
import { PendingConcept } from './deduplicate.js';

interface InferenceRule {
  source: NodeKind;
  target: NodeKind;
  type: RelationshipType;
}

export const INFERENCE_RULES: readonly InferenceRule[] = [
  { source: 'law', target: 'issue', type: 'APPLIES_TO' },
  { source: 'law', target: 'remedy', type: 'ENABLES' },
  { source: 'remedy', target: 'evidence_type', type: 'REQUIRES' },
  { source: 'remedy', target: 'damages', type: 'AWARDS' },
  { source: 'remedy', target: 'procedure', type: 'AVAILABLE_VIA' },
];

function jurisdictionOf(concept: PendingConcept): string | undefined {
  return concept.incoming.attributes.jurisdiction ?? concept.incoming.jurisdiction;
}

/**
 * Two concepts are related when they share two meaningful tokens across
 * name and description, or one token and the same jurisdiction.
 */
export function shouldInfer(source: PendingConcept, target: PendingConcept): boolean {
  const sourceTokens = meaningfulTokens(`${source.incoming.name} ${source.incoming.description ?? ''}`);
  const targetTokens = meaningfulTokens(`${target.incoming.name} ${target.incoming.description ?? ''}`);
  const overlap = tokenOverlap(sourceTokens, targetTokens);

  if (overlap >= 2) return true;

  const sourceJurisdiction = jurisdictionOf(source);
  const targetJurisdiction = jurisdictionOf(target);
  return (
    overlap >= 1 &&
    sourceJurisdiction !== undefined &&
    targetJurisdiction !== undefined &&
    sourceJurisdiction.toLowerCase() === targetJurisdiction.toLowerCase()
  );
}

/**
 * Add implicit relationships between concepts of one document, by type-pair
 * rule. Pairs already linked by the same relationship type are skipped.
 * Endpoints use each concept's first provisional id.
 */
export function inferRelationships(
  concepts: readonly PendingConcept[],
  existing: readonly ExtractedRelationship[]
): ExtractedRelationship[] {
  const linked = new Set(existing.map((r) => `${r.sourceId}|${r.type}|${r.targetId}`));
  const inferred: ExtractedRelationship[] = [];

  for (const rule of INFERENCE_RULES) {
    const sources = concepts.filter((c) => c.incoming.kind === rule.source);
    const targets = concepts.filter((c) => c.incoming.kind === rule.target);

    for (const source of sources) {
      for (const target of targets) {
        const alreadyLinked = source.provisionalIds.some((s) =>
          target.provisionalIds.some((t) => linked.has(`${s}|${rule.type}|${t}`))
        );
        if (alreadyLinked || !shouldInfer(source, target)) continue;

        const sourceId = source.provisionalIds[0];
        const targetId = target.provisionalIds[0];
        linked.add(`${sourceId}|${rule.type}|${targetId}`);
        inferred.push({
          sourceId,
          targetId,
          type: rule.type,
          attributes: { inferred: true, confidence: 'medium' },
        });
      }
    }
  }

  return inferred;
}
