import { isHigherAuthority } from '../domain/authority.js';
import { ConceptNode, IncomingConcept, NodeDetails, NodeKind, Quote } from '../domain/types.js';
import { unionInto } from '../utils/text.js';

/**
 * Entity Merger
 *
 * Folds an incoming duplicate into an existing node. Every field only moves
 * toward "more complete" or "more authoritative":
 *   - name / description: strictly longer wins, ties keep the existing value
 *   - authority: strictly higher rank wins
 *   - attributes: first writer per key wins; discarded values are reported
 *   - quotes: appended (deduplicated by text); best quote replaced only by a
 *     strictly longer one
 *   - source / chunk ids: union
 *   - mention count: +1 per source not seen before
 *
 * Re-merging the same duplicate is a no-op.
 */

export interface AttributeConflict {
  nodeId: string;
  key: string;
  keptValue: string;
  discardedValue: string;
  sourceId: string;
}

export interface MergeResult {
  node: ConceptNode;
  /** Names of the fields that changed */
  changes: string[];
  attributeConflicts: AttributeConflict[];
}

export function defaultDetails(kind: NodeKind): NodeDetails {
  switch (kind) {
    case 'law':
      return { kind: 'law' };
    case 'remedy':
      return { kind: 'remedy' };
    case 'procedure':
      return { kind: 'procedure' };
    case 'evidence_type':
      return { kind: 'evidence_type' };
    case 'case_document':
      return { kind: 'case_document' };
    default:
      return { kind };
  }
}

/**
 * First version of a node, minted for a concept with no existing match
 */
export function createNodeFromIncoming(id: string, incoming: IncomingConcept): ConceptNode {
  const quotes = dedupeQuotes([], incoming.quotes);

  return {
    id,
    kind: incoming.kind,
    name: incoming.name.trim(),
    description: incoming.description?.trim() || undefined,
    authority: incoming.authority,
    jurisdiction: incoming.jurisdiction,
    details: mergeDetails(defaultDetails(incoming.kind), incoming.details),
    attributes: { ...incoming.attributes },
    bestQuote: longestQuote(undefined, quotes),
    allQuotes: quotes,
    sourceIds: [incoming.sourceId],
    chunkIds: unionInto([], incoming.chunkIds),
    mentionCount: 1,
  };
}

export function mergeNode(existing: ConceptNode, incoming: IncomingConcept): MergeResult {
  const node: ConceptNode = structuredClone(existing);
  const changes: string[] = [];
  const attributeConflicts: AttributeConflict[] = [];

  const name = incoming.name.trim();
  if (name.length > node.name.length) {
    node.name = name;
    changes.push('name');
  }

  const description = incoming.description?.trim();
  if (description && description.length > (node.description?.length ?? 0)) {
    node.description = description;
    changes.push('description');
  }

  if (isHigherAuthority(incoming.authority, node.authority)) {
    node.authority = incoming.authority;
    changes.push('authority');
  }

  if (!node.jurisdiction && incoming.jurisdiction) {
    node.jurisdiction = incoming.jurisdiction;
    changes.push('jurisdiction');
  }

  for (const [key, value] of Object.entries(incoming.attributes)) {
    const current = node.attributes[key];
    if (current === undefined) {
      node.attributes[key] = value;
      if (!changes.includes('attributes')) changes.push('attributes');
    } else if (current !== value) {
      attributeConflicts.push({
        nodeId: node.id,
        key,
        keptValue: current,
        discardedValue: value,
        sourceId: incoming.sourceId,
      });
    }
  }

  const details = mergeDetails(node.details, incoming.details);
  if (canonical(details) !== canonical(node.details)) {
    node.details = details;
    changes.push('details');
  }

  const allQuotes = dedupeQuotes(node.allQuotes, incoming.quotes);
  if (allQuotes.length > node.allQuotes.length) {
    node.allQuotes = allQuotes;
    changes.push('allQuotes');
  }

  const bestQuote = longestQuote(node.bestQuote, incoming.quotes);
  if (bestQuote !== node.bestQuote) {
    node.bestQuote = bestQuote;
    changes.push('bestQuote');
  }

  const isNewSource = !node.sourceIds.includes(incoming.sourceId);
  if (isNewSource) {
    node.sourceIds = [...node.sourceIds, incoming.sourceId];
    node.mentionCount += 1;
    changes.push('sourceIds', 'mentionCount');
  }

  const chunkIds = unionInto(node.chunkIds, incoming.chunkIds);
  if (chunkIds.length > node.chunkIds.length) {
    node.chunkIds = chunkIds;
    changes.push('chunkIds');
  }

  return { node, changes, attributeConflicts };
}

// ============================================================================
// Helpers
// ============================================================================

function dedupeQuotes(existing: readonly Quote[], incoming: readonly Quote[]): Quote[] {
  const result = [...existing];
  const seen = new Set(existing.map((q) => q.text.trim()));
  for (const quote of incoming) {
    const text = quote.text.trim();
    if (text && !seen.has(text)) {
      seen.add(text);
      result.push({ ...quote, text });
    }
  }
  return result;
}

function longestQuote(current: Quote | undefined, candidates: readonly Quote[]): Quote | undefined {
  let best = current;
  for (const quote of candidates) {
    const text = quote.text.trim();
    if (text.length > (best?.text.length ?? 0)) {
      best = { ...quote, text };
    }
  }
  return best;
}

/**
 * Fill absent detail fields from the incoming side and union list fields.
 * Details of a different kind are ignored.
 */
function mergeDetails(existing: NodeDetails, incoming: NodeDetails | undefined): NodeDetails {
  if (!incoming) return existing;

  switch (existing.kind) {
    case 'law':
      return incoming.kind === 'law'
        ? {
            kind: 'law',
            citation: existing.citation ?? incoming.citation,
            effectiveDate: existing.effectiveDate ?? incoming.effectiveDate,
          }
        : existing;

    case 'remedy':
      return incoming.kind === 'remedy'
        ? { kind: 'remedy', successRate: existing.successRate ?? incoming.successRate }
        : existing;

    case 'procedure':
      return incoming.kind === 'procedure'
        ? { kind: 'procedure', forum: existing.forum ?? incoming.forum }
        : existing;

    case 'evidence_type':
      return incoming.kind === 'evidence_type'
        ? {
            kind: 'evidence_type',
            isCritical:
              existing.isCritical || incoming.isCritical ? true : (existing.isCritical ?? incoming.isCritical),
            examples: mergeList(existing.examples, incoming.examples),
          }
        : existing;

    case 'case_document':
      return incoming.kind === 'case_document'
        ? {
            kind: 'case_document',
            caseName: existing.caseName ?? incoming.caseName,
            court: existing.court ?? incoming.court,
            docketNumber: existing.docketNumber ?? incoming.docketNumber,
            decisionDate: existing.decisionDate ?? incoming.decisionDate,
            holdings: mergeList(existing.holdings, incoming.holdings),
          }
        : existing;

    default:
      return existing;
  }
}

/** Key-order independent form; stored JSONB documents come back reordered */
function canonical(details: NodeDetails): string {
  return JSON.stringify(details, Object.keys(details).sort());
}

function mergeList(existing: string[] | undefined, incoming: string[] | undefined): string[] | undefined {
  if (!existing && !incoming) return undefined;
  return unionInto(existing ?? [], incoming ?? []);
}
