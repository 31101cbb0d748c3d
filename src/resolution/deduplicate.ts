import { isHigherAuthority } from '../domain/authority.js';
import { IncomingConcept } from '../domain/types.js';
import { normalizeName, unionInto } from '../utils/text.js';

/**
 * A concept of one document after within-document deduplication, with every
 * provisional id that collapsed onto it.
 */
export interface PendingConcept {
  provisionalIds: string[];
  incoming: IncomingConcept;
}

export function conceptKey(kind: string, name: string): string {
  return `${kind}|${normalizeName(name)}`;
}

/**
 * Collapse concepts sharing kind and case-insensitive name onto the first
 * occurrence. Later occurrences contribute what the first one lacks.
 */
export function deduplicateConcepts(
  concepts: ReadonlyArray<{ provisionalId: string; incoming: IncomingConcept }>
): PendingConcept[] {
  const byKey = new Map<string, PendingConcept>();

  for (const { provisionalId, incoming } of concepts) {
    const key = conceptKey(incoming.kind, incoming.name);
    const survivor = byKey.get(key);

    if (!survivor) {
      byKey.set(key, {
        provisionalIds: [provisionalId],
        incoming: { ...incoming, attributes: { ...incoming.attributes }, quotes: [...incoming.quotes] },
      });
      continue;
    }

    survivor.provisionalIds = unionInto(survivor.provisionalIds, [provisionalId]);
    survivor.incoming = fold(survivor.incoming, incoming);
  }

  return [...byKey.values()];
}

function fold(first: IncomingConcept, later: IncomingConcept): IncomingConcept {
  const description =
    (later.description?.length ?? 0) > (first.description?.length ?? 0) ? later.description : first.description;

  return {
    ...first,
    description,
    authority: isHigherAuthority(later.authority, first.authority) ? later.authority : first.authority,
    jurisdiction: first.jurisdiction ?? later.jurisdiction,
    attributes: { ...later.attributes, ...first.attributes },
    quotes: [...first.quotes, ...later.quotes],
    chunkIds: unionInto(first.chunkIds, later.chunkIds),
    details: first.details ?? later.details,
  };
}
