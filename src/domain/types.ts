/**
 * Knowledge Graph Domain Types
 *
 * Concept nodes, relationship edges and the records that flow through
 * ingestion (extracted concepts) and analysis (proof chains).
 */

// ============================================================================
// Node kinds
// ============================================================================

export const NODE_KINDS = [
  'law',
  'remedy',
  'procedure',
  'evidence_type',
  'issue',
  'case_document',
  'damages',
  'legal_concept',
  'legal_outcome',
  'government_entity',
  'legal_service',
  'jurisdiction',
] as const;

export type NodeKind = (typeof NODE_KINDS)[number];

export function isNodeKind(value: string): value is NodeKind {
  return (NODE_KINDS as readonly string[]).includes(value);
}

// ============================================================================
// Authority
// ============================================================================

/**
 * Authority levels, most binding first.
 */
export const AUTHORITY_LEVELS = [
  'binding_legal_authority',
  'persuasive_authority',
  'official_interpretive',
  'reputable_secondary',
  'practical_self_help',
  'informational_only',
] as const;

export type AuthorityLevel = (typeof AUTHORITY_LEVELS)[number];

// ============================================================================
// Relationship types
// ============================================================================

export const RELATIONSHIP_TYPES = [
  'APPLIES_TO',
  'ENABLES',
  'REQUIRES',
  'SUPPORTS',
  'RESOLVES',
  'VIOLATES',
  'PROHIBITS',
  'AWARDS',
  'AVAILABLE_VIA',
  'FILED_IN',
  'RESULTS_IN',
] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

export function isRelationshipType(value: string): value is RelationshipType {
  return (RELATIONSHIP_TYPES as readonly string[]).includes(value);
}

export type EvidenceLevel = 'required' | 'helpful' | 'sufficient';

// ============================================================================
// Kind-specific details
// ============================================================================

export interface LawDetails {
  kind: 'law';
  citation?: string;
  effectiveDate?: string;
}

export interface RemedyDetails {
  kind: 'remedy';
  successRate?: number;
}

export interface ProcedureDetails {
  kind: 'procedure';
  forum?: string;
}

export interface EvidenceTypeDetails {
  kind: 'evidence_type';
  isCritical?: boolean;
  examples?: string[];
}

export interface CaseDocumentDetails {
  kind: 'case_document';
  caseName?: string;
  court?: string;
  docketNumber?: string;
  decisionDate?: string;
  holdings?: string[];
}

export interface PlainDetails {
  kind: Exclude<NodeKind, 'law' | 'remedy' | 'procedure' | 'evidence_type' | 'case_document'>;
}

/**
 * Closed variant over node kinds. The free-form `attributes` map on the
 * node holds whatever metadata does not fit here.
 */
export type NodeDetails =
  | LawDetails
  | RemedyDetails
  | ProcedureDetails
  | EvidenceTypeDetails
  | CaseDocumentDetails
  | PlainDetails;

// ============================================================================
// Concept node
// ============================================================================

export interface Quote {
  text: string;
  sourceId?: string;
  sourceReference?: string;
  explanation?: string;
}

export interface ConceptNode {
  /** Stable for the lifetime of the node */
  id: string;
  kind: NodeKind;
  name: string;
  description?: string;
  authority: AuthorityLevel;
  jurisdiction?: string;
  details: NodeDetails;
  attributes: Record<string, string>;
  bestQuote?: Quote;
  allQuotes: Quote[];
  sourceIds: string[];
  chunkIds: string[];
  mentionCount: number;
}

/**
 * A node together with the store version it was read at
 */
export interface VersionedNode {
  node: ConceptNode;
  version: number;
}

// ============================================================================
// Relationship edge
// ============================================================================

export interface RelationshipEdge {
  sourceId: string;
  targetId: string;
  type: RelationshipType;
  strength?: number;
  evidenceLevel?: EvidenceLevel;
  attributes?: Record<string, string | number | boolean>;
}

export interface EdgeRef {
  sourceId: string;
  targetId: string;
  type: RelationshipType;
}

export function edgeKey(edge: EdgeRef): string {
  return `${edge.sourceId}|${edge.type}|${edge.targetId}`;
}

// ============================================================================
// Ingestion input
// ============================================================================

export interface SourceDescriptor {
  sourceId: string;
  authority: AuthorityLevel;
  jurisdiction?: string;
  title?: string;
}

export interface ExtractedQuote {
  text: string;
  sourceReference?: string;
  explanation?: string;
}

/**
 * A concept as produced by the extraction step, before resolution.
 * `provisionalId` is only meaningful inside its batch.
 */
export interface ExtractedConcept {
  provisionalId: string;
  kind: NodeKind;
  name: string;
  description?: string;
  authority?: AuthorityLevel;
  jurisdiction?: string;
  attributes?: Record<string, string>;
  quote?: ExtractedQuote;
  chunkIds?: string[];
  details?: NodeDetails;
}

export interface ExtractedRelationship {
  sourceId: string;
  targetId: string;
  type: RelationshipType;
  strength?: number;
  evidenceLevel?: EvidenceLevel;
  attributes?: Record<string, string | number | boolean>;
}

export interface ExtractionBatch {
  source: SourceDescriptor;
  concepts: ExtractedConcept[];
  relationships: ExtractedRelationship[];
  /** Chunks of the source document; used when a concept names none itself */
  chunkIds?: string[];
}

/**
 * Incoming duplicate as seen by the merger: an extracted concept with its
 * source provenance already applied.
 */
export interface IncomingConcept {
  kind: NodeKind;
  name: string;
  description?: string;
  authority: AuthorityLevel;
  jurisdiction?: string;
  attributes: Record<string, string>;
  quotes: Quote[];
  sourceId: string;
  chunkIds: string[];
  details?: NodeDetails;
}
