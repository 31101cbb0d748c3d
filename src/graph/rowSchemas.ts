import { AUTHORITY_LEVELS, ConceptNode, NODE_KINDS, RELATIONSHIP_TYPES } from '../domain/types.js';
import { validator } from '../utils/validators.js';

/**
 * Schemas for rows read back from PostgreSQL. JSONB documents are checked
 * before they are handed out as domain records.
 */

const quoteSchema = {
  type: 'object',
  required: ['text'],
  properties: {
    text: { type: 'string' },
    sourceId: { type: 'string' },
    sourceReference: { type: 'string' },
    explanation: { type: 'string' },
  },
};

export const conceptNodeSchema = {
  type: 'object',
  required: [
    'id',
    'kind',
    'name',
    'authority',
    'details',
    'attributes',
    'allQuotes',
    'sourceIds',
    'chunkIds',
    'mentionCount',
  ],
  properties: {
    id: { type: 'string', minLength: 1 },
    kind: { type: 'string', enum: [...NODE_KINDS] },
    name: { type: 'string' },
    description: { type: 'string' },
    authority: { type: 'string', enum: [...AUTHORITY_LEVELS] },
    jurisdiction: { type: 'string' },
    details: {
      type: 'object',
      required: ['kind'],
      properties: { kind: { type: 'string', enum: [...NODE_KINDS] } },
    },
    attributes: { type: 'object', additionalProperties: { type: 'string' } },
    bestQuote: quoteSchema,
    allQuotes: { type: 'array', items: quoteSchema },
    sourceIds: { type: 'array', items: { type: 'string' } },
    chunkIds: { type: 'array', items: { type: 'string' } },
    mentionCount: { type: 'integer', minimum: 0 },
  },
};

export interface EdgeRow {
  source_id: string;
  target_id: string;
  type: (typeof RELATIONSHIP_TYPES)[number];
  strength: number | null;
  evidence_level: 'required' | 'helpful' | 'sufficient' | null;
  attributes: Record<string, string | number | boolean>;
}

const edgeRowSchema = {
  type: 'object',
  required: ['source_id', 'target_id', 'type', 'attributes'],
  properties: {
    source_id: { type: 'string' },
    target_id: { type: 'string' },
    type: { type: 'string', enum: [...RELATIONSHIP_TYPES] },
    strength: { type: ['number', 'null'] },
    evidence_level: { enum: ['required', 'helpful', 'sufficient', null] },
    attributes: {
      type: 'object',
      additionalProperties: { type: ['string', 'number', 'boolean'] },
    },
  },
};

export interface VersionRow {
  version: number;
}

const versionRowSchema = {
  type: 'object',
  required: ['version'],
  properties: { version: { type: 'integer', minimum: 1 } },
};

export const isConceptNode = validator.compileSchema<ConceptNode>(conceptNodeSchema);
export const isEdgeRow = validator.compileSchema<EdgeRow>(edgeRowSchema);
export const isVersionRow = validator.compileSchema<VersionRow>(versionRowSchema);
