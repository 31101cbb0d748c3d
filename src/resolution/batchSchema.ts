import { AUTHORITY_LEVELS, ExtractionBatch, NODE_KINDS, RELATIONSHIP_TYPES } from '../domain/types.js';
import { validator } from '../utils/validators.js';

/**
 * JSON schema for an extraction batch handed to resolveAndMerge
 */

const nonEmpty = { type: 'string', minLength: 1 };
const stringMap = { type: 'object', additionalProperties: { type: 'string' } };
const stringList = { type: 'array', items: { type: 'string' } };

const detailsSchema = {
  type: 'object',
  required: ['kind'],
  properties: {
    kind: { type: 'string', enum: [...NODE_KINDS] },
    citation: { type: 'string' },
    effectiveDate: { type: 'string' },
    successRate: { type: 'number', minimum: 0, maximum: 1 },
    forum: { type: 'string' },
    isCritical: { type: 'boolean' },
    examples: stringList,
    caseName: { type: 'string' },
    court: { type: 'string' },
    docketNumber: { type: 'string' },
    decisionDate: { type: 'string' },
    holdings: stringList,
  },
};

export const extractionBatchSchema = {
  type: 'object',
  required: ['source', 'concepts', 'relationships'],
  properties: {
    source: {
      type: 'object',
      required: ['sourceId', 'authority'],
      properties: {
        sourceId: nonEmpty,
        authority: { type: 'string', enum: [...AUTHORITY_LEVELS] },
        jurisdiction: { type: 'string' },
        title: { type: 'string' },
      },
    },
    concepts: {
      type: 'array',
      items: {
        type: 'object',
        required: ['provisionalId', 'kind', 'name'],
        properties: {
          provisionalId: nonEmpty,
          kind: { type: 'string', enum: [...NODE_KINDS] },
          name: { type: 'string', pattern: '\\S' },
          description: { type: 'string' },
          authority: { type: 'string', enum: [...AUTHORITY_LEVELS] },
          jurisdiction: { type: 'string' },
          attributes: stringMap,
          quote: {
            type: 'object',
            required: ['text'],
            properties: {
              text: { type: 'string' },
              sourceReference: { type: 'string' },
              explanation: { type: 'string' },
            },
          },
          chunkIds: stringList,
          details: detailsSchema,
        },
      },
    },
    relationships: {
      type: 'array',
      items: {
        type: 'object',
        required: ['sourceId', 'targetId', 'type'],
        properties: {
          sourceId: nonEmpty,
          targetId: nonEmpty,
          type: { type: 'string', enum: [...RELATIONSHIP_TYPES] },
          strength: { type: 'number', minimum: 0, maximum: 1 },
          evidenceLevel: { type: 'string', enum: ['required', 'helpful', 'sufficient'] },
          attributes: {
            type: 'object',
            additionalProperties: { type: ['string', 'number', 'boolean'] },
          },
        },
      },
    },
    chunkIds: stringList,
  },
};

export const isExtractionBatch = validator.compileSchema<ExtractionBatch>(extractionBatchSchema);
