import { CompletionClient } from '../concurrent/types.js';
import { MalformedExternalResponseError } from '../domain/errors.js';
import { NodeKind } from '../domain/types.js';
import { createLogger } from '../utils/logger.js';
import { extractJsonFromResponse, validator } from '../utils/validators.js';

const logger = createLogger('JudgmentService');

export interface JudgmentSubject {
  name: string;
  kind: NodeKind;
  description?: string;
}

export interface JudgmentPair {
  incoming: JudgmentSubject;
  existing: JudgmentSubject;
}

export type JudgmentResult =
  | { status: 'matched' }
  | { status: 'not_matched' }
  | { status: 'unavailable'; reason: string };

/**
 * Same-concept verdicts for a batch of candidate pairs, one result per pair
 * in input order.
 */
export interface JudgmentService {
  judgeBatch(pairs: JudgmentPair[]): Promise<JudgmentResult[]>;
}

// ============================================================================
// LLM-backed implementation
// ============================================================================

const SYSTEM_PROMPT =
  'You are an expert at determining if two legal entities refer to the same thing. ' +
  'Respond with a JSON object mapping pair numbers to YES or NO.';

type Verdicts = Record<string, string>;

const isVerdicts = validator.compileSchema<Verdicts>({
  type: 'object',
  additionalProperties: { type: 'string' },
});

export function buildJudgmentPrompt(pairs: JudgmentPair[]): string {
  const lines = [
    'Determine if each pair of legal entities refers to the same thing.',
    'Consider abbreviations, alternative names, and section numbers.',
    '',
    'Respond with JSON format: {"1": "YES", "2": "NO", ...}',
    '',
    'Pairs to evaluate:',
    '',
  ];

  pairs.forEach(({ incoming, existing }, index) => {
    lines.push(`${index + 1}. New: "${incoming.name}" (${incoming.kind})`);
    lines.push(`   Description: ${incoming.description || 'N/A'}`);
    lines.push(`   Existing: "${existing.name}"`);
    lines.push(`   Description: ${existing.description || 'N/A'}`);
    lines.push('');
  });

  return lines.join('\n');
}

/**
 * Parse a verdict map. Entries that are missing or anything but YES count
 * as no match; output that is not a JSON object raises.
 */
export function parseVerdicts(content: string, pairCount: number): JudgmentResult[] {
  let parsed: unknown;
  try {
    parsed = extractJsonFromResponse(content);
  } catch (error) {
    throw new MalformedExternalResponseError('Judgment response is not JSON', { cause: error });
  }

  const result = validator.validate(isVerdicts, parsed);
  if (!result.data) {
    throw new MalformedExternalResponseError(
      `Judgment response has the wrong shape:\n${validator.formatErrors(result.errors)}`
    );
  }

  const verdicts = result.data;
  return Array.from({ length: pairCount }, (_, index) =>
    verdicts[String(index + 1)]?.trim().toUpperCase() === 'YES'
      ? { status: 'matched' as const }
      : { status: 'not_matched' as const }
  );
}

/**
 * Judgment Service backed by a completion client
 *
 * Any client failure or unparseable answer marks every pair of that call
 * unavailable; it never throws.
 */
export class LLMJudgmentService implements JudgmentService {
  constructor(
    private client: CompletionClient,
    private model?: string
  ) {}

  async judgeBatch(pairs: JudgmentPair[]): Promise<JudgmentResult[]> {
    if (pairs.length === 0) return [];

    try {
      const response = await this.client.complete(
        [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildJudgmentPrompt(pairs) },
        ],
        { type: 'json_object' },
        { model: this.model, temperature: 0, maxOutputTokens: 50 + pairs.length * 20 }
      );

      return parseVerdicts(response.content, pairs.length);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logger.warn('Batch judgment failed, treating pairs as unavailable', {
        pairs: pairs.length,
        error: reason,
      });
      return pairs.map(() => ({ status: 'unavailable' as const, reason }));
    }
  }
}
