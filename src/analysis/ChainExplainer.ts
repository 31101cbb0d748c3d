import { CompletionClient } from '../concurrent/types.js';
import { createLogger } from '../utils/logger.js';
import { extractJsonFromResponse, validator } from '../utils/validators.js';
import { ProofChain } from './types.js';

const logger = createLogger('ChainExplainer');

export interface ChainExplanation {
  text: string;
  /** Hops the explanation relies on; re-checked by the verifier */
  hopIndices: number[];
}

interface ExplanationResponse {
  explanation: string;
  hops: number[];
}

const explanationSchema = {
  type: 'object',
  required: ['explanation', 'hops'],
  additionalProperties: false,
  properties: {
    explanation: { type: 'string', minLength: 1 },
    hops: { type: 'array', items: { type: 'integer', minimum: 0 } },
  },
};

const isExplanationResponse = validator.compileSchema<ExplanationResponse>(explanationSchema);

const SYSTEM_PROMPT =
  'You explain how a chain of legal authorities applies to a tenant issue. ' +
  'Use only the numbered steps you are given. Do not add laws, remedies, probabilities or scores.';

export function buildExplanationPrompt(chain: ProofChain): string {
  const lines = [`Issue: ${chain.issue.name}`, '', 'Steps:'];

  chain.hops.forEach((hop, index) => {
    const via = hop.edge ? ` (${hop.edge.type})` : '';
    const citation = hop.node.citation ? ` [${hop.node.citation}]` : '';
    lines.push(`${index}. ${hop.node.kind}: ${hop.node.name}${citation}${via}`);
  });

  lines.push(
    '',
    'Write a short plain-language explanation of how these steps apply.',
    'Respond with JSON: {"explanation": "...", "hops": [indices of the steps you relied on]}'
  );
  return lines.join('\n');
}

/**
 * Chain Explainer
 *
 * Optional natural-language layer over a verified chain. It reports which
 * hops it used; it never produces or changes scores.
 */
export class ChainExplainer {
  constructor(
    private client: CompletionClient,
    private model?: string
  ) {}

  /**
   * @returns null when the model fails or answers off-schema
   */
  async explain(chain: ProofChain): Promise<ChainExplanation | null> {
    try {
      const response = await this.client.complete(
        [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildExplanationPrompt(chain) },
        ],
        {
          type: 'json_schema',
          json_schema: { name: 'chain_explanation', schema: explanationSchema, strict: true },
        },
        { model: this.model, temperature: 0.2, maxOutputTokens: 800 }
      );

      const result = validator.validate(isExplanationResponse, extractJsonFromResponse(response.content));
      if (!result.data) {
        logger.warn('Explanation off schema', { errors: validator.formatErrors(result.errors) });
        return null;
      }

      const hopIndices = [...new Set(result.data.hops)].filter((i) => i < chain.hops.length).sort((a, b) => a - b);
      return { text: result.data.explanation.trim(), hopIndices };
    } catch (error) {
      logger.warn('Explanation failed', {
        issue: chain.issue.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }
}
