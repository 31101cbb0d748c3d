import { beforeAll, describe, expect, it } from 'vitest';
import { ChainExplainer, buildExplanationPrompt } from '../../src/analysis/ChainExplainer.js';
import { ProofChainBuilder } from '../../src/analysis/ProofChainBuilder.js';
import { ProofChain } from '../../src/analysis/types.js';
import { ScriptedClient } from '../fixtures.js';
import { housingGraph } from './housingGraph.js';

describe('ChainExplainer', () => {
  let chain: ProofChain;

  beforeAll(async () => {
    [chain] = await new ProofChainBuilder(await housingGraph()).buildProofChains(['issue:heat']);
  });

  it('numbers the hops it shows the model', () => {
    const prompt = buildExplanationPrompt(chain);

    expect(prompt).toContain(
      '0. issue: No heat\n' +
        '1. law: Warranty of Habitability [RPL § 235-b] (APPLIES_TO)\n' +
        '2. remedy: Rent abatement (ENABLES)\n' +
        '3. evidence_type: Photos (REQUIRES)'
    );
  });

  it('returns the explanation with the distinct in-range hops it cites', async () => {
    const client = new ScriptedClient(['{"explanation": " The warranty covers heat. ", "hops": [2, 1, 2, 9]}']);

    const explanation = await new ChainExplainer(client).explain(chain);

    expect(explanation).toEqual({ text: 'The warranty covers heat.', hopIndices: [1, 2] });
    const [, format, completion] = client.calls[0];
    expect(format).toMatchObject({ type: 'json_schema', json_schema: { name: 'chain_explanation', strict: true } });
    expect(completion).toEqual({ model: undefined, temperature: 0.2, maxOutputTokens: 800 });
  });

  it('returns null for output off the schema', async () => {
    const client = new ScriptedClient(['{"explanation": "No hops given"}']);

    expect(await new ChainExplainer(client).explain(chain)).toBeNull();
  });

  it('returns null when the call fails', async () => {
    const client = new ScriptedClient([new Error('service unavailable')]);

    expect(await new ChainExplainer(client).explain(chain)).toBeNull();
  });
});
