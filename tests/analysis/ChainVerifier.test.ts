import { describe, expect, it } from 'vitest';
import { ChainVerifier, combineStatuses, enforceStrength, strengthLabel } from '../../src/analysis/ChainVerifier.js';
import { ProofChainBuilder } from '../../src/analysis/ProofChainBuilder.js';
import { VerificationStatus } from '../../src/analysis/types.js';
import { EdgeRef } from '../../src/domain/types.js';
import { housingGraph } from './housingGraph.js';

const passing: VerificationStatus = {
  graphPathExists: true,
  lawsApplyToIssue: true,
  remediesEnabledByLaws: true,
  unconfirmedEdges: [],
};

const failing: VerificationStatus = {
  graphPathExists: false,
  lawsApplyToIssue: false,
  remediesEnabledByLaws: false,
  unconfirmedEdges: [],
};

describe('enforceStrength', () => {
  it('leaves a fully verified strength alone', () => {
    expect(enforceStrength(0.9, passing)).toBe(0.9);
  });

  it('applies every downgrade in order, respecting floors', () => {
    // 0.9 -> 0.27 -> floor 0.2 -> stays 0.2
    expect(enforceStrength(0.9, failing)).toBeCloseTo(0.2);
  });

  it('downgrades by the remedy factor alone', () => {
    expect(enforceStrength(0.8, { ...passing, remediesEnabledByLaws: false })).toBeCloseTo(0.56);
  });

  it('never raises a strength already below the floors', () => {
    expect(enforceStrength(0.05, failing)).toBe(0.05);
  });

  it('never exceeds the input strength', () => {
    for (const strength of [0, 0.15, 0.25, 0.5, 1]) {
      expect(enforceStrength(strength, failing)).toBeLessThanOrEqual(strength);
    }
  });
});

describe('strengthLabel', () => {
  it('labels by threshold', () => {
    expect(strengthLabel(0.7)).toBe('strong');
    expect(strengthLabel(0.4)).toBe('moderate');
    expect(strengthLabel(0.39)).toBe('weak');
  });
});

describe('combineStatuses', () => {
  it('passes a check when any chain passes it', () => {
    const edge: EdgeRef = { sourceId: 'a', targetId: 'b', type: 'ENABLES' };

    expect(combineStatuses([{ ...failing, unconfirmedEdges: [edge] }, { ...failing, lawsApplyToIssue: true }])).toEqual({
      graphPathExists: false,
      lawsApplyToIssue: true,
      remediesEnabledByLaws: false,
      unconfirmedEdges: [edge],
    });
  });
});

describe('ChainVerifier', () => {
  async function abatementChain() {
    const [chain] = await new ProofChainBuilder(await housingGraph()).buildProofChains(['issue:heat']);
    return chain;
  }

  it('flags hops whose edge the graph does not have', async () => {
    const chain = await abatementChain();
    const verifier = new ChainVerifier({ hasEdge: async (ref: EdgeRef) => ref.type !== 'ENABLES' });

    expect(await verifier.verify(chain)).toEqual({
      graphPathExists: false,
      lawsApplyToIssue: true,
      remediesEnabledByLaws: false,
      unconfirmedEdges: [{ sourceId: 'law:whab', targetId: 'remedy:abate', type: 'ENABLES' }],
    });
  });

  it('checks only the requested hops', async () => {
    const chain = await abatementChain();
    const verifier = new ChainVerifier({ hasEdge: async (ref: EdgeRef) => ref.type !== 'ENABLES' });

    expect((await verifier.verify(chain, [1, 99])).graphPathExists).toBe(true);
    expect((await verifier.verify(chain, [0])).graphPathExists).toBe(false);
  });
});
