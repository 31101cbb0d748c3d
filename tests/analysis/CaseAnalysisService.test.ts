import { beforeEach, describe, expect, it } from 'vitest';
import { CaseAnalysisService } from '../../src/analysis/CaseAnalysisService.js';
import { ChainExplainer } from '../../src/analysis/ChainExplainer.js';
import { ChainVerifier } from '../../src/analysis/ChainVerifier.js';
import { ProofChainBuilder } from '../../src/analysis/ProofChainBuilder.js';
import { EdgeRef } from '../../src/domain/types.js';
import { InMemoryGraphStore } from '../../src/graph/InMemoryGraphStore.js';
import { ScriptedClient } from '../fixtures.js';
import { housingGraph } from './housingGraph.js';

const LEGAL_AID = 'Consult with legal aid or a tenant advocacy organization for guidance';

class UnverifiableStore extends InMemoryGraphStore {
  async hasEdge(_ref: EdgeRef): Promise<boolean> {
    return false;
  }
}

describe('CaseAnalysisService', () => {
  let store: InMemoryGraphStore;

  beforeEach(async () => {
    store = await housingGraph();
  });

  function service(explainer?: ChainExplainer, verifier = new ChainVerifier(store)) {
    return new CaseAnalysisService(new ProofChainBuilder(store), verifier, explainer);
  }

  it('scores supported issues and lists the rest as unsupported', async () => {
    const analysis = await service().analyze({
      issueIds: ['issue:heat', 'issue:mold', 'issue:404'],
      evidencePresent: ['photos', 'complaint'],
      jurisdiction: 'new york',
    });

    expect(analysis.unsupported).toEqual([
      { issueId: 'issue:mold', reason: 'no_graph_support' },
      { issueId: 'issue:404', reason: 'issue_not_found' },
    ]);
    expect(analysis.issues).toHaveLength(1);

    const [heat] = analysis.issues;
    expect(heat.issue.id).toBe('issue:heat');
    expect(heat.chains).toHaveLength(2);
    expect(heat.evidence.evidenceStrength).toBeCloseTo(2 / 3);
    expect(heat.baseStrength).toBeCloseTo(2 / 3);
    expect(heat.adjustedStrength).toBeCloseTo(2 / 3);
    expect(heat.strengthLabel).toBe('moderate');
    expect(heat.remedies.map((r) => r.remedyId)).toEqual(['remedy:hp', 'remedy:abate']);
    expect(heat.explanation).toBeUndefined();

    expect(analysis.nextSteps).toEqual([
      {
        priority: 'critical',
        action: 'Obtain: Timeline of events',
        why: 'Required evidence for legal claim',
        how: LEGAL_AID,
        issueId: 'issue:heat',
      },
      {
        priority: 'high',
        action: 'Pursue HP action',
        why: '95% estimated likelihood under Warranty of Habitability',
        how: 'Rely on RPL § 235-b',
        issueId: 'issue:heat',
      },
    ]);
  });

  it('puts critical evidence first among the items to obtain', async () => {
    const analysis = await service().analyze({
      issueIds: ['issue:heat'],
      evidencePresent: [],
      jurisdiction: 'new york',
    });

    expect(analysis.nextSteps.map((s) => [s.priority, s.action])).toEqual([
      ['critical', 'Obtain: Photos'],
      ['critical', 'Obtain: Timeline of events'],
      ['critical', 'Obtain: Complaint to 311'],
      ['medium', 'Pursue Rent abatement'],
    ]);
  });

  it('clamps the caller strength estimate', async () => {
    const analysis = await service().analyze({
      issueIds: ['issue:heat'],
      evidencePresent: [],
      strengthEstimates: { 'issue:heat': 1.4 },
    });

    expect(analysis.issues[0].baseStrength).toBe(1);
    expect(analysis.issues[0].strengthLabel).toBe('strong');
  });

  it('scores nothing for an issue whose chains fail verification', async () => {
    const unverifiable = await housingGraph(new UnverifiableStore());
    const analysis = await new CaseAnalysisService(
      new ProofChainBuilder(unverifiable),
      new ChainVerifier(unverifiable)
    ).analyze({ issueIds: ['issue:heat'], evidencePresent: ['photos'] });

    expect(analysis.issues).toEqual([]);
    expect(analysis.unsupported).toEqual([{ issueId: 'issue:heat', reason: 'no_graph_support' }]);
    expect(analysis.nextSteps).toEqual([]);
  });

  it('keeps an explanation whose cited hops are confirmed', async () => {
    const client = new ScriptedClient(['{"explanation": "The warranty requires heat.", "hops": [1, 2]}']);

    const analysis = await service(new ChainExplainer(client)).analyze({
      issueIds: ['issue:heat'],
      evidencePresent: ['photos', 'complaint'],
      jurisdiction: 'new york',
      explain: true,
    });

    expect(analysis.issues[0].explanation).toEqual({ text: 'The warranty requires heat.', hopIndices: [1, 2] });
  });

  it.each<{ hops: number[] }>([{ hops: [] }, { hops: [0] }])(
    'drops an explanation citing hops $hops without touching the scores',
    async ({ hops }) => {
      const request = {
        issueIds: ['issue:heat'],
        evidencePresent: ['photos', 'complaint'],
        jurisdiction: 'new york',
      };
      const plain = await service().analyze(request);
      const client = new ScriptedClient([JSON.stringify({ explanation: 'Heat is owed.', hops })]);

      const analysis = await service(new ChainExplainer(client)).analyze({ ...request, explain: true });

      const [heat] = analysis.issues;
      expect(heat.explanation).toBeUndefined();
      expect(heat.verification).toEqual(plain.issues[0].verification);
      expect(heat.adjustedStrength).toBeCloseTo(2 / 3);
      expect(heat.adjustedStrength).toBe(plain.issues[0].adjustedStrength);
      expect(heat.strengthLabel).toBe('moderate');
    }
  );

  it('drops an explanation citing unconfirmed hops and downgrades the issue', async () => {
    const client = new ScriptedClient(['{"explanation": "The warranty requires heat.", "hops": [1, 2]}']);
    const blindToEnables = new ChainVerifier({ hasEdge: async (ref: EdgeRef) => ref.type !== 'ENABLES' });

    const analysis = await service(new ChainExplainer(client), blindToEnables).analyze({
      issueIds: ['issue:heat'],
      evidencePresent: ['photos', 'complaint'],
      jurisdiction: 'new york',
      explain: true,
    });

    const [heat] = analysis.issues;
    expect(heat.explanation).toBeUndefined();
    expect(heat.verification.graphPathExists).toBe(false);
    expect(heat.verification.unconfirmedEdges).toEqual([
      { sourceId: 'law:whab', targetId: 'remedy:abate', type: 'ENABLES' },
    ]);
    expect(heat.adjustedStrength).toBeCloseTo(0.2);
    expect(heat.strengthLabel).toBe('weak');
    expect(analysis.nextSteps.at(-1)?.priority).toBe('medium');
  });
});
