import { createLogger } from '../utils/logger.js';
import { ChainExplainer, ChainExplanation } from './ChainExplainer.js';
import { ChainVerifier, combineStatuses, enforceStrength, strengthLabel } from './ChainVerifier.js';
import { EvidenceGap, analyzeEvidenceGap } from './EvidenceGap.js';
import { ProofChainBuilder } from './ProofChainBuilder.js';
import { rankRemedies } from './RemedyRanker.js';
import {
  HopNode,
  ProofChain,
  RemedyOption,
  StrengthLabel,
  UnsupportedIssue,
  VerificationStatus,
} from './types.js';

const logger = createLogger('CaseAnalysis');

const MAX_CRITICAL_STEPS = 3;
const MAX_NEXT_STEPS = 10;
const HIGH_PRIORITY_STRENGTH = 0.6;

export interface CaseAnalysisRequest {
  issueIds: string[];
  evidencePresent: string[];
  jurisdiction?: string;
  /** Caller's strength estimate per issue id; evidence strength otherwise */
  strengthEstimates?: Record<string, number>;
  retrievalScores?: ReadonlyMap<string, number>;
  /** Ask the explainer for a narrative of each issue's top chain */
  explain?: boolean;
  chainLimit?: number;
}

export interface IssueAnalysis {
  issue: HopNode;
  chains: ProofChain[];
  verification: VerificationStatus;
  evidence: EvidenceGap;
  baseStrength: number;
  adjustedStrength: number;
  strengthLabel: StrengthLabel;
  remedies: RemedyOption[];
  explanation?: ChainExplanation;
}

export type StepPriority = 'critical' | 'high' | 'medium';

export interface NextStep {
  priority: StepPriority;
  action: string;
  why: string;
  how: string;
  issueId?: string;
}

export interface CaseAnalysis {
  issues: IssueAnalysis[];
  /** Requested issues with no verified chain; nothing is scored for them */
  unsupported: UnsupportedIssue[];
  nextSteps: NextStep[];
}

/**
 * Case Analysis Service
 *
 * Only issues with at least one verified chain get an evidence score,
 * remedies or an explanation. The rest are listed as unsupported.
 */
export class CaseAnalysisService {
  constructor(
    private builder: ProofChainBuilder,
    private verifier: ChainVerifier,
    private explainer?: ChainExplainer
  ) {}

  async analyze(request: CaseAnalysisRequest): Promise<CaseAnalysis> {
    const coverage = await this.builder.buildProofChainsWithCoverage(request.issueIds, {
      jurisdiction: request.jurisdiction,
      limit: request.chainLimit,
      evidencePresent: request.evidencePresent,
    });

    const byIssue = new Map<string, ProofChain[]>();
    for (const chain of coverage.chains) {
      const chains = byIssue.get(chain.issue.id);
      if (chains) chains.push(chain);
      else byIssue.set(chain.issue.id, [chain]);
    }

    const unsupported: UnsupportedIssue[] = [...coverage.unsupported];
    const analyses = await Promise.all(
      [...byIssue.values()].map(async (chains) => {
        const verified = chains.filter((c) => c.verification.graphPathExists);
        if (verified.length === 0) {
          unsupported.push({ issueId: chains[0].issue.id, reason: 'no_graph_support' });
          return null;
        }
        return this.analyzeIssue(verified, request);
      })
    );

    const issues = analyses.filter((a): a is IssueAnalysis => a !== null);
    const nextSteps = generateNextSteps(issues);

    logger.info('Case analysis complete', {
      requested: request.issueIds.length,
      supported: issues.length,
      unsupported: unsupported.map((u) => u.issueId),
    });

    return { issues, unsupported, nextSteps };
  }

  private async analyzeIssue(chains: ProofChain[], request: CaseAnalysisRequest): Promise<IssueAnalysis> {
    const issue = chains[0].issue;
    const evidence = analyzeEvidenceGap(chains, request.evidencePresent);

    let verification = combineStatuses(chains.map((c) => c.verification));
    let explanation: ChainExplanation | undefined;

    if (request.explain && this.explainer) {
      const top = [...chains].sort((a, b) => b.completeness - a.completeness)[0];
      const explained = await this.explainer.explain(top);
      if (explained) {
        const checked = await this.verifier.verify(top, explained.hopIndices);
        if (checked.graphPathExists) {
          explanation = explained;
        } else if (checked.unconfirmedEdges.length === 0) {
          logger.warn('Explanation cites no checkable hop, dropped', { issueId: issue.id });
        } else {
          logger.warn('Explanation relies on unconfirmed edges, dropped', {
            issueId: issue.id,
            unconfirmed: checked.unconfirmedEdges,
          });
          // Only a missing edge in the graph downgrades the issue
          verification = {
            ...verification,
            graphPathExists: false,
            unconfirmedEdges: [...verification.unconfirmedEdges, ...checked.unconfirmedEdges],
          };
        }
      }
    }

    const estimate = request.strengthEstimates?.[issue.id] ?? evidence.evidenceStrength;
    const baseStrength = Math.min(1, Math.max(0, estimate));
    const adjustedStrength = enforceStrength(baseStrength, verification);

    return {
      issue,
      chains,
      verification,
      evidence,
      baseStrength,
      adjustedStrength,
      strengthLabel: strengthLabel(adjustedStrength),
      remedies: rankRemedies(chains, request.evidencePresent, {
        jurisdiction: request.jurisdiction,
        retrievalScores: request.retrievalScores,
      }),
      ...(explanation ? { explanation } : {}),
    };
  }
}

/**
 * Critical evidence to obtain first (up to three), then the top remedy of
 * each issue: high priority above 0.6 adjusted strength, medium otherwise.
 */
export function generateNextSteps(issues: readonly IssueAnalysis[]): NextStep[] {
  const steps: NextStep[] = [];

  const toObtain = new Map<string, { method: string; issueId: string }>();
  for (const analysis of issues) {
    const ordered = [
      ...analysis.evidence.missingCritical,
      ...analysis.evidence.missing.filter((m) => !analysis.evidence.missingCritical.includes(m)),
    ];
    for (const item of ordered) {
      if (toObtain.has(item)) continue;
      const hint = analysis.evidence.howToObtain.find((h) => h.item === item);
      toObtain.set(item, { method: hint?.method ?? 'Consult with legal aid', issueId: analysis.issue.id });
    }
  }

  for (const [item, { method, issueId }] of [...toObtain].slice(0, MAX_CRITICAL_STEPS)) {
    steps.push({
      priority: 'critical',
      action: `Obtain: ${item}`,
      why: 'Required evidence for legal claim',
      how: method,
      issueId,
    });
  }

  const byStrength = [...issues].sort((a, b) => b.adjustedStrength - a.adjustedStrength);
  for (const analysis of byStrength) {
    const top = analysis.remedies[0];
    if (!top) continue;
    steps.push({
      priority: analysis.adjustedStrength > HIGH_PRIORITY_STRENGTH ? 'high' : 'medium',
      action: `Pursue ${top.name}`,
      why: `${Math.round(top.probability * 100)}% estimated likelihood under ${top.enablingLawName}`,
      how: top.citation ? `Rely on ${top.citation}` : `Rely on ${top.enablingLawName}`,
      issueId: analysis.issue.id,
    });
  }

  return steps.slice(0, MAX_NEXT_STEPS);
}
