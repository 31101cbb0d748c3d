import { CaseAnalysis, CaseAnalysisRequest, CaseAnalysisService } from '../analysis/CaseAnalysisService.js';
import { ChainExplainer } from '../analysis/ChainExplainer.js';
import { ChainVerifier } from '../analysis/ChainVerifier.js';
import { ProofChainBuilder } from '../analysis/ProofChainBuilder.js';
import { rankRemedies } from '../analysis/RemedyRanker.js';
import { ProofChain, ProofChainCoverage, RemedyOption } from '../analysis/types.js';
import { ConsolidationDependencies, ConsolidationPipeline, ResolutionReport } from '../resolution/ConsolidationPipeline.js';

export interface KnowledgeBaseDependencies extends ConsolidationDependencies {
  explainer?: ChainExplainer;
}

export interface RankRemediesOptions {
  jurisdiction?: string;
  retrievalScores?: ReadonlyMap<string, number>;
  chainLimit?: number;
}

/**
 * Knowledge Base
 *
 * The operations offered to the ingestion pipeline and the case-analysis
 * layer, over one graph store.
 */
export class KnowledgeBase {
  private pipeline: ConsolidationPipeline;
  private builder: ProofChainBuilder;
  private analysis: CaseAnalysisService;

  constructor(deps: KnowledgeBaseDependencies) {
    this.pipeline = new ConsolidationPipeline(deps);
    this.builder = new ProofChainBuilder(deps.store);
    this.analysis = new CaseAnalysisService(this.builder, new ChainVerifier(deps.store), deps.explainer);
  }

  /**
   * Resolve, merge and link one document's extracted concepts and relationships
   */
  resolveAndMerge(batch: unknown): Promise<ResolutionReport> {
    return this.pipeline.resolveAndMerge(batch);
  }

  buildProofChains(issueIds: readonly string[], jurisdiction?: string, limit?: number): Promise<ProofChain[]> {
    return this.builder.buildProofChains(issueIds, { jurisdiction, limit });
  }

  buildProofChainsWithCoverage(
    issueIds: readonly string[],
    jurisdiction?: string,
    limit?: number
  ): Promise<ProofChainCoverage> {
    return this.builder.buildProofChainsWithCoverage(issueIds, { jurisdiction, limit });
  }

  /**
   * Remedies reachable from one issue, scored against the user's evidence.
   * Empty when the issue has no verified chain.
   */
  async rankRemedies(
    issueId: string,
    evidencePresent: readonly string[],
    options: RankRemediesOptions = {}
  ): Promise<RemedyOption[]> {
    const chains = await this.builder.buildProofChains([issueId], {
      jurisdiction: options.jurisdiction,
      limit: options.chainLimit,
    });
    return rankRemedies(
      chains.filter((c) => c.verification.graphPathExists),
      evidencePresent,
      { jurisdiction: options.jurisdiction, retrievalScores: options.retrievalScores }
    );
  }

  analyzeCase(request: CaseAnalysisRequest): Promise<CaseAnalysis> {
    return this.analysis.analyze(request);
  }
}
