import { ChainExplainer } from './analysis/ChainExplainer.js';
import { DatabaseConfig } from './config/database.js';
import { ResolutionConfig, ResolutionSettings } from './config/resolution.js';
import { KnowledgeBase } from './core/KnowledgeBase.js';
import { ConfigurationError } from './domain/errors.js';
import { ProviderFactory } from './core/providers/ProviderFactory.js';
import { PostgresChunkStore } from './graph/ChunkStore.js';
import { PostgresGraphStore } from './graph/PostgresGraphStore.js';
import { LLMJudgmentService } from './services/JudgmentService.js';
import { PostgresSimilaritySearch } from './services/PostgresSimilaritySearch.js';
import { logger } from './utils/logger.js';

export interface KnowledgeBaseOptions {
  settings?: ResolutionSettings;
  /** Apply sql/schema.sql before returning */
  ensureSchema?: boolean;
  /** Attach the LLM chain explainer */
  withExplainer?: boolean;
}

/**
 * Composition root: PostgreSQL graph store, trigram similarity search and
 * LLM judgment, all from environment configuration.
 */
export async function createKnowledgeBase(options: KnowledgeBaseOptions = {}): Promise<KnowledgeBase> {
  const settings = options.settings ?? ResolutionConfig.getConfig();
  if (!ProviderFactory.validateProvider(settings.judgmentProvider)) {
    throw new ConfigurationError(`Judgment provider "${settings.judgmentProvider}" is not configured`);
  }

  const db = DatabaseConfig.getQueryable();
  const store = new PostgresGraphStore(db);

  if (options.ensureSchema) {
    await store.ensureSchema();
  }

  const client = ProviderFactory.createClient(settings.judgmentProvider, 'KnowledgeBase');

  logger.info('Knowledge base ready', {
    provider: settings.judgmentProvider,
    autoMergeThreshold: settings.autoMergeThreshold,
    judgmentThreshold: settings.judgmentThreshold,
    inferRelationships: settings.inferRelationships,
  });

  return new KnowledgeBase({
    store,
    chunks: new PostgresChunkStore(db),
    similarity: new PostgresSimilaritySearch(db),
    judgment: new LLMJudgmentService(client),
    settings,
    ...(options.withExplainer ? { explainer: new ChainExplainer(client) } : {}),
  });
}

export { KnowledgeBase } from './core/KnowledgeBase.js';
export type { KnowledgeBaseDependencies, RankRemediesOptions } from './core/KnowledgeBase.js';
export { ConsolidationPipeline } from './resolution/ConsolidationPipeline.js';
export type { ResolutionReport, NodeFailure } from './resolution/ConsolidationPipeline.js';
export { EntityResolver } from './resolution/EntityResolver.js';
export { createNodeFromIncoming, mergeNode } from './resolution/EntityMerger.js';
export { RelationshipRewriter } from './resolution/RelationshipRewriter.js';
export { ProofChainBuilder } from './analysis/ProofChainBuilder.js';
export { ChainVerifier, enforceStrength } from './analysis/ChainVerifier.js';
export { rankRemedies } from './analysis/RemedyRanker.js';
export { CaseAnalysisService } from './analysis/CaseAnalysisService.js';
export type { CaseAnalysis, CaseAnalysisRequest } from './analysis/CaseAnalysisService.js';
export { ChainExplainer } from './analysis/ChainExplainer.js';
export type * from './analysis/types.js';
export { InMemoryGraphStore } from './graph/InMemoryGraphStore.js';
export { PostgresGraphStore } from './graph/PostgresGraphStore.js';
export { InMemoryChunkStore, PostgresChunkStore } from './graph/ChunkStore.js';
export type { GraphStore } from './graph/GraphStore.js';
export { InMemorySimilaritySearch } from './services/SimilaritySearch.js';
export { PostgresSimilaritySearch } from './services/PostgresSimilaritySearch.js';
export { LLMJudgmentService } from './services/JudgmentService.js';
export type { JudgmentService, JudgmentResult } from './services/JudgmentService.js';
export { ResolutionConfig, DEFAULT_RESOLUTION_SETTINGS } from './config/resolution.js';
export * from './domain/errors.js';
export * from './domain/types.js';
