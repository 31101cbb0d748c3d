import dotenv from 'dotenv';
import { ConfigurationError } from '../domain/errors.js';

dotenv.config();

export type JudgmentProvider = 'openai' | 'anthropic';

/**
 * Knobs for entity resolution and consolidation
 */
export interface ResolutionSettings {
  /** Score at or above which a candidate is merged without a judgment call */
  autoMergeThreshold: number;
  /** Score at or above which (and below auto-merge) a pair goes to judgment */
  judgmentThreshold: number;
  /** Candidates requested from similarity search per concept */
  candidateLimit: number;
  /** Ambiguous pairs per judgment call */
  judgmentBatchSize: number;
  similarityTimeoutMs: number;
  judgmentTimeoutMs: number;
  /** Compare-and-swap attempts per node before giving up on it */
  maxMergeAttempts: number;
  /** Concurrent similarity lookups / node writes within one batch */
  lookupConcurrency: number;
  judgmentProvider: JudgmentProvider;
  inferRelationships: boolean;
}

export const DEFAULT_RESOLUTION_SETTINGS: ResolutionSettings = {
  autoMergeThreshold: 0.95,
  judgmentThreshold: 0.7,
  candidateLimit: 3,
  judgmentBatchSize: 10,
  similarityTimeoutMs: 5000,
  judgmentTimeoutMs: 30000,
  maxMergeAttempts: 3,
  lookupConcurrency: 8,
  judgmentProvider: 'openai',
  inferRelationships: false,
};

export type Env = Record<string, string | undefined>;

function readNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got '${raw}'`);
  }
  return value;
}

function readPositiveInt(env: Env, key: string, fallback: number): number {
  const value = readNumber(env, key, fallback);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${key} must be a positive integer, got '${env[key]}'`);
  }
  return value;
}

function readBoolean(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return fallback;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new ConfigurationError(`${key} must be true or false, got '${env[key]}'`);
}

function readProvider(env: Env): JudgmentProvider {
  const raw = env.JUDGMENT_PROVIDER?.trim().toLowerCase();
  if (!raw) return DEFAULT_RESOLUTION_SETTINGS.judgmentProvider;
  if (raw === 'openai' || raw === 'anthropic') return raw;
  throw new ConfigurationError(`JUDGMENT_PROVIDER must be 'openai' or 'anthropic', got '${env.JUDGMENT_PROVIDER}'`);
}

/**
 * Resolution Configuration
 *
 * Reads the resolution knobs from the environment and checks they are coherent.
 */
export class ResolutionConfig {
  static getConfig(env: Env = process.env): ResolutionSettings {
    const defaults = DEFAULT_RESOLUTION_SETTINGS;

    const settings: ResolutionSettings = {
      autoMergeThreshold: readNumber(env, 'AUTO_MERGE_THRESHOLD', defaults.autoMergeThreshold),
      judgmentThreshold: readNumber(env, 'JUDGMENT_THRESHOLD', defaults.judgmentThreshold),
      candidateLimit: readPositiveInt(env, 'CANDIDATE_LIMIT', defaults.candidateLimit),
      judgmentBatchSize: readPositiveInt(env, 'JUDGMENT_BATCH_SIZE', defaults.judgmentBatchSize),
      similarityTimeoutMs: readPositiveInt(env, 'SIMILARITY_TIMEOUT_MS', defaults.similarityTimeoutMs),
      judgmentTimeoutMs: readPositiveInt(env, 'JUDGMENT_TIMEOUT_MS', defaults.judgmentTimeoutMs),
      maxMergeAttempts: readPositiveInt(env, 'MAX_MERGE_ATTEMPTS', defaults.maxMergeAttempts),
      lookupConcurrency: readPositiveInt(env, 'LOOKUP_CONCURRENCY', defaults.lookupConcurrency),
      judgmentProvider: readProvider(env),
      inferRelationships: readBoolean(env, 'INFER_RELATIONSHIPS', defaults.inferRelationships),
    };

    this.check(settings);
    return settings;
  }

  /**
   * Thresholds must lie in [0, 1] with the judgment band below auto-merge
   */
  static check(settings: ResolutionSettings): void {
    const { autoMergeThreshold, judgmentThreshold } = settings;

    for (const [key, value] of [
      ['autoMergeThreshold', autoMergeThreshold],
      ['judgmentThreshold', judgmentThreshold],
    ] as const) {
      if (value < 0 || value > 1) {
        throw new ConfigurationError(`${key} must lie in [0, 1], got ${value}`);
      }
    }

    if (judgmentThreshold > autoMergeThreshold) {
      throw new ConfigurationError(
        `judgmentThreshold (${judgmentThreshold}) must not exceed autoMergeThreshold (${autoMergeThreshold})`
      );
    }
  }
}
