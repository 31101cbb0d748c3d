/**
 * Error taxonomy for ingestion and analysis.
 *
 * Only GraphStoreUnavailableError and InvalidBatchError are allowed to escape
 * an ingestion call; the rest are caught where they occur and counted.
 */

export class KnowledgeBaseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Similarity search could not be reached */
export class LookupUnavailableError extends KnowledgeBaseError {}

/** Judgment service failed or could not be reached */
export class JudgmentUnavailableError extends KnowledgeBaseError {}

/** Judgment service answered with output that could not be parsed */
export class MalformedExternalResponseError extends JudgmentUnavailableError {}

export class ExternalTimeoutError extends KnowledgeBaseError {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
  }
}

/** A compare-and-swap write lost against a concurrent writer */
export class ConcurrentMergeConflictError extends KnowledgeBaseError {
  constructor(
    readonly nodeId: string,
    readonly expectedVersion: number | null
  ) {
    super(
      expectedVersion === null
        ? `Node ${nodeId} already exists`
        : `Node ${nodeId} changed since version ${expectedVersion}`
    );
  }
}

export class MissingEndpointError extends KnowledgeBaseError {
  constructor(readonly nodeId: string) {
    super(`Edge endpoint ${nodeId} does not exist`);
  }
}

/** The graph store itself is unreachable. Fatal for the whole operation. */
export class GraphStoreUnavailableError extends KnowledgeBaseError {}

export class InvalidBatchError extends KnowledgeBaseError {}

export class ConfigurationError extends KnowledgeBaseError {}
