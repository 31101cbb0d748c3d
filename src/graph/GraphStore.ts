import {
  ConceptNode,
  EdgeRef,
  NodeKind,
  RelationshipEdge,
  RelationshipType,
  VersionedNode,
} from '../domain/types.js';

export type TraversalDirection = 'outbound' | 'inbound' | 'any';

/**
 * One hop of a traversal pattern: follow edges of `relation` in `direction`
 * from the start node, keeping neighbours whose kind is in `targetKinds`.
 */
export interface TraversalStep {
  relation: RelationshipType;
  direction: TraversalDirection;
  targetKinds?: readonly NodeKind[];
}

export interface TraversalHit {
  node: ConceptNode;
  edge: RelationshipEdge;
}

export interface EdgeWriteResult {
  edge: RelationshipEdge;
  created: boolean;
}

/**
 * Graph storage primitives
 *
 * Implementations raise GraphStoreUnavailableError when the backing store
 * cannot be reached, ConcurrentMergeConflictError when a versioned write
 * loses, and MissingEndpointError when an edge names an unknown node.
 */
export interface GraphStore {
  getNode(id: string): Promise<VersionedNode | null>;

  /**
   * Write a node under optimistic concurrency.
   *
   * @param expectedVersion `null` when the node must not exist yet,
   *   otherwise the version the caller read
   * @returns the version now stored
   */
  upsertNode(node: ConceptNode, expectedVersion: number | null): Promise<number>;

  /** Insert the edge unless one with the same source, target and type exists */
  getOrCreateEdge(edge: RelationshipEdge): Promise<EdgeWriteResult>;

  hasEdge(ref: EdgeRef): Promise<boolean>;

  traverse(startId: string, step: TraversalStep, limit: number): Promise<TraversalHit[]>;
}
