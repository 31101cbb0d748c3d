import { ConcurrentMergeConflictError, MissingEndpointError } from '../domain/errors.js';
import {
  ConceptNode,
  EdgeRef,
  NodeKind,
  RelationshipEdge,
  VersionedNode,
  edgeKey,
} from '../domain/types.js';
import { EdgeWriteResult, GraphStore, TraversalHit, TraversalStep } from './GraphStore.js';

/**
 * In-process graph store
 *
 * Same contract as the PostgreSQL store. Everything handed in or out is
 * cloned so callers never share state with the store.
 */
export class InMemoryGraphStore implements GraphStore {
  private nodes = new Map<string, VersionedNode>();
  private edges = new Map<string, RelationshipEdge>();

  async getNode(id: string): Promise<VersionedNode | null> {
    const stored = this.nodes.get(id);
    return stored ? structuredClone(stored) : null;
  }

  async upsertNode(node: ConceptNode, expectedVersion: number | null): Promise<number> {
    const stored = this.nodes.get(node.id);

    if (expectedVersion === null) {
      if (stored) throw new ConcurrentMergeConflictError(node.id, null);
      this.nodes.set(node.id, { node: structuredClone(node), version: 1 });
      return 1;
    }

    if (!stored || stored.version !== expectedVersion) {
      throw new ConcurrentMergeConflictError(node.id, expectedVersion);
    }

    const version = stored.version + 1;
    this.nodes.set(node.id, { node: structuredClone(node), version });
    return version;
  }

  async getOrCreateEdge(edge: RelationshipEdge): Promise<EdgeWriteResult> {
    for (const endpoint of [edge.sourceId, edge.targetId]) {
      if (!this.nodes.has(endpoint)) throw new MissingEndpointError(endpoint);
    }

    const key = edgeKey(edge);
    const existing = this.edges.get(key);
    if (existing) {
      return { edge: structuredClone(existing), created: false };
    }

    this.edges.set(key, structuredClone(edge));
    return { edge: structuredClone(edge), created: true };
  }

  async hasEdge(ref: EdgeRef): Promise<boolean> {
    return this.edges.has(edgeKey(ref));
  }

  async traverse(startId: string, step: TraversalStep, limit: number): Promise<TraversalHit[]> {
    const hits: TraversalHit[] = [];

    for (const edge of this.edges.values()) {
      if (hits.length >= limit) break;
      if (edge.type !== step.relation) continue;

      const outbound = edge.sourceId === startId && step.direction !== 'inbound';
      const inbound = edge.targetId === startId && step.direction !== 'outbound';
      if (!outbound && !inbound) continue;

      const neighbour = this.nodes.get(outbound ? edge.targetId : edge.sourceId);
      if (!neighbour) continue;
      if (step.targetKinds && !step.targetKinds.includes(neighbour.node.kind)) continue;

      hits.push({ node: structuredClone(neighbour.node), edge: structuredClone(edge) });
    }

    return hits;
  }

  /**
   * Snapshot of stored nodes, optionally of one kind
   */
  listNodes(kind?: NodeKind): ConceptNode[] {
    const result: ConceptNode[] = [];
    for (const { node } of this.nodes.values()) {
      if (!kind || node.kind === kind) result.push(structuredClone(node));
    }
    return result;
  }

  listEdges(): RelationshipEdge[] {
    return [...this.edges.values()].map((edge) => structuredClone(edge));
  }
}
