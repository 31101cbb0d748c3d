import { NodeKind } from '../domain/types.js';
import { conceptKey } from './deduplicate.js';

export interface CachedResolution {
  nodeId: string;
  /** True when the id names a node that was already in the graph */
  existing: boolean;
}

/**
 * Resolution memo for one ingestion call. Each call owns its own context so
 * concurrent ingestions never see each other's decisions.
 */
export class ResolutionContext {
  private cache = new Map<string, CachedResolution>();

  constructor(readonly sourceId: string) {}

  get(kind: NodeKind, name: string): CachedResolution | undefined {
    return this.cache.get(conceptKey(kind, name));
  }

  remember(kind: NodeKind, name: string, resolution: CachedResolution): void {
    this.cache.set(conceptKey(kind, name), resolution);
  }

  get size(): number {
    return this.cache.size;
  }
}
