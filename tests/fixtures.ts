import pg from 'pg';
import { Queryable } from '../src/config/database.js';
import { DEFAULT_RESOLUTION_SETTINGS, ResolutionSettings } from '../src/config/resolution.js';
import { CompletionClient, CompletionResponse } from '../src/concurrent/types.js';
import { ConceptNode, IncomingConcept } from '../src/domain/types.js';
import { createNodeFromIncoming } from '../src/resolution/EntityMerger.js';

export function incoming(overrides: Partial<IncomingConcept> = {}): IncomingConcept {
  return {
    kind: 'law',
    name: 'Rent Stabilization Law',
    authority: 'binding_legal_authority',
    attributes: {},
    quotes: [],
    sourceId: 'doc-1',
    chunkIds: [],
    ...overrides,
  };
}

export function node(id: string, overrides: Partial<IncomingConcept> = {}): ConceptNode {
  return createNodeFromIncoming(id, incoming(overrides));
}

export function settings(overrides: Partial<ResolutionSettings> = {}): ResolutionSettings {
  return { ...DEFAULT_RESOLUTION_SETTINGS, ...overrides };
}

/**
 * Completion client answering from a queue of canned contents, or throwing
 * when the entry is an Error
 */
export class ScriptedClient implements CompletionClient {
  readonly calls: Array<Parameters<CompletionClient['complete']>> = [];

  constructor(private answers: Array<string | Error>) {}

  async complete(...args: Parameters<CompletionClient['complete']>): Promise<CompletionResponse> {
    this.calls.push(args);
    const next = this.answers.shift();
    if (next === undefined) throw new Error('No scripted answer left');
    if (next instanceof Error) throw next;
    return { content: next, finishReason: 'stop' };
  }
}

export function sequentialIds(): (kind: string) => string {
  let next = 0;
  return (kind) => `${kind}:new-${++next}`;
}

/**
 * Queryable answering from a queue of row sets, or throwing when the entry
 * is an Error
 */
export class FakeDb implements Queryable {
  readonly queries: Array<{ text: string; values?: unknown[] }> = [];

  constructor(private responses: Array<pg.QueryResultRow[] | Error> = []) {}

  async query(text: string, values?: unknown[]): Promise<pg.QueryResult<pg.QueryResultRow>> {
    this.queries.push({ text, values });
    const next = this.responses.shift() ?? [];
    if (next instanceof Error) throw next;
    return { rows: next, rowCount: next.length, command: 'SELECT', oid: 0, fields: [] };
  }
}

export function pgError(code: string, message = `pg error ${code}`): Error {
  return Object.assign(new Error(message), { code });
}
