/**
 * @fileoverview Memory primitive
 *
 * One primitive over the four memory layers. Requests are a discriminated
 * union on `op`; each one is answered by exactly one layer. The layers are
 * public too, for callers that hold the primitive directly.
 *
 * Session and deep entries live in HybridMemoryStores: fully functional on
 * the in-process store alone, mirrored to a RemoteStore when one is given.
 */

import type { WorkflowContext } from '../core/context.js';
import { ValidationError } from '../core/errors.js';
import { BasePrimitive, type PrimitiveOptions } from '../core/primitive.js';
import { emitEvent } from '../observability/instrumentation.js';
import type { RemoteStore } from '../storage/types.js';
import { DeepMemory } from './deep_memory.js';
import { FactRegistry, type Fact, type FactDefinition, type FactSummary, type FactValidation } from './fact_registry.js';
import { HybridMemoryStore } from './hybrid_store.js';
import { SessionMemory } from './session_memory.js';
import type {
  BackendInfo,
  DeepEntry,
  DeepEntryDraft,
  DeepSearchQuery,
  DeepSearchResult,
  MessageDraft,
  RelevanceFunction,
  SessionMessage,
} from './types.js';
import { WindowMemory } from './window_memory.js';

/** Default recent-context window: one hour. */
export const DEFAULT_WINDOW_MS = 60 * 60 * 1000;

// ============================================================================
// REQUESTS
// ============================================================================

export type MemoryRequest =
  | { op: 'session.add'; sessionId?: string; message: MessageDraft }
  | { op: 'session.get'; sessionId?: string; last?: number }
  | { op: 'window.get'; sessionId?: string; windowMs?: number }
  | { op: 'deep.add'; key: string; entry: DeepEntryDraft }
  | { op: 'deep.get'; key: string }
  | { op: 'deep.search'; query: DeepSearchQuery }
  | { op: 'fact.get'; key: string }
  | { op: 'fact.validate'; key: string; actual: unknown };

export type MemoryResponse =
  | { op: 'session.add'; message: SessionMessage }
  | { op: 'session.get'; messages: SessionMessage[] }
  | { op: 'window.get'; messages: SessionMessage[] }
  | { op: 'deep.add'; entry: DeepEntry }
  | { op: 'deep.get'; entry: DeepEntry | undefined }
  | { op: 'deep.search'; results: DeepSearchResult[] }
  | { op: 'fact.get'; fact: Fact | undefined }
  | { op: 'fact.validate'; validation: FactValidation };

// ============================================================================
// PRIMITIVE
// ============================================================================

export interface MemoryPrimitiveOptions extends PrimitiveOptions {
  /** Per-store LRU bound. Default: 10000 */
  maxEntries?: number;
  windowMs?: number;
  relevance?: RelevanceFunction;
  facts?: FactRegistry | readonly FactDefinition[];
  remote?: {
    session?: RemoteStore<SessionMessage[]>;
    deep?: RemoteStore<DeepEntry>;
  };
}

export interface MemoryBackendInfo {
  session: BackendInfo;
  deep: BackendInfo;
  facts: FactSummary;
}

export class MemoryPrimitive extends BasePrimitive<MemoryRequest, MemoryResponse> {
  protected readonly kind = 'memory';
  readonly session: SessionMemory;
  readonly window: WindowMemory;
  readonly deep: DeepMemory;
  readonly facts: FactRegistry;
  private readonly sessionStore: HybridMemoryStore<SessionMessage[]>;
  private readonly deepStore: HybridMemoryStore<DeepEntry>;

  constructor(options: MemoryPrimitiveOptions = {}) {
    super('Memory', options);
    const now = (): number => this.clock.now();
    this.sessionStore = new HybridMemoryStore<SessionMessage[]>({
      maxEntries: options.maxEntries,
      remote: options.remote?.session,
      logger: this.logger,
      now,
    });
    this.deepStore = new HybridMemoryStore<DeepEntry>({
      maxEntries: options.maxEntries,
      remote: options.remote?.deep,
      logger: this.logger,
      now,
    });
    this.session = new SessionMemory(this.sessionStore, this.clock);
    this.window = new WindowMemory(this.session, options.windowMs ?? DEFAULT_WINDOW_MS, this.clock);
    this.deep = new DeepMemory(this.deepStore, { relevance: options.relevance, clock: this.clock });
    this.facts = options.facts instanceof FactRegistry ? options.facts : new FactRegistry(options.facts ?? []);
  }

  getBackendInfo(): MemoryBackendInfo {
    return {
      session: this.sessionStore.getBackendInfo(),
      deep: this.deepStore.getBackendInfo(),
      facts: this.facts.summary(),
    };
  }

  protected async run(request: MemoryRequest, ctx: WorkflowContext): Promise<MemoryResponse> {
    emitEvent(this.instrumentation, 'memory.request', ctx, { memory: this.name, op: request.op });
    switch (request.op) {
      case 'session.add':
        return {
          op: request.op,
          message: await this.session.add(this.sessionIdFor(request.sessionId, ctx), request.message),
        };
      case 'session.get':
        return {
          op: request.op,
          messages: await this.session.getHistory(this.sessionIdFor(request.sessionId, ctx), { last: request.last }),
        };
      case 'window.get':
        return {
          op: request.op,
          messages: await this.window.search({
            sessionId: this.sessionIdFor(request.sessionId, ctx),
            windowMs: request.windowMs,
          }),
        };
      case 'deep.add':
        return { op: request.op, entry: await this.deep.add(request.key, request.entry) };
      case 'deep.get':
        return { op: request.op, entry: await this.deep.get(request.key) };
      case 'deep.search':
        return { op: request.op, results: await this.deep.search(request.query) };
      case 'fact.get':
        return { op: request.op, fact: this.facts.get(request.key) };
      case 'fact.validate':
        return { op: request.op, validation: this.facts.validate(request.key, request.actual) };
    }
  }

  private sessionIdFor(requested: string | undefined, ctx: WorkflowContext): string {
    const sessionId = requested ?? ctx.sessionId;
    if (sessionId === undefined || sessionId.length === 0) {
      throw new ValidationError('sessionId', 'a session id on the request or the context', 'none');
    }
    return sessionId;
  }
}

export function createMemory(options: MemoryPrimitiveOptions = {}): MemoryPrimitive {
  return new MemoryPrimitive(options);
}
