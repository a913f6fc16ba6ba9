import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { ConfigurationError } from '../core/errors.js';
import type { SessionMemory } from './session_memory.js';
import type {
  DraftValidation,
  MemoryLayer,
  MessageDraft,
  SessionMessage,
  WindowSearchQuery,
} from './types.js';

export type WindowLayerTypes = {
  add: MessageDraft;
  added: SessionMessage;
  read: SessionMessage[];
  query: WindowSearchQuery;
  hit: SessionMessage;
  check: unknown;
  verdict: DraftValidation;
};

/**
 * Recent-context layer: a time-filtered view over the session history, not
 * a separate store. Writes go straight to the session layer.
 */
export class WindowMemory implements MemoryLayer<WindowLayerTypes> {
  readonly layer = 'window' as const;

  constructor(
    private readonly session: SessionMemory,
    readonly windowMs: number,
    private readonly clock: Clock = systemClock,
  ) {
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new ConfigurationError(`Window memory windowMs must be positive, got ${windowMs}`);
    }
  }

  add(sessionId: string, draft: MessageDraft): Promise<SessionMessage> {
    return this.session.add(sessionId, draft);
  }

  /** Messages of the session no older than the default window. */
  get(sessionId: string): Promise<SessionMessage[]> {
    return this.search({ sessionId });
  }

  async search(query: WindowSearchQuery): Promise<SessionMessage[]> {
    const cutoff = this.clock.now() - (query.windowMs ?? this.windowMs);
    const history = await this.session.get(query.sessionId);
    return history.filter((message) => message.timestamp >= cutoff);
  }

  validate(sessionId: string, draft: unknown): DraftValidation {
    return this.session.validate(sessionId, draft);
  }
}
