import {
  ConfigurationError,
  SESSION_DEFAULTS,
  SessionCancelledError,
  SessionNotFoundError,
  TimeoutError,
  describeCause,
  err,
  ok,
  withTimeout,
  type Agent,
  type AgentFactory,
  type IdentityToken,
  type Logger,
  type Result
} from '@concierge/core';

import { ChatSession } from './chatSession';

export type ResolveSessionError = ConfigurationError | SessionCancelledError;
type ResolveSessionResult = Result<ChatSession, ResolveSessionError>;

export interface ResolveSessionOptions {
  signal?: AbortSignal;
}

export interface DisposeAllOptions {
  timeoutMs?: number;
}

export interface SessionRegistryOptions {
  factory: AgentFactory;
  logger: Logger;
}

const ABORTED = Symbol('aborted');

/** Resolves once `signal` aborts; `detach` drops the listener otherwise. */
function onAbort(signal: AbortSignal): { aborted: Promise<typeof ABORTED>; detach: () => void } {
  let listener: (() => void) | undefined;
  const aborted = new Promise<typeof ABORTED>((resolve) => {
    listener = () => resolve(ABORTED);
    signal.addEventListener('abort', listener, { once: true });
  });
  return {
    aborted,
    detach: () => {
      if (listener) {
        signal.removeEventListener('abort', listener);
      }
    }
  };
}

class SessionSlot {
  public session: ChatSession | null = null;
  /** Callers still waiting on the construction; those without a signal never leave. */
  public waiters = 0;
  public readonly controller = new AbortController();
  public readonly ready: Promise<ResolveSessionResult>;

  public constructor(build: (slot: SessionSlot) => Promise<ResolveSessionResult>) {
    this.ready = build(this);
  }
}

/**
 * Maps session identifiers to live sessions. The map is only touched
 * synchronously, and a creation in flight is shared by every caller asking
 * for the same identifier, so each identifier gets at most one agent.
 */
export class SessionRegistry {
  private readonly factory: AgentFactory;
  private readonly logger: Logger;
  private readonly slots = new Map<string, SessionSlot>();
  private readonly releases = new Set<Promise<void>>();
  private closed = false;

  public constructor(options: SessionRegistryOptions) {
    this.factory = options.factory;
    this.logger = options.logger.child({ component: 'session_registry' });
  }

  public get size(): number {
    return this.slots.size;
  }

  public has(sessionId: string): boolean {
    return this.slots.has(sessionId);
  }

  /**
   * Returns the session for `sessionId`, creating it when absent. Aborting
   * `signal` cancels only this caller's wait; the shared construction is
   * cancelled once every waiter has aborted.
   */
  public resolveOrCreate(
    sessionId: string,
    identity: IdentityToken | null,
    options: ResolveSessionOptions = {}
  ): Promise<ResolveSessionResult> {
    if (this.closed || options.signal?.aborted) {
      return Promise.resolve(err(new SessionCancelledError(sessionId)));
    }

    const existing = this.slots.get(sessionId);
    if (existing?.session) {
      return existing.ready;
    }

    let slot = existing;
    if (!slot) {
      slot = new SessionSlot((target) => this.construct(target, sessionId, identity));
      this.slots.set(sessionId, slot);
    }
    return this.join(slot, sessionId, options.signal);
  }

  /** Returns the live session, waiting for a creation in flight. */
  public async lookup(sessionId: string): Promise<ChatSession | null> {
    const slot = this.slots.get(sessionId);
    if (!slot) {
      return null;
    }
    const resolved = await slot.ready;
    if (!resolved.ok || this.slots.get(sessionId) !== slot) {
      return null;
    }
    return resolved.value;
  }

  /**
   * Forgets the session at once; its agent is released in the background.
   * A creation still in flight is cancelled and releases its agent when it
   * completes.
   */
  public dispose(sessionId: string): Result<void, SessionNotFoundError> {
    const slot = this.slots.get(sessionId);
    if (!slot) {
      return err(new SessionNotFoundError(sessionId));
    }

    this.slots.delete(sessionId);
    if (slot.session) {
      this.track(this.release(sessionId, slot.session.agent));
    } else {
      slot.controller.abort();
    }
    this.logger.info({ sessionId }, 'Session disposed');
    return ok(undefined);
  }

  /**
   * Releases every agent, waiting at most `timeoutMs` for them to close.
   * Later `resolveOrCreate` calls are refused.
   */
  public async disposeAll(options: DisposeAllOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? SESSION_DEFAULTS.SHUTDOWN_GRACE_MS;
    this.closed = true;
    const slots = [...this.slots.entries()];
    this.slots.clear();

    for (const [sessionId, slot] of slots) {
      if (slot.session) {
        this.track(this.release(sessionId, slot.session.agent));
      } else {
        slot.controller.abort();
      }
    }

    const pending = [...this.releases, ...slots.filter(([, slot]) => !slot.session).map(([, slot]) => slot.ready)];
    try {
      await withTimeout({
        timeoutMs,
        label: 'Session shutdown',
        run: () => Promise.allSettled(pending)
      });
      this.logger.info({ sessions: slots.length }, 'All sessions released');
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      this.logger.warn({ sessions: slots.length, unfinished: this.releases.size, timeoutMs }, 'Session shutdown grace period elapsed');
    }
  }

  private async join(
    slot: SessionSlot,
    sessionId: string,
    signal: AbortSignal | undefined
  ): Promise<ResolveSessionResult> {
    slot.waiters++;
    if (!signal) {
      return slot.ready;
    }

    const abort = onAbort(signal);
    let outcome: ResolveSessionResult | typeof ABORTED;
    try {
      outcome = await Promise.race([slot.ready, abort.aborted]);
    } finally {
      abort.detach();
    }
    if (outcome !== ABORTED) {
      return outcome;
    }

    slot.waiters--;
    if (slot.waiters === 0 && !slot.session) {
      this.forget(sessionId, slot);
      slot.controller.abort();
      this.track(slot.ready.then(() => undefined));
      this.logger.info({ sessionId }, 'Session creation abandoned by every caller');
    }
    return err(new SessionCancelledError(sessionId));
  }

  private async construct(
    slot: SessionSlot,
    sessionId: string,
    identity: IdentityToken | null
  ): Promise<ResolveSessionResult> {
    const { signal } = slot.controller;
    const outcome = await this.createAgent(sessionId, identity, signal);

    if (!outcome.ok) {
      this.forget(sessionId, slot);
      if (signal.aborted) {
        this.logger.info({ sessionId }, 'Session creation cancelled');
        return err(new SessionCancelledError(sessionId));
      }
      this.logger.error({ sessionId, err: outcome.error }, 'Session creation failed');
      return outcome;
    }

    if (signal.aborted || this.slots.get(sessionId) !== slot) {
      this.forget(sessionId, slot);
      await this.release(sessionId, outcome.value);
      this.logger.info({ sessionId }, 'Session creation cancelled');
      return err(new SessionCancelledError(sessionId));
    }

    const session = new ChatSession({ id: sessionId, identity, agent: outcome.value });
    slot.session = session;
    this.logger.info({ sessionId, provider: identity?.provider ?? null }, 'Session created');
    return ok(session);
  }

  private async createAgent(
    sessionId: string,
    identity: IdentityToken | null,
    signal: AbortSignal | undefined
  ): Promise<Result<Agent, ConfigurationError>> {
    try {
      return await this.factory.create(identity, { signal });
    } catch (error) {
      this.logger.error({ sessionId, err: error }, 'Agent factory threw');
      return err(new ConfigurationError(`Agent construction failed: ${describeCause(error)}`, { cause: error }));
    }
  }

  private forget(sessionId: string, slot: SessionSlot): void {
    if (this.slots.get(sessionId) === slot) {
      this.slots.delete(sessionId);
    }
  }

  private async release(sessionId: string, agent: Agent): Promise<void> {
    try {
      await agent.close();
    } catch (error) {
      this.logger.warn({ sessionId, err: error }, 'Failed to release agent');
    }
  }

  private track(release: Promise<void>): void {
    this.releases.add(release);
    void release.finally(() => {
      this.releases.delete(release);
    });
  }
}
