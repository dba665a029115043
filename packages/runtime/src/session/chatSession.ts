import {
  BASE_GREETING,
  createChatTurn,
  type Agent,
  type ChatRole,
  type ChatTurn,
  type IdentityToken
} from '@concierge/core';

export interface ChatSessionInit {
  id: string;
  identity: IdentityToken | null;
  agent: Agent;
}

/**
 * Conversation state for one client. Turns are append-only; work that reads
 * and extends them goes through `runExclusive` so turns never interleave.
 */
export class ChatSession {
  public readonly id: string;
  public readonly identity: IdentityToken | null;
  public readonly agent: Agent;
  private readonly turns: ChatTurn[] = [BASE_GREETING];
  private tail: Promise<void> = Promise.resolve();

  public constructor(init: ChatSessionInit) {
    this.id = init.id;
    this.identity = init.identity;
    this.agent = init.agent;
  }

  /** Snapshot of the turns so far, oldest first. */
  public get history(): readonly ChatTurn[] {
    return [...this.turns];
  }

  public append(role: ChatRole, content: string): ChatTurn {
    const turn = createChatTurn(role, content);
    this.turns.push(turn);
    return turn;
  }

  /** Queues `task` behind every task queued before it on this session. */
  public runExclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The queue only tracks completion; `run` still rejects for the caller.
    this.tail = run.then(() => undefined, () => undefined);
    return run;
  }
}
