import {
  AgentInvocationError,
  InvalidInputError,
  SessionNotFoundError,
  err,
  ok,
  type Logger,
  type Result
} from '@concierge/core';

import { type ChatSession } from '../session/chatSession';
import { type SessionRegistry } from '../session/registry';
import { formatReply } from './formatReply';

export type ChatError = InvalidInputError | SessionNotFoundError | AgentInvocationError;

export interface ChatPipelineOptions {
  registry: SessionRegistry;
  logger: Logger;
}

export interface ChatOptions {
  signal?: AbortSignal;
}

export class ChatPipeline {
  private readonly registry: SessionRegistry;
  private readonly logger: Logger;

  public constructor(options: ChatPipelineOptions) {
    this.registry = options.registry;
    this.logger = options.logger.child({ component: 'chat_pipeline' });
  }

  /**
   * Runs one chat turn. Never creates a session: an unknown identifier is
   * reported as `SessionNotFoundError`.
   */
  public async chat(
    sessionId: string | null | undefined,
    prompt: string | null | undefined,
    options: ChatOptions = {}
  ): Promise<Result<string, ChatError>> {
    if (typeof prompt !== 'string' || prompt.length === 0) {
      return err(new InvalidInputError('prompt', 'Error: No user query'));
    }
    if (!sessionId) {
      return err(new SessionNotFoundError(null));
    }

    const session = await this.registry.lookup(sessionId);
    if (!session) {
      return err(new SessionNotFoundError(sessionId));
    }

    return session.runExclusive(() => this.runTurn(session, prompt, options.signal));
  }

  private async runTurn(
    session: ChatSession,
    prompt: string,
    signal: AbortSignal | undefined
  ): Promise<Result<string, ChatError>> {
    const logger = this.logger.child({ sessionId: session.id });
    const history = session.history;
    session.append('user', prompt);

    let reply: string;
    try {
      reply = await session.agent.invoke({ input: prompt, history, signal });
    } catch (error) {
      logger.error({ err: error }, 'Agent invocation failed');
      return err(new AgentInvocationError(error));
    }

    session.append('assistant', reply);
    logger.debug({ turns: history.length + 2 }, 'Chat turn completed');
    return ok(formatReply(reply));
  }
}
