import { type IdentityToken } from '../entities/identity';
import { type ChatTurn } from '../entities/session';
import { type ConfigurationError } from '../errors';
import { type Result } from '../result';

export interface AgentInvocation {
  input: string;
  /** Prior turns of the owning session, oldest first. The agent keeps none itself. */
  history?: readonly ChatTurn[];
  signal?: AbortSignal;
}

/**
 * A conversational entity bound to one session. Implementations may hold a
 * network client; `close` releases it and must be called exactly once.
 */
export interface Agent {
  invoke(request: AgentInvocation): Promise<string>;
  close(): Promise<void>;
}

export interface CreateAgentOptions {
  signal?: AbortSignal;
}

export interface AgentFactory {
  create(identity: IdentityToken | null, options?: CreateAgentOptions): Promise<Result<Agent, ConfigurationError>>;
}
