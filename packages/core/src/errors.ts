export type ConciergeErrorKind =
  | 'invalid_input'
  | 'unauthenticated'
  | 'session_not_found'
  | 'session_cancelled'
  | 'configuration'
  | 'agent_invocation'
  | 'upstream'
  | 'embedding_parse';

/**
 * Base class for every failure the core reports. The `kind` discriminant is
 * what the HTTP boundary switches on; `cause` keeps the underlying error for
 * diagnostics.
 */
export abstract class ConciergeError extends Error {
  public abstract readonly kind: ConciergeErrorKind;

  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidInputError extends ConciergeError {
  public readonly kind = 'invalid_input' as const;

  public constructor(public readonly field: string, message: string) {
    super(message);
  }
}

export class UnauthenticatedError extends ConciergeError {
  public readonly kind = 'unauthenticated' as const;
}

export class SessionNotFoundError extends ConciergeError {
  public readonly kind = 'session_not_found' as const;

  public constructor(public readonly sessionId: string | null) {
    super(sessionId ? `Session ${sessionId} not found` : 'No session attached to request');
  }
}

export class SessionCancelledError extends ConciergeError {
  public readonly kind = 'session_cancelled' as const;

  public constructor(public readonly sessionId: string) {
    super(`Creation of session ${sessionId} was cancelled`);
  }
}

export class ConfigurationError extends ConciergeError {
  public readonly kind = 'configuration' as const;
}

export class AgentInvocationError extends ConciergeError {
  public readonly kind = 'agent_invocation' as const;

  public constructor(cause: unknown) {
    super(`Error invoking agent: ${describeCause(cause)}`, { cause });
  }
}

export class UpstreamError extends ConciergeError {
  public readonly kind = 'upstream' as const;

  public constructor(public readonly label: string, cause: unknown) {
    super(`${label} failed: ${describeCause(cause)}`, { cause });
  }
}

export class EmbeddingParseError extends ConciergeError {
  public readonly kind = 'embedding_parse' as const;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
