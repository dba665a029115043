export class TimeoutError extends Error {
  public readonly label: string;
  public readonly timeoutMs: number;

  public constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.label = label;
    this.timeoutMs = timeoutMs;
  }
}

export interface WithTimeoutInput<T> {
  timeoutMs: number;
  label: string;
  /** Caller cancellation, forwarded to the signal handed to `run`. */
  signal?: AbortSignal | undefined;
  /** Receives a signal that aborts when the deadline passes or `signal` aborts. */
  run: (signal: AbortSignal) => Promise<T>;
}

/**
 * Races `run` against a deadline. On expiry the signal given to `run` is
 * aborted with the `TimeoutError`, so the underlying request is torn down
 * rather than left running.
 */
export async function withTimeout<T>(input: WithTimeoutInput<T>): Promise<T> {
  const controller = new AbortController();
  const forward = () => controller.abort(input.signal?.reason);
  if (input.signal?.aborted) {
    forward();
  } else {
    input.signal?.addEventListener('abort', forward, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  try {
    return await Promise.race([
      input.run(controller.signal),
      new Promise<T>((_, reject) => {
        timer = setTimeout(() => {
          const timeout = new TimeoutError(input.label, input.timeoutMs);
          controller.abort(timeout);
          reject(timeout);
        }, input.timeoutMs);
      })
    ]);
  } finally {
    clearTimeout(timer);
    input.signal?.removeEventListener('abort', forward);
  }
}
