/** Per-call options accepted by ports that perform I/O. */
export interface CallOptions {
  signal?: AbortSignal | undefined;
}

/**
 * Anything holding a connection or a process-level handle. Both hooks are
 * optional so stateless adapters can skip them.
 */
export interface RuntimeResource {
  start?(options?: CallOptions): Promise<void>;
  close?(): Promise<void>;
}
