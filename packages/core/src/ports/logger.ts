export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type LogFields = Record<string, unknown>;

/** Pino's calling convention: structured fields first, then the message. */
export interface LogMethod {
    (fields: LogFields, msg?: string): void;
    (msg: string): void;
}

export interface Logger extends Record<LogLevel, LogMethod> {
    /** Logger whose entries all carry `bindings`, e.g. `{ sessionId }`. */
    child(bindings: LogFields): Logger;
}
