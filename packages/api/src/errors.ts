import { type ConciergeError, type ConciergeErrorKind } from '@concierge/core';
import { type Response } from 'express';

const STATUS_BY_KIND: Record<ConciergeErrorKind, number> = {
    invalid_input: 400,
    unauthenticated: 401,
    session_not_found: 400,
    session_cancelled: 503,
    configuration: 500,
    agent_invocation: 500,
    upstream: 502,
    embedding_parse: 502
};

export function statusForError(error: ConciergeError): number {
    return STATUS_BY_KIND[error.kind];
}

export function sendError(res: Response, error: ConciergeError, status = statusForError(error)): void {
    res.status(status).json({ status: 'error', kind: error.kind, message: error.message });
}
