import { randomUUID } from 'node:crypto';
import cookieParser from 'cookie-parser';
import express, {
    Router,
    type ErrorRequestHandler,
    type NextFunction,
    type Request,
    type Response
} from 'express';
import { z } from 'zod';
import {
    AGENT_DEFAULTS,
    InvalidInputError,
    UpstreamError,
    withoutEmbedding,
    type IdentityVerifier,
    type Logger,
    type SimilarityMatch,
    type VectorStore
} from '@concierge/core';
import { type ChatPipeline, type SessionRegistry, type SimilaritySearch } from '@concierge/runtime';

import { sendError } from './errors';
import { SessionCookie } from './sessionCookie';
import { createViewEnvironment } from './views';

export interface ConciergeApiOptions {
    registry: SessionRegistry;
    pipeline: ChatPipeline;
    search: SimilaritySearch;
    /** Store served to remote agents through `/vector_search`. */
    vectors: VectorStore;
    identity: IdentityVerifier;
    logger: Logger;
    sessionSecret: string;
    clientId?: string | undefined;
    secureCookies?: boolean;
}

const LoginBodySchema = z.object({
    credential: z.string().optional()
});

const ChatBodySchema = z.object({
    prompt: z.string().nullish()
});

const VectorSearchBodySchema = z.object({
    embedding: z.array(z.number()).min(1),
    threshold: z.number().min(-1).max(1),
    limit: z.number().int().positive()
});

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

function route(handler: AsyncHandler) {
    return (req: Request, res: Response, next: NextFunction): void => {
        handler(req, res).catch(next);
    };
}

/** Aborts when the client goes away before the response is written. */
function abortOnClose(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on('close', () => {
        if (!res.writableFinished) {
            controller.abort();
        }
    });
    return controller.signal;
}

function readQueryString(value: unknown): string | undefined {
    if (Array.isArray(value)) {
        return readQueryString(value[0]);
    }
    return typeof value === 'string' ? value : undefined;
}

function serializeMatches(matches: SimilarityMatch[]) {
    return matches.map((match) => ({
        similarity: match.similarity,
        record: withoutEmbedding(match.record)
    }));
}

/**
 * Creates the Express router for the concierge: the chat page, login,
 * chat turns, reset, and the search endpoints.
 */
export function createConciergeApi(options: ConciergeApiOptions): Router {
    const router = Router();
    const logger = options.logger.child({ component: 'http' });
    const cookie = new SessionCookie({ secure: options.secureCookies ?? false });
    const views = createViewEnvironment();

    router.use(cookieParser(options.sessionSecret));
    router.use(express.json());
    router.use(express.urlencoded({ extended: false }));

    router.get('/health', (_req, res) => {
        res.json({ status: 'ok', sessions: options.registry.size });
    });

    router.get('/', route(async (req, res) => {
        const sessionId = cookie.read(req) ?? randomUUID();
        const resolved = await options.registry.resolveOrCreate(sessionId, null, { signal: abortOnClose(res) });
        if (!resolved.ok) {
            sendError(res, resolved.error);
            return;
        }

        cookie.write(res, sessionId);
        res.type('html').send(views.render('index.njk', {
            turns: resolved.value.history,
            client_id: options.clientId ?? null,
            providers: options.identity.providers
        }));
    }));

    router.post('/login/:provider', route(async (req, res) => {
        const provider = req.params.provider ?? '';
        if (!options.identity.providers.includes(provider)) {
            res.status(404).json({ status: 'error', message: `Unknown identity provider: ${provider}` });
            return;
        }

        const body = LoginBodySchema.safeParse(req.body ?? {});
        const credential = body.success ? body.data.credential ?? '' : '';
        const verified = await options.identity.verify(provider, credential);
        if (!verified.ok) {
            logger.warn({ provider, reason: verified.error.message }, 'Login rejected');
            sendError(res, verified.error);
            return;
        }

        const previous = cookie.read(req);
        if (previous && options.registry.has(previous)) {
            options.registry.dispose(previous);
        }

        const sessionId = randomUUID();
        const created = await options.registry.resolveOrCreate(sessionId, verified.value, { signal: abortOnClose(res) });
        if (!created.ok) {
            sendError(res, created.error);
            return;
        }

        logger.info({ provider, sessionId }, 'User signed in');
        cookie.write(res, sessionId);
        res.redirect(303, req.get('Referer') ?? '/');
    }));

    router.post('/chat', route(async (req, res) => {
        const body = ChatBodySchema.safeParse(req.body ?? {});
        const prompt = body.success ? body.data.prompt : undefined;
        const result = await options.pipeline.chat(cookie.read(req), prompt, { signal: abortOnClose(res) });
        if (!result.ok) {
            sendError(res, result.error);
            return;
        }

        res.type('text/plain').send(result.value);
    }));

    router.post('/reset', (req, res) => {
        const sessionId = cookie.read(req);
        const disposed = sessionId
            ? options.registry.dispose(sessionId)
            : null;
        if (!disposed || !disposed.ok) {
            logger.warn({ sessionId }, 'Reset requested for an unknown session');
            res.status(500).json({ status: 'error', message: disposed ? disposed.error.message : 'No session attached to request' });
            return;
        }

        cookie.clear(res);
        res.status(204).end();
    });

    router.get('/semantic_similarity_search', route(async (req, res) => {
        const query = readQueryString(req.query.query) ?? '';
        const topKParam = readQueryString(req.query.top_k);
        const topK = topKParam === undefined ? AGENT_DEFAULTS.RETRIEVAL_TOP_K : Number(topKParam);

        const result = await options.search.search(query, topK);
        if (!result.ok) {
            sendError(res, result.error);
            return;
        }

        res.json(serializeMatches(result.value));
    }));

    router.post('/vector_search', route(async (req, res) => {
        const body = VectorSearchBodySchema.safeParse(req.body);
        if (!body.success) {
            sendError(res, new InvalidInputError('body', body.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')));
            return;
        }

        let matches: SimilarityMatch[];
        try {
            matches = await options.vectors.semanticSimilaritySearch(body.data);
        } catch (error) {
            logger.error({ err: error }, 'Vector search failed');
            sendError(res, new UpstreamError('Vector search', error));
            return;
        }

        logger.debug({ provider: req.get('X-Identity-Provider') ?? null, matches: matches.length }, 'Vector search served');
        res.json(serializeMatches(matches));
    }));

    const handleUnexpected: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
        logger.error({ err: error }, 'Unhandled request error');
        if (!res.headersSent) {
            res.status(500).json({ status: 'error', message: 'Internal server error' });
        }
    };
    router.use(handleUnexpected);

    return router;
}
