import { describe, expect, it, vi } from 'vitest';
import express from 'express';
import request from 'supertest';
import {
    FakeAgentFactory,
    FakeEmbeddingProvider,
    FakeLogger,
    InMemoryVectorStore,
    PassthroughIdentityVerifier,
    createTestAmenities,
    type FakeAgentScript
} from '@concierge/testing';
import { ChatPipeline, SessionRegistry, SimilaritySearch } from '@concierge/runtime';
import { createConciergeApi } from '../src/index';

function createApp(script?: FakeAgentScript) {
    const logger = new FakeLogger();
    const factory = new FakeAgentFactory(script);
    const registry = new SessionRegistry({ factory, logger });
    const pipeline = new ChatPipeline({ registry, logger });
    const embeddings = new FakeEmbeddingProvider({ fixed: { coffee: [1, 0] } });
    const vectors = new InMemoryVectorStore(createTestAmenities());
    const search = new SimilaritySearch({ embeddings, vectors, logger });

    const app = express();
    app.use('/', createConciergeApi({
        registry,
        pipeline,
        search,
        vectors,
        identity: new PassthroughIdentityVerifier(['google']),
        logger,
        sessionSecret: 'test-secret',
        clientId: 'test-client-id'
    }));

    return { app, embeddings, factory, logger, registry, vectors };
}

describe('Concierge API', () => {
    it('serves /health', async () => {
        const { app } = createApp();

        const response = await request(app).get('/health');

        expect(response.status).toBe(200);
        expect(response.body).toEqual({ status: 'ok', sessions: 0 });
    });

    describe('GET /', () => {
        it('creates a session and renders the greeting', async () => {
            const { app, registry } = createApp();

            const response = await request(app).get('/');

            expect(response.status).toBe(200);
            expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
            expect(response.text).toContain('<li class="turn turn-assistant">How can I help you?</li>');
            expect(response.text).toContain('<meta name="client-id" content="test-client-id">');
            expect(response.text).toContain('<form method="post" action="/login/google" class="login">');
            expect(String(response.headers['set-cookie'])).toMatch(/^concierge\.sid=s%3A/);
            expect(registry.size).toBe(1);
        });

        it('reuses the session named by the cookie', async () => {
            const { app, factory } = createApp();
            const client = request.agent(app);

            await client.get('/');
            await client.get('/');

            expect(factory.createCount).toBe(1);
        });

        it('fails with 500 when the agent cannot be built', async () => {
            const { app, factory } = createApp();
            factory.failWith = 'Vector store unreachable: ECONNREFUSED';

            const response = await request(app).get('/');

            expect(response.status).toBe(500);
            expect(response.body).toEqual({
                status: 'error',
                kind: 'configuration',
                message: 'Vector store unreachable: ECONNREFUSED'
            });
        });
    });

    describe('POST /chat', () => {
        it('returns the reply as plain text and records the turns', async () => {
            const { app } = createApp();
            const client = request.agent(app);
            await client.get('/');

            const response = await client.post('/chat').send({ prompt: 'Where is coffee?' });
            const page = await client.get('/');

            expect(response.status).toBe(200);
            expect(response.headers['content-type']).toBe('text/plain; charset=utf-8');
            expect(response.text).toBe('Echo: Where is coffee?');
            expect(page.text).toContain('<li class="turn turn-user">Where is coffee?</li>');
            expect(page.text).toContain('<li class="turn turn-assistant">Echo: Where is coffee?</li>');
        });

        it('escapes turn content in the page', async () => {
            const { app } = createApp();
            const client = request.agent(app);
            await client.get('/');

            await client.post('/chat').send({ prompt: '<b>hi</b>' });
            const page = await client.get('/');

            expect(page.text).toContain('<li class="turn turn-user">&lt;b&gt;hi&lt;/b&gt;</li>');
        });

        it('rejects a missing prompt with 400', async () => {
            const { app } = createApp();
            const client = request.agent(app);
            await client.get('/');

            const response = await client.post('/chat').send({});

            expect(response.status).toBe(400);
            expect(response.body.message).toBe('Error: No user query');
        });

        it('rejects a request without a session with 400', async () => {
            const { app, registry } = createApp();

            const response = await request(app).post('/chat').send({ prompt: 'hello' });

            expect(response.status).toBe(400);
            expect(response.body).toEqual({
                status: 'error',
                kind: 'session_not_found',
                message: 'No session attached to request'
            });
            expect(registry.size).toBe(0);
        });

        it('ignores an unsigned session cookie', async () => {
            const { app } = createApp();

            const response = await request(app)
                .post('/chat')
                .set('Cookie', 'concierge.sid=forged')
                .send({ prompt: 'hello' });

            expect(response.status).toBe(400);
            expect(response.body.message).toBe('No session attached to request');
        });

        it('maps agent failures to 500', async () => {
            const { app } = createApp(() => {
                throw new Error('model offline');
            });
            const client = request.agent(app);
            await client.get('/');

            const response = await client.post('/chat').send({ prompt: 'hello' });

            expect(response.status).toBe(500);
            expect(response.body).toEqual({
                status: 'error',
                kind: 'agent_invocation',
                message: 'Error invoking agent: model offline'
            });
        });
    });

    describe('POST /reset', () => {
        it('disposes the session and releases its agent', async () => {
            const { app, factory, registry } = createApp();
            const client = request.agent(app);
            await client.get('/');

            const response = await client.post('/reset');

            expect(response.status).toBe(204);
            expect(registry.size).toBe(0);
            expect(factory.created[0]?.closeCount).toBe(1);
            expect((await client.post('/reset')).status).toBe(500);
        });

        it('fails with 500 without a session', async () => {
            const { app } = createApp();

            const response = await request(app).post('/reset');

            expect(response.status).toBe(500);
            expect(response.body.message).toBe('No session attached to request');
        });
    });

    describe('POST /login/:provider', () => {
        it('starts an identified session and redirects back', async () => {
            const { app, factory, registry } = createApp();
            const client = request.agent(app);
            await client.get('/');

            const response = await client
                .post('/login/google')
                .set('Referer', 'http://localhost/gates')
                .type('form')
                .send({ credential: 'test-credential' });

            expect(response.status).toBe(303);
            expect(response.headers.location).toBe('http://localhost/gates');
            expect(factory.requests[1]?.identity).toEqual({ provider: 'google', token: 'test-credential' });
            expect(factory.created[0]?.closeCount).toBe(1);
            expect(registry.size).toBe(1);
        });

        it('redirects to / without a referer', async () => {
            const { app } = createApp();

            const response = await request(app)
                .post('/login/google')
                .type('form')
                .send({ credential: 'test-credential' });

            expect(response.headers.location).toBe('/');
        });

        it('rejects a missing credential with 401', async () => {
            const { app, factory } = createApp();

            const response = await request(app).post('/login/google').type('form').send({});

            expect(response.status).toBe(401);
            expect(response.body.message).toBe('No user credentials found');
            expect(factory.createCount).toBe(0);
        });

        it('answers 404 for an unknown provider', async () => {
            const { app } = createApp();

            const response = await request(app)
                .post('/login/myspace')
                .type('form')
                .send({ credential: 'test-credential' });

            expect(response.status).toBe(404);
        });
    });

    describe('GET /semantic_similarity_search', () => {
        it('returns ranked matches without embeddings', async () => {
            const { app } = createApp();

            const response = await request(app).get('/semantic_similarity_search').query({ query: 'coffee', top_k: '1' });

            expect(response.status).toBe(200);
            expect(response.body).toEqual([{
                similarity: 1,
                record: {
                    id: 1,
                    name: 'Bean Counter Coffee',
                    description: 'Espresso bar with pastries',
                    location: 'Near gate A1',
                    terminal: 'T1',
                    category: 'Food & Drink',
                    hour: '06:00 - 22:00',
                    content: 'Espresso bar with pastries'
                }
            }]);
        });

        it('defaults top_k', async () => {
            const { app } = createApp();

            const response = await request(app).get('/semantic_similarity_search').query({ query: 'coffee' });

            expect(response.body.map((match: { record: { id: number } }) => match.record.id)).toEqual([1, 2]);
        });

        it.each(['0', '-2', 'abc', '1.5'])('rejects top_k=%s with 400', async (topK) => {
            const { app, embeddings } = createApp();

            const response = await request(app).get('/semantic_similarity_search').query({ query: 'coffee', top_k: topK });

            expect(response.status).toBe(400);
            expect(response.body.message).toBe('top_k must be a positive integer');
            expect(embeddings.queries).toEqual([]);
        });

        it('rejects a missing query with 400', async () => {
            const { app } = createApp();

            const response = await request(app).get('/semantic_similarity_search');

            expect(response.status).toBe(400);
            expect(response.body.message).toBe('query must not be empty');
        });

        it('maps upstream failures to 502', async () => {
            const { app, embeddings } = createApp();
            vi.spyOn(embeddings, 'embedQuery').mockRejectedValue(new Error('quota exceeded'));

            const response = await request(app).get('/semantic_similarity_search').query({ query: 'coffee' });

            expect(response.status).toBe(502);
            expect(response.body.message).toBe('Query embedding failed: quota exceeded');
        });
    });

    describe('POST /vector_search', () => {
        it('serves raw vector queries', async () => {
            const { app } = createApp();

            const response = await request(app)
                .post('/vector_search')
                .send({ embedding: [1, 0], threshold: 0.7, limit: 5 });

            expect(response.status).toBe(200);
            expect(response.body.map((match: { record: { id: number } }) => match.record.id)).toEqual([1, 2]);
        });

        it('validates the body', async () => {
            const { app } = createApp();

            const response = await request(app)
                .post('/vector_search')
                .send({ embedding: [], threshold: 0.7, limit: 5 });

            expect(response.status).toBe(400);
            expect(response.body.kind).toBe('invalid_input');
            expect(response.body.message).toBe('embedding: Array must contain at least 1 element(s)');
        });

        it('maps store failures to 502', async () => {
            const { app, vectors } = createApp();
            vi.spyOn(vectors, 'semanticSimilaritySearch').mockRejectedValue(new Error('Query has 3 dimensions, expected 2'));

            const response = await request(app)
                .post('/vector_search')
                .send({ embedding: [1, 0, 0], threshold: 0.7, limit: 5 });

            expect(response.status).toBe(502);
            expect(response.body.message).toBe('Vector search failed: Query has 3 dimensions, expected 2');
        });
    });
});
