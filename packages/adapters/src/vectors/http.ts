import { Agent as HttpAgent } from 'node:http';
import { Agent as HttpsAgent } from 'node:https';

import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import {
    SimilarityMatchSchema,
    type CallOptions,
    type IdentityToken,
    type SimilarityMatch,
    type SimilarityQuery,
    type VectorStore
} from '@concierge/core';

const SimilarityMatchListSchema = z.array(SimilarityMatchSchema);

export interface HttpVectorStoreOptions {
    baseUrl: string;
    /** Forwarded as a bearer token so the remote side can scope results. */
    identity?: IdentityToken | null;
    timeoutMs?: number;
    adapter?: AxiosRequestConfig['adapter'];
}

/**
 * Client of a remote knowledge service exposing `/health` and
 * `/vector_search`. Each instance owns keep-alive sockets that `close`
 * tears down.
 */
export class HttpVectorStore implements VectorStore {
    private readonly httpAgent = new HttpAgent({ keepAlive: true });
    private readonly httpsAgent = new HttpsAgent({ keepAlive: true });
    private readonly client: AxiosInstance;
    private closed = false;

    public constructor(options: HttpVectorStoreOptions) {
        const headers: Record<string, string> = {
            'Content-Type': 'application/json'
        };
        if (options.identity) {
            headers['Authorization'] = `Bearer ${options.identity.token}`;
            headers['X-Identity-Provider'] = options.identity.provider;
        }

        const config: AxiosRequestConfig = {
            baseURL: options.baseUrl,
            timeout: options.timeoutMs ?? 10_000,
            headers,
            httpAgent: this.httpAgent,
            httpsAgent: this.httpsAgent
        };
        if (options.adapter) {
            config.adapter = options.adapter;
        }
        this.client = axios.create(config);
    }

    public async start(options: CallOptions = {}): Promise<void> {
        await this.client.get('/health', { signal: options.signal });
    }

    public async semanticSimilaritySearch(query: SimilarityQuery, options: CallOptions = {}): Promise<SimilarityMatch[]> {
        if (this.closed) {
            throw new Error('HttpVectorStore is closed');
        }

        const response = await this.client.post<unknown>('/vector_search', {
            embedding: [...query.embedding],
            threshold: query.threshold,
            limit: query.limit
        }, { signal: options.signal });
        return SimilarityMatchListSchema.parse(response.data);
    }

    public async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        this.httpAgent.destroy();
        this.httpsAgent.destroy();
    }
}
