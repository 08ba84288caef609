/**
 * API client for the context intelligence REST API
 */

import { z } from 'zod';
import { getApiUrl } from './config.js';

const errorBodySchema = z.object({
    error: z.string().optional(),
    message: z.string().optional()
}).passthrough();

const entrySchema = z.object({
    source_kind: z.string(),
    rendered_text: z.string(),
    weight: z.number()
});

export const contextResponseSchema = z.object({
    prompt: z.string(),
    payload: z.object({
        entries: z.array(entrySchema),
        metadata: z.object({
            primary_intent: z.string(),
            categories: z.array(z.string()),
            urgency: z.string(),
            complexity: z.string(),
            active_branches: z.array(z.string()),
            confidence: z.number(),
            semantic_status: z.string(),
            search_mode: z.string(),
            store_status: z.string(),
            degradations: z.array(z.string()),
            budget_chars: z.number(),
            used_chars: z.number(),
            candidate_count: z.number()
        }).passthrough()
    })
}).passthrough();
export type ContextResponse = z.infer<typeof contextResponseSchema>;

export const debugResponseSchema = z.object({
    intent: z.object({
        primary_intent: z.string(),
        urgency: z.string(),
        complexity: z.string(),
        matched_keywords: z.array(z.string())
    }).passthrough(),
    active_branches: z.array(z.string()),
    scores: z.array(z.object({
        interaction_id: z.number(),
        score: z.number(),
        weight: z.number(),
        topics: z.array(z.string()),
        kind: z.string(),
        warnings: z.array(z.string())
    }).passthrough()),
    semantic_status: z.string(),
    search_mode: z.string(),
    semantic_matches: z.array(z.object({ interaction_id: z.number(), similarity: z.number() }))
}).passthrough();
export type DebugResponse = z.infer<typeof debugResponseSchema>;

export const historyResponseSchema = z.object({
    session_id: z.string().nullable(),
    kind: z.string().nullable().optional(),
    count: z.number(),
    interactions: z.array(z.object({
        id: z.number(),
        timestamp: z.string().nullable(),
        session_id: z.string().nullable(),
        kind: z.string(),
        text_in: z.string().nullable(),
        text_out: z.string().nullable(),
        status: z.string()
    }).passthrough())
});
export type HistoryResponse = z.infer<typeof historyResponseSchema>;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export class ApiClient {
    private readonly baseUrl: string;

    constructor(baseUrl: string = getApiUrl(), private readonly fetchImpl: FetchLike = fetch) {
        // Remove trailing slash
        this.baseUrl = baseUrl.replace(/\/$/, '');
    }

    private async request<T>(endpoint: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, init: RequestInit = {}): Promise<T> {
        const url = `${this.baseUrl}${endpoint}`;
        const response = await this.fetchImpl(url, {
            ...init,
            headers: { 'Content-Type': 'application/json' }
        });

        let body: unknown;
        try {
            body = await response.json();
        } catch {
            throw new Error(`Failed to parse response from ${url} (HTTP ${response.status})`);
        }

        if (!response.ok) {
            const parsed = errorBodySchema.safeParse(body);
            const detail = parsed.success ? parsed.data.message ?? parsed.data.error : undefined;
            throw new Error(detail ?? `HTTP ${response.status}: ${response.statusText}`);
        }
        return schema.parse(body);
    }

    async context(message: string, budgetChars: number, options: { sessionId?: string; userId?: string } = {}): Promise<ContextResponse> {
        return this.request('/api/context', contextResponseSchema, {
            method: 'POST',
            body: JSON.stringify({
                message,
                budget_chars: budgetChars,
                session_id: options.sessionId,
                user_id: options.userId
            })
        });
    }

    async relevanceDebug(message: string, sessionId?: string): Promise<DebugResponse> {
        return this.request('/api/relevance-debug', debugResponseSchema, {
            method: 'POST',
            body: JSON.stringify({ message, session_id: sessionId })
        });
    }

    async history(options: { sessionId?: string; kind?: string; limit?: number } = {}): Promise<HistoryResponse> {
        const params = new URLSearchParams();
        if (options.sessionId) params.set('session_id', options.sessionId);
        if (options.kind) params.set('kind', options.kind);
        if (options.limit !== undefined) params.set('limit', String(options.limit));
        const query = params.toString();
        return this.request(`/api/interactions${query ? `?${query}` : ''}`, historyResponseSchema, { method: 'GET' });
    }
}
