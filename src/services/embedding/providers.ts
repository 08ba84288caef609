import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { teiEmbeddingEndpoint, type EmbeddingSettings } from './config.js';
import type { EmbeddingProvider } from './types.js';

const vectorSchema = z.array(z.number());

const openAiResponseSchema = z.object({
    data: z.array(z.object({ embedding: vectorSchema }))
});

const openAiErrorSchema = z.object({
    error: z.object({ message: z.string() }).optional(),
    message: z.string().optional()
});

// TEI deployments disagree on the response envelope.
const teiResponseSchema = z.union([
    z.object({ embeddings: z.array(vectorSchema) }).transform(body => body.embeddings),
    z.object({ data: z.array(z.object({ embedding: vectorSchema })) }).transform(body => body.data.map(d => d.embedding)),
    z.array(vectorSchema)
]);

async function readJson(res: Response, provider: string): Promise<unknown> {
    try {
        const body: unknown = await res.json();
        return body;
    } catch (err) {
        logger.error(`[EmbeddingService] Failed to parse ${provider} response as JSON`, err);
        throw new Error(`${provider} embeddings returned non-JSON response (HTTP ${res.status})`);
    }
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'openai' as const;

    constructor(private readonly settings: EmbeddingSettings['openai']) {
        if (!settings.apiKey || !settings.model) {
            throw new Error('OpenAI requires OPENAI_API_KEY and OPENAI_EMBEDDING_MODEL to be configured');
        }
    }

    get model(): string {
        return this.settings.model;
    }

    async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        const res = await fetch(this.settings.endpoint, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'Authorization': `Bearer ${this.settings.apiKey}`
            },
            body: JSON.stringify({ model: this.settings.model, input: texts }),
            signal
        });

        const data = await readJson(res, 'OpenAI');

        if (!res.ok) {
            const parsedError = openAiErrorSchema.safeParse(data);
            const errMsg = (parsedError.success && (parsedError.data.error?.message ?? parsedError.data.message))
                || `OpenAI embeddings HTTP ${res.status}`;
            if (res.status === 401) throw new Error(`OpenAI authentication failed (401). Check OPENAI_API_KEY: ${errMsg}`);
            if (res.status === 429) throw new Error(`OpenAI rate limit (429): ${errMsg}`);
            throw new Error(`OpenAI embeddings error (HTTP ${res.status}): ${errMsg}`);
        }

        const parsed = openAiResponseSchema.safeParse(data);
        if (!parsed.success) {
            throw new Error('Unexpected OpenAI embeddings response shape');
        }
        return parsed.data.data.map(d => d.embedding);
    }
}

export class TeiEmbeddingProvider implements EmbeddingProvider {
    readonly name = 'tei' as const;
    private readonly endpoint: string;

    constructor(private readonly settings: EmbeddingSettings['tei']) {
        if (!settings.baseUrl || !settings.model) {
            throw new Error('TEI requires TEI_BASE_URL and TEI_MODEL to be configured');
        }
        this.endpoint = teiEmbeddingEndpoint(settings.baseUrl);
    }

    get model(): string {
        return this.settings.model;
    }

    async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (this.settings.apiKey) headers['x-api-key'] = this.settings.apiKey;

        const res = await fetch(this.endpoint, {
            method: 'POST',
            headers,
            body: JSON.stringify({ input: texts, model: this.settings.model }),
            signal
        });

        const data = await readJson(res, 'TEI');

        if (!res.ok) {
            if (res.status === 401) throw new Error('TEI authentication failed (401)');
            if (res.status === 429) throw new Error('TEI rate limit (429)');
            throw new Error(`TEI embeddings error (HTTP ${res.status})`);
        }

        const parsed = teiResponseSchema.safeParse(data);
        if (!parsed.success || parsed.data.length === 0) {
            throw new Error('TEI returned unexpected embedding shape');
        }
        return parsed.data;
    }
}

/**
 * Pick a provider from settings. Explicit preferences must be fully
 * configured; `auto` prefers OpenAI, then TEI. Returns null when embeddings
 * are switched off or nothing is configured.
 */
export function createEmbeddingProvider(settings: EmbeddingSettings): EmbeddingProvider | null {
    switch (settings.providerPref) {
        case 'none':
            return null;
        case 'openai':
            return new OpenAIEmbeddingProvider(settings.openai);
        case 'tei':
            return new TeiEmbeddingProvider(settings.tei);
        case 'auto':
            if (settings.openai.apiKey && settings.openai.model) return new OpenAIEmbeddingProvider(settings.openai);
            if (settings.tei.baseUrl && settings.tei.model) return new TeiEmbeddingProvider(settings.tei);
            logger.debug('[EmbeddingService] No embedding provider configured; semantic narrowing disabled');
            return null;
    }
}
