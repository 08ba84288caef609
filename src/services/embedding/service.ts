/**
 * Embedding Service
 *
 * Wraps one configured provider (OpenAI or TEI) with input cleanup,
 * dimension warnings, metrics and a health check. Selection:
 *  - EMBEDDING_PROVIDER=openai|tei forces that provider
 *  - EMBEDDING_PROVIDER=auto prefers OpenAI when OPENAI_API_KEY and
 *    OPENAI_EMBEDDING_MODEL are set, otherwise TEI_BASE_URL + TEI_MODEL
 *  - EMBEDDING_PROVIDER=none disables embeddings (lexical-only engine)
 */

import { logger } from '../../utils/logger.js';
import { embeddingBatchSize, embeddingDuration, embeddingRequests } from '../metrics/embedding-metrics.js';
import { embeddingSettingsFromEnv, type EmbeddingSettings } from './config.js';
import { createEmbeddingProvider } from './providers.js';
import type { EmbeddingHealth, EmbeddingProvider, EmbeddingServiceConfig, TextEmbedder } from './types.js';

export type { EmbeddingProvider, TextEmbedder, EmbeddingHealth } from './types.js';

export class EmbeddingService implements TextEmbedder {
    private dimension: number;

    constructor(
        private readonly provider: EmbeddingProvider,
        expectedDimension = 0,
        private readonly providerPref = 'auto'
    ) {
        this.dimension = expectedDimension;
    }

    async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        const cleaned = texts.map(text => text.trim());
        if (cleaned.length === 0) return [];
        if (cleaned.some(text => text.length === 0)) {
            throw new Error('Text cannot be empty for embedding generation');
        }

        embeddingBatchSize.observe(cleaned.length);
        const timer = embeddingDuration.startTimer({ provider: this.provider.name });
        try {
            const vectors = await this.provider.embed(cleaned, signal);
            if (vectors.length !== cleaned.length) {
                throw new Error(`Embedding count mismatch: got ${vectors.length}, expected ${cleaned.length}`);
            }
            this.checkDimensions(vectors);
            embeddingRequests.inc({ provider: this.provider.name, status: 'success' });
            logger.debug(`[EmbeddingService] Received ${vectors.length} embeddings (dim=${this.dimension}) [provider=${this.provider.name}]`);
            return vectors;
        } catch (err) {
            embeddingRequests.inc({ provider: this.provider.name, status: signal?.aborted ? 'aborted' : 'error' });
            throw err;
        } finally {
            timer();
        }
    }

    /** Mismatched vectors are returned as-is; the index rejects them one record at a time. */
    private checkDimensions(vectors: number[][]): void {
        for (const vector of vectors) {
            if (this.dimension === 0) {
                this.dimension = vector.length;
            }
            if (vector.length !== this.dimension) {
                logger.warn(`[EmbeddingService] Embedding dimension mismatch: got ${vector.length}, expected ${this.dimension}`);
            }
        }
    }

    async healthCheck(timeoutMs = 2000): Promise<EmbeddingHealth> {
        try {
            const res = await this.embed(['health check'], AbortSignal.timeout(timeoutMs));
            return { healthy: res.length > 0, message: `${this.provider.name} embeddings operational` };
        } catch (err) {
            const msg = err instanceof Error ? err.message : String(err);
            if (msg.includes('429')) return { healthy: true, message: `${this.provider.name} is rate-limited (429) - reachable but throttled` };
            if (msg.includes('401')) return { healthy: false, message: `${this.provider.name} authentication failed (401)` };
            return { healthy: false, message: `${this.provider.name} health check failed: ${msg}` };
        }
    }

    getConfig(): EmbeddingServiceConfig {
        return {
            provider: this.provider.name,
            model: this.provider.model,
            dimension: this.dimension,
            providerPref: this.providerPref
        };
    }
}

/**
 * Build the service from settings, or null when no provider is configured.
 */
export function createEmbeddingService(settings: EmbeddingSettings = embeddingSettingsFromEnv()): EmbeddingService | null {
    const provider = createEmbeddingProvider(settings);
    if (!provider) return null;
    logger.info(`[EmbeddingService] Using provider=${provider.name} model=${provider.model}`);
    return new EmbeddingService(provider, settings.dimension, settings.providerPref);
}
