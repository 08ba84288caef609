/**
 * Composition root: builds the stores, the optional embedding stack and the
 * engine from configuration. Transports receive the result and never read
 * configuration for engine behaviour themselves.
 */

import {
    DATABASE_URL,
    EMBEDDING_DIMENSION,
    EMBEDDING_TIMEOUT_MS,
    MAX_EMBEDDINGS,
    PROFILE_PATH,
    QDRANT_API_KEY,
    QDRANT_COLLECTION,
    QDRANT_URL,
    SCORE_CACHE_TTL_MS,
    SEMANTIC_NARROWING,
    VECTOR_BACKEND_TIMEOUT_MS
} from './config.js';
import { ContextEngine, type ContextEngineOptions } from './services/context/engine.js';
import type { EmbeddingService } from './services/embedding/service.js';
import { createEmbeddingService } from './services/embedding/service.js';
import { EmbeddingIndex } from './services/embedding-index/index.js';
import { QdrantVectorBackend, createQdrantClient } from './services/embedding-index/qdrant-backend.js';
import type { VectorSearchBackend } from './services/embedding-index/vector-backend.js';
import { loadProjectProfile } from './services/profile/project-profile.js';
import { ScoreCache } from './services/relevance/score-cache.js';
import { createSemanticNarrower } from './services/semantic/narrower.js';
import { createStores } from './services/store/store-factory.js';
import type { InteractionStore, PreferenceStore } from './services/store/types.js';
import { structuredLogger } from './utils/structured-logger.js';

export interface AppServices {
    engine: ContextEngine;
    interactions: InteractionStore;
    preferences: PreferenceStore;
    embedding: EmbeddingService | null;
    index: EmbeddingIndex | null;
}

export interface ServiceOverrides {
    interactions?: InteractionStore;
    preferences?: PreferenceStore;
    embedding?: EmbeddingService | null;
    backend?: VectorSearchBackend | null;
    engine?: Partial<Omit<ContextEngineOptions, 'store' | 'preferences' | 'narrower'>>;
}

function vectorBackendFromEnv(): VectorSearchBackend | null {
    if (!QDRANT_URL) return null;
    structuredLogger.info(`Qdrant backend: ${QDRANT_URL} (collection ${QDRANT_COLLECTION})`);
    return new QdrantVectorBackend(createQdrantClient(QDRANT_URL, QDRANT_API_KEY), QDRANT_COLLECTION);
}

/**
 * Wire everything from configuration. Overrides replace individual pieces,
 * which is how the HTTP tests run against in-memory stores.
 */
export async function createServices(overrides: ServiceOverrides = {}): Promise<AppServices> {
    const stores = overrides.interactions && overrides.preferences
        ? { interactions: overrides.interactions, preferences: overrides.preferences }
        : await createStores(DATABASE_URL);
    const interactions = overrides.interactions ?? stores.interactions;
    const preferences = overrides.preferences ?? stores.preferences;

    const embedding = SEMANTIC_NARROWING === 'off'
        ? null
        : overrides.embedding !== undefined ? overrides.embedding : createEmbeddingService();

    const index = embedding
        ? new EmbeddingIndex({
            embedder: embedding,
            maxEmbeddings: MAX_EMBEDDINGS,
            dimension: EMBEDDING_DIMENSION,
            backendTimeoutMs: VECTOR_BACKEND_TIMEOUT_MS,
            backend: overrides.backend !== undefined ? overrides.backend : vectorBackendFromEnv()
        })
        : null;
    const narrower = createSemanticNarrower(index, { timeoutMs: EMBEDDING_TIMEOUT_MS });
    structuredLogger.info(`Semantic narrowing: ${narrower.kind} (search mode ${narrower.searchMode})`);

    const profile = overrides.engine?.profile ?? await loadProjectProfile(PROFILE_PATH);
    const scoreCache = SCORE_CACHE_TTL_MS > 0 ? new ScoreCache(SCORE_CACHE_TTL_MS) : null;

    const engine = new ContextEngine({
        scoreCache,
        ...overrides.engine,
        profile,
        store: interactions,
        preferences,
        narrower
    });

    return { engine, interactions, preferences, embedding, index };
}
