import {
    EMBEDDING_DIMENSION,
    EMBEDDING_PROVIDER,
    OPENAI_API_KEY,
    OPENAI_EMBEDDING_MODEL,
    TEI_API_KEY,
    TEI_BASE_URL,
    TEI_MODEL
} from '../../config.js';

export const OPENAI_ENDPOINT = 'https://api.openai.com/v1/embeddings';

export function teiEmbeddingEndpoint(baseUrl: string): string {
    if (!baseUrl) return '';
    return (baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl) + '/v1/embeddings';
}

export interface EmbeddingSettings {
    providerPref: 'auto' | 'openai' | 'tei' | 'none';
    openai: { apiKey: string; model: string; endpoint: string };
    tei: { baseUrl: string; model: string; apiKey: string };
    dimension: number;
}

export function embeddingSettingsFromEnv(): EmbeddingSettings {
    return {
        providerPref: EMBEDDING_PROVIDER,
        openai: { apiKey: OPENAI_API_KEY, model: OPENAI_EMBEDDING_MODEL, endpoint: OPENAI_ENDPOINT },
        tei: { baseUrl: TEI_BASE_URL, model: TEI_MODEL, apiKey: TEI_API_KEY },
        dimension: EMBEDDING_DIMENSION
    };
}
