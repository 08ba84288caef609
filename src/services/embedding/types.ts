export type EmbeddingProviderName = 'openai' | 'tei';

/**
 * Anything that turns texts into vectors, one vector per input, in order.
 * Implementations must stop work and reject when `signal` aborts.
 */
export interface TextEmbedder {
    embed(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface EmbeddingProvider extends TextEmbedder {
    readonly name: EmbeddingProviderName;
    readonly model: string;
}

export interface EmbeddingHealth {
    healthy: boolean;
    message: string;
}

export interface EmbeddingServiceConfig {
    provider: EmbeddingProviderName | 'none';
    model: string;
    /** 0 when the dimension is taken from the first response */
    dimension: number;
    providerPref: string;
}
