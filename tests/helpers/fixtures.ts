import type { Interaction } from '../../src/types/index.js';
import type { TextEmbedder } from '../../src/services/embedding/types.js';

export const NOW = new Date('2026-03-10T12:00:00.000Z');
export const HOUR = 60 * 60 * 1000;

export function hoursAgo(hours: number, now: Date = NOW): Date {
    return new Date(now.getTime() - hours * HOUR);
}

export function makeInteraction(overrides: Partial<Interaction> & { id: number }): Interaction {
    return {
        timestamp: NOW,
        session_id: null,
        user_id: null,
        kind: 'other',
        text_in: null,
        text_out: null,
        status: 'success',
        metadata: {},
        ...overrides
    };
}

/**
 * Deterministic embedder: one dimension per vocabulary word, counting
 * occurrences. Unknown words land in the last dimension.
 */
export class KeywordEmbedder implements TextEmbedder {
    calls: string[][] = [];

    constructor(private readonly vocabulary: readonly string[]) { }

    async embed(texts: string[]): Promise<number[][]> {
        this.calls.push([...texts]);
        return texts.map(text => this.vectorFor(text));
    }

    vectorFor(text: string): number[] {
        const vector = new Array<number>(this.vocabulary.length + 1).fill(0);
        for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
            const index = this.vocabulary.indexOf(word);
            vector[index === -1 ? this.vocabulary.length : index] += 1;
        }
        return vector;
    }
}

/** Embedder whose calls never settle until aborted */
export class HangingEmbedder implements TextEmbedder {
    async embed(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        return new Promise((resolve, reject) => {
            signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
        });
    }
}

export class FailingEmbedder implements TextEmbedder {
    calls = 0;

    async embed(): Promise<number[][]> {
        this.calls++;
        throw new Error('provider down');
    }
}
