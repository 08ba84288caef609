import { createHash } from 'node:crypto';
import { logger } from '../../utils/logger.js';
import { DegradedModeError, errorMessage } from '../../types/errors.js';
import type { SearchMode } from '../../types/index.js';
import { embeddingIndexEvictions, embeddingIndexSize, embeddingSearchMode } from '../metrics/embedding-metrics.js';
import type { TextEmbedder } from '../embedding/types.js';
import { cosineSimilarity } from './cosine.js';
import { withDeadline } from './deadline.js';
import { Mutex } from './mutex.js';
import type { VectorSearchBackend } from './vector-backend.js';

export type { VectorSearchBackend } from './vector-backend.js';

export interface EmbeddingRecord {
    interaction_id: number;
    vector: number[];
    content_hash: string;
}

export interface SimilarityHit {
    interaction_id: number;
    similarity: number;
}

export interface UpsertItem {
    id: number;
    text: string;
}

export type UpsertOutcome = 'inserted' | 'replaced' | 'unchanged' | 'rejected';

export interface UpsertReport {
    inserted: number[];
    replaced: number[];
    unchanged: number[];
    rejected: Array<{ id: number; reason: 'empty_text' | 'dimension_mismatch' }>;
    evicted: number[];
}

export interface QueryOptions {
    signal?: AbortSignal;
    /** Only consider these interaction ids */
    restrictTo?: ReadonlySet<number>;
}

export interface EmbeddingIndexOptions {
    embedder: TextEmbedder;
    maxEmbeddings: number;
    backend?: VectorSearchBackend | null;
    /** Fixed vector dimension; 0 lets the first stored vector decide */
    dimension?: number;
    /** Backend candidates fetched per requested result */
    overfetchFactor?: number;
    /** Bound on every backend call; a backend that misses it is dropped for brute-force search */
    backendTimeoutMs?: number;
}

export const DEFAULT_BACKEND_TIMEOUT_MS = 1000;

export function contentHash(text: string): string {
    return createHash('sha256').update(text).digest('hex');
}

/**
 * Bounded in-process vector index over interaction text.
 *
 * Every read or write of the record set and the LRU bookkeeping runs inside
 * one mutex; embedding calls run outside it. Backend calls inside the mutex
 * are bounded by `backendTimeoutMs`. Eviction is least recently
 * queried first, where records never returned by a query go before any that
 * were, oldest insertion first.
 */
export class EmbeddingIndex {
    private readonly embedder: TextEmbedder;
    private readonly maxEmbeddings: number;
    private readonly overfetchFactor: number;
    private readonly backendTimeoutMs: number;
    private readonly records = new Map<number, EmbeddingRecord>();
    /** Insertion order */
    private readonly neverQueried = new Set<number>();
    /** Iteration order is least to most recently queried */
    private readonly queriedOrder = new Map<number, number>();
    private readonly mutex = new Mutex();
    private accessTick = 0;
    private dimensionValue: number;
    private backend: VectorSearchBackend | null;
    private backendReady = false;

    constructor(options: EmbeddingIndexOptions) {
        if (!Number.isInteger(options.maxEmbeddings) || options.maxEmbeddings < 1) {
            throw new Error(`maxEmbeddings must be a positive integer, got ${options.maxEmbeddings}`);
        }
        this.embedder = options.embedder;
        this.maxEmbeddings = options.maxEmbeddings;
        this.overfetchFactor = Math.max(1, options.overfetchFactor ?? 4);
        this.backendTimeoutMs = options.backendTimeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS;
        this.dimensionValue = options.dimension ?? 0;
        this.backend = options.backend ?? null;
        this.publishSearchMode();
    }

    get size(): number {
        return this.records.size;
    }

    get capacity(): number {
        return this.maxEmbeddings;
    }

    get dimension(): number {
        return this.dimensionValue;
    }

    get searchMode(): SearchMode {
        return this.backend ? 'accelerated' : 'brute_force';
    }

    has(interactionId: number): boolean {
        return this.records.has(interactionId);
    }

    /** Copy of the stored record, for diagnostics */
    getRecord(interactionId: number): EmbeddingRecord | undefined {
        const record = this.records.get(interactionId);
        return record ? { ...record, vector: [...record.vector] } : undefined;
    }

    async upsert(interactionId: number, text: string, signal?: AbortSignal): Promise<UpsertOutcome> {
        const report = await this.upsertMany([{ id: interactionId, text }], signal);
        if (report.inserted.includes(interactionId)) return 'inserted';
        if (report.replaced.includes(interactionId)) return 'replaced';
        if (report.unchanged.includes(interactionId)) return 'unchanged';
        return 'rejected';
    }

    /**
     * Embed and store every item whose text differs from what the index holds.
     * Items with identical content are no-ops, so repeated calls are idempotent.
     * Rejects with DegradedModeError when the embedder fails or `signal` aborts;
     * nothing is stored in that case.
     */
    async upsertMany(items: readonly UpsertItem[], signal?: AbortSignal): Promise<UpsertReport> {
        const report: UpsertReport = { inserted: [], replaced: [], unchanged: [], rejected: [], evicted: [] };

        const latest = new Map<number, { text: string; hash: string }>();
        for (const item of items) {
            const text = item.text.trim();
            if (text.length === 0) {
                report.rejected.push({ id: item.id, reason: 'empty_text' });
                continue;
            }
            latest.set(item.id, { text, hash: contentHash(text) });
        }

        const pending = await this.mutex.runExclusive(() => {
            const stale: Array<{ id: number; text: string; hash: string }> = [];
            for (const [id, entry] of latest) {
                if (this.records.get(id)?.content_hash === entry.hash) {
                    report.unchanged.push(id);
                } else {
                    stale.push({ id, ...entry });
                }
            }
            return stale;
        });

        if (pending.length === 0) return report;

        const vectors = await this.embedTexts(pending.map(p => p.text), signal);

        await this.mutex.runExclusive(async () => {
            const written: Array<{ id: number; vector: number[] }> = [];
            pending.forEach((item, i) => {
                const vector = vectors[i];
                if (!vector || !this.acceptDimension(vector)) {
                    report.rejected.push({ id: item.id, reason: 'dimension_mismatch' });
                    return;
                }
                const outcome = this.storeLocked(item.id, vector, item.hash, report.evicted);
                report[outcome].push(item.id);
                if (outcome !== 'unchanged') written.push({ id: item.id, vector });
            });
            // A large batch can evict its own earlier items.
            await this.syncBackendLocked(written.filter(w => this.records.has(w.id)), report.evicted);
            embeddingIndexSize.set(this.records.size);
        });

        if (report.rejected.length > 0) {
            logger.warn(`[EmbeddingIndex] Rejected ${report.rejected.length} record(s)`, { rejected: report.rejected });
        }
        return report;
    }

    /**
     * Nearest neighbours of `text`: at most k hits with similarity ≥ minSimilarity,
     * similarity descending, ties to the more recent (larger) interaction id.
     * Returned records count as accessed for eviction purposes.
     */
    async query(text: string, k: number, minSimilarity: number, options: QueryOptions = {}): Promise<SimilarityHit[]> {
        return this.search(text, k, minSimilarity, true, options);
    }

    /** Same as query() without touching LRU state */
    async peek(text: string, k: number, minSimilarity: number, options: QueryOptions = {}): Promise<SimilarityHit[]> {
        return this.search(text, k, minSimilarity, false, options);
    }

    private async search(text: string, k: number, minSimilarity: number, touch: boolean, options: QueryOptions): Promise<SimilarityHit[]> {
        if (k <= 0 || text.trim().length === 0) return [];
        if (this.records.size === 0 || options.restrictTo?.size === 0) return [];
        const [vector] = await this.embedTexts([text.trim()], options.signal);
        if (!vector) return [];

        return this.mutex.runExclusive(async () => {
            if (this.dimensionValue !== 0 && vector.length !== this.dimensionValue) {
                throw new DegradedModeError(
                    `Query vector dimension ${vector.length} does not match index dimension ${this.dimensionValue}`,
                    'unavailable'
                );
            }
            const candidates = await this.candidatesLocked(vector, k, options.restrictTo, options.signal);
            const hits: SimilarityHit[] = [];
            for (const record of candidates) {
                const similarity = cosineSimilarity(vector, record.vector);
                if (similarity >= minSimilarity) hits.push({ interaction_id: record.interaction_id, similarity });
            }
            hits.sort((a, b) => b.similarity - a.similarity || b.interaction_id - a.interaction_id);
            const top = hits.slice(0, k);
            if (touch) top.forEach(hit => this.touchLocked(hit.interaction_id));
            return top;
        });
    }

    private async candidatesLocked(
        vector: number[],
        k: number,
        restrictTo?: ReadonlySet<number>,
        signal?: AbortSignal
    ): Promise<EmbeddingRecord[]> {
        // Past the deadline the in-memory scan is the only thing worth doing.
        const backend = signal?.aborted ? null : await this.readyBackendLocked();
        if (backend) {
            try {
                const limit = (restrictTo ? Math.max(k, restrictTo.size) : k) * this.overfetchFactor;
                const hits = await this.callBackend('search', () => backend.search(vector, limit), signal);
                const held: EmbeddingRecord[] = [];
                for (const hit of hits) {
                    if (restrictTo && !restrictTo.has(hit.id)) continue;
                    const record = this.records.get(hit.id);
                    if (record) held.push(record);
                }
                return held;
            } catch (err) {
                // Cut off by the request deadline rather than a backend fault: scan in memory this once.
                if (signal?.aborted) {
                    logger.debug(`[EmbeddingIndex] Backend search cut off at the request deadline: ${errorMessage(err)}`);
                } else {
                    this.disableBackend(err);
                }
            }
        }
        if (!restrictTo) return [...this.records.values()];
        const held: EmbeddingRecord[] = [];
        for (const id of restrictTo) {
            const record = this.records.get(id);
            if (record) held.push(record);
        }
        return held;
    }

    private storeLocked(id: number, vector: number[], hash: string, evicted: number[]): Exclude<UpsertOutcome, 'rejected'> {
        const existing = this.records.get(id);
        if (existing) {
            if (existing.content_hash === hash) return 'unchanged';
            // Same interaction, new content: keep its LRU position.
            this.records.set(id, { interaction_id: id, vector, content_hash: hash });
            return 'replaced';
        }
        while (this.records.size >= this.maxEmbeddings) {
            const victim = this.evictLocked();
            if (victim === null) break;
            evicted.push(victim);
        }
        this.records.set(id, { interaction_id: id, vector, content_hash: hash });
        this.neverQueried.add(id);
        return 'inserted';
    }

    private evictLocked(): number | null {
        const first = this.neverQueried.values().next();
        const victim = !first.done ? first.value : this.firstQueried();
        if (victim === null) return null;
        this.records.delete(victim);
        this.neverQueried.delete(victim);
        this.queriedOrder.delete(victim);
        embeddingIndexEvictions.inc();
        logger.debug(`[EmbeddingIndex] Evicted interaction ${victim}`);
        return victim;
    }

    private firstQueried(): number | null {
        const next = this.queriedOrder.keys().next();
        return next.done ? null : next.value;
    }

    private touchLocked(id: number): void {
        if (!this.records.has(id)) return;
        this.neverQueried.delete(id);
        this.queriedOrder.delete(id);
        this.queriedOrder.set(id, ++this.accessTick);
    }

    private acceptDimension(vector: number[]): boolean {
        if (vector.length === 0) return false;
        if (this.dimensionValue === 0) this.dimensionValue = vector.length;
        return vector.length === this.dimensionValue;
    }

    private async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
        if (signal?.aborted) {
            throw new DegradedModeError('Embedding deadline exceeded before start', 'timed_out');
        }
        const work = this.embedder.embed(texts, signal);
        return new Promise<number[][]>((resolve, reject) => {
            const onAbort = (): void => {
                reject(new DegradedModeError('Embedding deadline exceeded', 'timed_out'));
            };
            signal?.addEventListener('abort', onAbort, { once: true });
            work.then(
                vectors => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve(vectors);
                },
                (err: unknown) => {
                    signal?.removeEventListener('abort', onAbort);
                    reject(signal?.aborted
                        ? new DegradedModeError('Embedding deadline exceeded', 'timed_out')
                        : new DegradedModeError(`Embedding provider failed: ${errorMessage(err)}`, 'unavailable'));
                }
            );
        });
    }

    private callBackend<T>(operation: string, call: () => Promise<T>, signal?: AbortSignal): Promise<T> {
        const name = this.backend?.name ?? 'vector';
        return withDeadline(call, { signal, timeoutMs: this.backendTimeoutMs, label: `${name} backend ${operation}` });
    }

    private async readyBackendLocked(): Promise<VectorSearchBackend | null> {
        const backend = this.backend;
        if (!backend || this.dimensionValue === 0) return null;
        if (!this.backendReady) {
            try {
                const dimension = this.dimensionValue;
                await this.callBackend('ensureReady', () => backend.ensureReady(dimension));
                this.backendReady = true;
            } catch (err) {
                this.disableBackend(err);
                return null;
            }
        }
        return this.backend;
    }

    private async syncBackendLocked(written: Array<{ id: number; vector: number[] }>, evicted: number[]): Promise<void> {
        const backend = await this.readyBackendLocked();
        if (!backend) return;
        try {
            await this.callBackend('remove', () => backend.remove(evicted));
            await this.callBackend('upsert', () => backend.upsert(written));
        } catch (err) {
            this.disableBackend(err);
        }
    }

    private disableBackend(err: unknown): void {
        if (!this.backend) return;
        logger.warn(`[EmbeddingIndex] ${this.backend.name} backend failed, falling back to brute-force search: ${errorMessage(err)}`);
        this.backend = null;
        this.backendReady = false;
        this.publishSearchMode();
    }

    private publishSearchMode(): void {
        const mode = this.searchMode;
        embeddingSearchMode.set({ mode: 'accelerated' }, mode === 'accelerated' ? 1 : 0);
        embeddingSearchMode.set({ mode: 'brute_force' }, mode === 'brute_force' ? 1 : 0);
    }
}
