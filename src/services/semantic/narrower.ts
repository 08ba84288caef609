import { logger } from '../../utils/logger.js';
import { DegradedModeError, errorMessage, type DegradedReason } from '../../types/errors.js';
import type { SearchMode, SemanticStatus } from '../../types/index.js';
import { withDeadline } from '../embedding-index/deadline.js';
import type { EmbeddingIndex } from '../embedding-index/index.js';

export interface NarrowingCandidate {
    id: number;
    text: string;
}

export interface NarrowRequest {
    message: string;
    candidates: readonly NarrowingCandidate[];
    minSimilarity: number;
    /**
     * `apply` embeds missing candidates and counts matches as accesses;
     * `inspect` only reads what the index already holds.
     */
    mode: 'apply' | 'inspect';
}

export interface NarrowResult {
    status: SemanticStatus;
    searchMode: SearchMode;
    /** Similarity per matched candidate id; empty unless status is `applied` */
    similarities: Map<number, number>;
    degradations: string[];
}

/**
 * Semantic narrowing capability. The engine is built with exactly one
 * variant and calls it the same way either way.
 */
export interface SemanticNarrower {
    readonly kind: 'semantic' | 'lexical';
    /** Search mode a narrowing call would use right now */
    readonly searchMode: SearchMode;
    narrow(request: NarrowRequest): Promise<NarrowResult>;
}

export class LexicalOnlyNarrower implements SemanticNarrower {
    readonly kind = 'lexical' as const;
    readonly searchMode: SearchMode = 'brute_force';

    async narrow(): Promise<NarrowResult> {
        return { status: 'lexical_only', searchMode: 'brute_force', similarities: new Map(), degradations: [] };
    }
}

export interface EmbeddingNarrowerOptions {
    /** Deadline for all embedding work of one request */
    timeoutMs: number;
}

export class EmbeddingNarrower implements SemanticNarrower {
    readonly kind = 'semantic' as const;

    constructor(private readonly index: EmbeddingIndex, private readonly options: EmbeddingNarrowerOptions) { }

    get searchMode(): SearchMode {
        return this.index.searchMode;
    }

    async narrow(request: NarrowRequest): Promise<NarrowResult> {
        const degradations: string[] = [];
        if (request.candidates.length === 0) {
            return { status: 'skipped', searchMode: this.index.searchMode, similarities: new Map(), degradations };
        }

        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.options.timeoutMs);
        try {
            // The deadline settles the call even while the index is still waiting on a backend.
            const { similarities, rejected } = await withDeadline(
                () => this.match(request, controller.signal),
                { signal: controller.signal, label: 'Semantic narrowing' }
            );
            degradations.push(...rejected);
            return {
                status: similarities.size > 0 ? 'applied' : 'no_match',
                searchMode: this.index.searchMode,
                similarities,
                degradations
            };
        } catch (err) {
            const reason: DegradedReason = err instanceof DegradedModeError ? err.reason : 'unavailable';
            const degraded = err instanceof DegradedModeError
                ? err
                : new DegradedModeError(`Semantic narrowing failed: ${errorMessage(err)}`, reason);
            logger.warn(`[SemanticNarrower] Continuing without semantic narrowing (${reason}): ${degraded.message}`);
            degradations.push(`semantic_${reason}`);
            return { status: reason, searchMode: this.index.searchMode, similarities: new Map(), degradations };
        } finally {
            clearTimeout(timer);
        }
    }

    private async match(request: NarrowRequest, signal: AbortSignal): Promise<{ similarities: Map<number, number>; rejected: string[] }> {
        const rejected: string[] = [];
        if (request.mode === 'apply') {
            const report = await this.index.upsertMany(request.candidates, signal);
            for (const record of report.rejected) {
                rejected.push(`${record.reason}:${record.id}`);
            }
        }

        const restrictTo = new Set(request.candidates.map(candidate => candidate.id));
        const queryOptions = { signal, restrictTo };
        const hits = request.mode === 'apply'
            ? await this.index.query(request.message, restrictTo.size, request.minSimilarity, queryOptions)
            : await this.index.peek(request.message, restrictTo.size, request.minSimilarity, queryOptions);
        return { similarities: new Map(hits.map(hit => [hit.interaction_id, hit.similarity] as const)), rejected };
    }
}

export function createSemanticNarrower(index: EmbeddingIndex | null, options: EmbeddingNarrowerOptions): SemanticNarrower {
    return index ? new EmbeddingNarrower(index, options) : new LexicalOnlyNarrower();
}
