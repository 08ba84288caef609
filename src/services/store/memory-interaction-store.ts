import type { Interaction, NewInteraction } from '../../types/index.js';
import { DEFAULT_SESSION_HISTORY_LIMIT, type InteractionStore, type RecentQuery } from './types.js';

/**
 * Process-local interaction store. Used when no DATABASE_URL is configured
 * and as the test stand-in for Postgres.
 */
export class InMemoryInteractionStore implements InteractionStore {
    readonly kind = 'memory' as const;
    private readonly rows: Interaction[] = [];
    private nextId = 1;

    constructor(seed: readonly Interaction[] = []) {
        for (const row of [...seed].sort((a, b) => a.id - b.id)) {
            this.rows.push(row);
            this.nextId = Math.max(this.nextId, row.id + 1);
        }
    }

    async recent(query: RecentQuery): Promise<Interaction[]> {
        if (query.limit <= 0) return [];
        const since = query.since?.getTime();
        const matching = this.rows.filter(row => {
            if (query.sessionId !== undefined && row.session_id !== query.sessionId) return false;
            if (query.kind !== undefined && row.kind !== query.kind) return false;
            if (since === undefined || row.timestamp === null) return true;
            const at = row.timestamp.getTime();
            return Number.isNaN(at) || at >= since;
        });
        return matching.slice(-query.limit);
    }

    async bySession(sessionId: string, limit: number = DEFAULT_SESSION_HISTORY_LIMIT): Promise<Interaction[]> {
        if (limit <= 0) return [];
        return this.rows.filter(row => row.session_id === sessionId).slice(-limit);
    }

    async append(interaction: NewInteraction): Promise<Interaction> {
        const row: Interaction = {
            id: this.nextId++,
            timestamp: interaction.timestamp ?? new Date(),
            session_id: interaction.session_id,
            user_id: interaction.user_id,
            kind: interaction.kind,
            text_in: interaction.text_in,
            text_out: interaction.text_out,
            status: interaction.status,
            metadata: { ...interaction.metadata }
        };
        this.rows.push(row);
        return row;
    }

    async healthCheck(): Promise<boolean> {
        return true;
    }

    async close(): Promise<void> {
        // nothing held
    }

    get size(): number {
        return this.rows.length;
    }
}
