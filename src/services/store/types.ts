import type { Interaction, InteractionKind, NewInteraction, UserPreference } from '../../types/index.js';

/** Receives the id of a stored row that could not be read; the row itself is skipped */
export type MalformedRowHandler = (rowId: string) => void;

export interface RecentQuery {
    /** Maximum number of interactions returned */
    limit: number;
    /** Only interactions at or after this instant; rows without a timestamp are always included */
    since?: Date;
    sessionId?: string;
    kind?: InteractionKind;
    onMalformedRow?: MalformedRowHandler;
}

/**
 * Source of interaction history. Results are ascending by id. Implementations
 * raise StoreUnavailableError when the backing store cannot be reached.
 */
export interface InteractionStore {
    readonly kind: 'memory' | 'postgres';
    recent(query: RecentQuery): Promise<Interaction[]>;
    bySession(sessionId: string, limit?: number, onMalformedRow?: MalformedRowHandler): Promise<Interaction[]>;
    append(interaction: NewInteraction): Promise<Interaction>;
    healthCheck(): Promise<boolean>;
    close(): Promise<void>;
}

export interface PreferenceStore {
    list(userId: string): Promise<UserPreference[]>;
    set(userId: string, key: string, value: string): Promise<UserPreference>;
    /** Resolves false when there was nothing to remove */
    remove(userId: string, key: string): Promise<boolean>;
}

export const DEFAULT_SESSION_HISTORY_LIMIT = 50;
