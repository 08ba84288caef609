/**
 * Domain types shared by the engine, the stores and the transports.
 */

export const INTERACTION_KINDS = ['client_request', 'agent_response', 'conversation_turn', 'health_check', 'other'] as const;
export type InteractionKind = typeof INTERACTION_KINDS[number];

export const INTERACTION_STATUSES = ['success', 'error', 'pending'] as const;
export type InteractionStatus = typeof INTERACTION_STATUSES[number];

/**
 * One logged exchange unit. Owned by the interaction store; the engine only
 * ever holds read-only snapshots. `timestamp` is null when the store had none
 * and may be an invalid Date when the stored value could not be parsed.
 */
export interface Interaction {
    readonly id: number;
    readonly timestamp: Date | null;
    readonly session_id: string | null;
    readonly user_id: string | null;
    readonly kind: InteractionKind;
    readonly text_in: string | null;
    readonly text_out: string | null;
    readonly status: InteractionStatus;
    readonly metadata: Readonly<Record<string, unknown>>;
}

export type NewInteraction = Omit<Interaction, 'id' | 'timestamp'> & { timestamp?: Date };

export const CONTEXT_CATEGORIES = [
    'recent_actions',
    'tech_stack',
    'error_context',
    'project_structure',
    'user_preferences',
    'conversation_history'
] as const;
export type ContextCategory = typeof CONTEXT_CATEGORIES[number];

export const PRIMARY_INTENTS = ['troubleshooting', 'development', 'explanation', 'optimization', 'general'] as const;
export type PrimaryIntent = typeof PRIMARY_INTENTS[number];

export type Urgency = 'normal' | 'high';
export type Complexity = 'low' | 'medium' | 'high';

export const TOPIC_LABELS = [
    'coding',
    'debugging',
    'deployment',
    'testing',
    'architecture',
    'documentation',
    'project_management',
    'data_analysis',
    'user_experience',
    'system_administration'
] as const;
export type TopicLabel = typeof TOPIC_LABELS[number];
export type BranchLabel = TopicLabel | 'uncategorized';

export interface TopicBranch {
    label: BranchLabel;
    /** Chronological (ascending id) */
    member_interaction_ids: number[];
    is_active: boolean;
    aggregate_score: number;
    latest_member_at: Date | null;
}

/**
 * Outcome of the semantic narrowing stage for one request.
 * - applied: similarity search ran and matched at least one candidate
 * - no_match: search ran but nothing cleared min_similarity
 * - skipped: nothing to narrow (no candidates, or the store was unreadable)
 * - lexical_only: the engine was built without an embedding capability
 * - unavailable: the embedding provider failed
 * - timed_out: embedding did not finish within the deadline
 */
export type SemanticStatus = 'applied' | 'no_match' | 'skipped' | 'lexical_only' | 'unavailable' | 'timed_out';
export type SearchMode = 'accelerated' | 'brute_force';
export type StoreStatus = 'ok' | 'unavailable';

export interface ContextEntry {
    source_kind: ContextCategory;
    rendered_text: string;
    weight: number;
}

export interface ContextMetadata {
    primary_intent: PrimaryIntent;
    categories: ContextCategory[];
    urgency: Urgency;
    complexity: Complexity;
    active_branches: BranchLabel[];
    keywords: string[];
    confidence: number;
    semantic_status: SemanticStatus;
    search_mode: SearchMode;
    store_status: StoreStatus;
    degradations: string[];
    budget_chars: number;
    used_chars: number;
    candidate_count: number;
}

export interface ContextPayload {
    entries: ContextEntry[];
    metadata: ContextMetadata;
}

export interface ProjectProfile {
    name: string;
    techStack: string[];
    projectStructure: string[];
    plans: string[];
}

export interface UserPreference {
    user_id: string;
    key: string;
    value: string;
    updated_at: Date;
}
