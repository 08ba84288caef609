import type {
    BranchLabel,
    ContextCategory,
    ContextEntry,
    ContextPayload,
    Interaction,
    ProjectProfile,
    SearchMode,
    SemanticStatus,
    StoreStatus,
    TopicBranch,
    TopicLabel,
    UserPreference
} from '../../types/index.js';
import type { IntentClassification } from '../intent/classifier.js';
import type { ScoreReport } from '../relevance/scorer.js';

/** An interaction from the recent window with everything ranking learned about it */
export interface RankedCandidate {
    interaction: Interaction;
    /** Relevance score */
    score: number;
    /** score × topic factor × session factor */
    weight: number;
    topics: TopicLabel[];
    /** Set only when semantic narrowing matched this candidate */
    similarity?: number;
}

export interface AssembleInput {
    message: string;
    /** In section priority order */
    categories: readonly ContextCategory[];
    /** In ranking order */
    candidates: readonly RankedCandidate[];
    profile: ProjectProfile;
    preferences: readonly UserPreference[];
    budgetChars: number;
    sessionId?: string | null;
    sectionItemLimit?: number;
}

export interface AssembledContext {
    entries: ContextEntry[];
    usedChars: number;
    confidence: number;
}

export interface GetContextRequest {
    message: string;
    session_id?: string | null;
    user_id?: string | null;
    budget_chars: number;
    /** Overrides the categories chosen by intent classification */
    categories?: readonly ContextCategory[];
}

export interface ContextResult {
    payload: ContextPayload;
    prompt: string;
}

export interface RelevanceDebugRequest {
    message: string;
    session_id?: string | null;
}

export interface CandidateDebug extends ScoreReport {
    weight: number;
    topics: TopicLabel[];
    kind: Interaction['kind'];
    session_id: string | null;
}

export interface RelevanceDebugResult {
    intent: IntentClassification;
    message_topics: TopicLabel[];
    active_branches: BranchLabel[];
    branches: TopicBranch[];
    /** Ranking order */
    scores: CandidateDebug[];
    semantic_status: SemanticStatus;
    search_mode: SearchMode;
    semantic_matches: Array<{ interaction_id: number; similarity: number }>;
    store_status: StoreStatus;
    degradations: string[];
}
