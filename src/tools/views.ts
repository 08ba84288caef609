import type { Interaction, TopicBranch, UserPreference } from '../types/index.js';
import type { ConversationSummary } from '../services/context/summary.js';
import type { RelevanceDebugResult } from '../services/context/types.js';
import { isValidTimestamp } from '../services/relevance/scorer.js';

/** JSON-safe shapes returned by tools and REST routes (dates as ISO strings). */

export interface InteractionView {
    id: number;
    timestamp: string | null;
    session_id: string | null;
    user_id: string | null;
    kind: Interaction['kind'];
    text_in: string | null;
    text_out: string | null;
    status: Interaction['status'];
    metadata: Record<string, unknown>;
}

export function isoOrNull(date: Date | null): string | null {
    return isValidTimestamp(date) ? date.toISOString() : null;
}

export function toInteractionView(interaction: Interaction): InteractionView {
    return {
        id: interaction.id,
        timestamp: isoOrNull(interaction.timestamp),
        session_id: interaction.session_id,
        user_id: interaction.user_id,
        kind: interaction.kind,
        text_in: interaction.text_in,
        text_out: interaction.text_out,
        status: interaction.status,
        metadata: { ...interaction.metadata }
    };
}

export function toBranchView(branch: TopicBranch) {
    return {
        label: branch.label,
        member_interaction_ids: [...branch.member_interaction_ids],
        is_active: branch.is_active,
        aggregate_score: branch.aggregate_score,
        latest_member_at: isoOrNull(branch.latest_member_at)
    };
}

export function toRelevanceDebugView(result: RelevanceDebugResult) {
    return {
        intent: result.intent,
        message_topics: result.message_topics,
        active_branches: result.active_branches,
        branches: result.branches.map(toBranchView),
        scores: result.scores,
        semantic_status: result.semantic_status,
        search_mode: result.search_mode,
        semantic_matches: result.semantic_matches,
        store_status: result.store_status,
        degradations: result.degradations
    };
}

export function toSummaryView(summary: ConversationSummary) {
    return {
        ...summary,
        first_at: isoOrNull(summary.first_at),
        last_at: isoOrNull(summary.last_at)
    };
}

export function toPreferenceView(preference: UserPreference) {
    return {
        user_id: preference.user_id,
        key: preference.key,
        value: preference.value,
        updated_at: isoOrNull(preference.updated_at)
    };
}
