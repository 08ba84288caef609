import type { Interaction, InteractionKind, InteractionStatus, TopicLabel } from '../../types/index.js';
import { clipText } from '../../utils/text.js';
import { isValidTimestamp } from '../relevance/scorer.js';
import { interactionText } from '../topics/topic-tree.js';
import { extractKeywords, matchTopics, topicVocabulary, type TopicVocabulary } from '../topics/vocabulary.js';

export const ACTION_LINE_MAX_CHARS = 100;
export const ACTION_HISTORY_LIMIT = 10;
export const TOP_TOPIC_LIMIT = 3;

export interface ConversationSummary {
    session_id: string | null;
    total: number;
    by_kind: Record<InteractionKind, number>;
    by_status: Record<InteractionStatus, number>;
    first_at: Date | null;
    last_at: Date | null;
    span_ms: number | null;
    top_topics: Array<{ label: TopicLabel; count: number }>;
    /** Most recent first */
    action_history: string[];
    text: string;
}

/** History line for actions; other kinds produce none */
export function actionLine(interaction: Interaction): string | null {
    const clip = (text: string | null): string => clipText(text ?? '', ACTION_LINE_MAX_CHARS);
    switch (interaction.kind) {
        case 'conversation_turn':
            return `Conversation turn: ${clip(interaction.text_in)}`;
        case 'client_request':
            return `User request: ${clip(interaction.text_in)}`;
        case 'agent_response':
            return `Agent response: ${clip(interaction.text_out)}`;
        default:
            return null;
    }
}

/**
 * Summarize a chronological list of interactions: counts, time span, the most
 * frequent topics and the latest actions.
 */
export function summarizeConversation(
    interactions: readonly Interaction[],
    sessionId: string | null = null,
    vocabulary: TopicVocabulary = topicVocabulary
): ConversationSummary {
    const byKind: Record<InteractionKind, number> = { client_request: 0, agent_response: 0, conversation_turn: 0, health_check: 0, other: 0 };
    const byStatus: Record<InteractionStatus, number> = { success: 0, error: 0, pending: 0 };
    const topicCounts = new Map<TopicLabel, number>();
    let first: Date | null = null;
    let last: Date | null = null;

    for (const interaction of interactions) {
        byKind[interaction.kind] += 1;
        byStatus[interaction.status] += 1;

        const timestamp = interaction.timestamp;
        if (isValidTimestamp(timestamp)) {
            if (!first || timestamp.getTime() < first.getTime()) first = timestamp;
            if (!last || timestamp.getTime() > last.getTime()) last = timestamp;
        }

        for (const label of matchTopics(extractKeywords(interactionText(interaction), vocabulary), vocabulary)) {
            topicCounts.set(label, (topicCounts.get(label) ?? 0) + 1);
        }
    }

    const topTopics = [...topicCounts]
        .map(([label, count]) => ({ label, count }))
        .sort((a, b) => b.count - a.count || (a.label < b.label ? -1 : a.label > b.label ? 1 : 0))
        .slice(0, TOP_TOPIC_LIMIT);

    const actionHistory: string[] = [];
    for (let i = interactions.length - 1; i >= 0 && actionHistory.length < ACTION_HISTORY_LIMIT; i--) {
        const interaction = interactions[i];
        if (!interaction) continue;
        const line = actionLine(interaction);
        if (line) actionHistory.push(line);
    }

    const spanMs = first && last ? last.getTime() - first.getTime() : null;

    return {
        session_id: sessionId,
        total: interactions.length,
        by_kind: byKind,
        by_status: byStatus,
        first_at: first,
        last_at: last,
        span_ms: spanMs,
        top_topics: topTopics,
        action_history: actionHistory,
        text: renderSummaryText(interactions.length, topTopics, actionHistory)
    };
}

function renderSummaryText(total: number, topTopics: Array<{ label: TopicLabel }>, actions: string[]): string {
    if (total === 0) return 'No previous conversation history available.';
    const topics = topTopics.length > 0 ? topTopics.map(t => t.label).join(', ') : 'none identified';
    const lines = [`${total} interaction(s). Top topics: ${topics}.`];
    if (actions.length > 0) lines.push(`Recent actions: ${actions.join(' | ')}`);
    return lines.join('\n');
}
