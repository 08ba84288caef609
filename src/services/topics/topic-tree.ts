import type { BranchLabel, Interaction, TopicBranch, TopicLabel } from '../../types/index.js';
import { isValidTimestamp } from '../relevance/scorer.js';
import { extractKeywords, matchTopics, topicVocabulary, type TopicVocabulary } from './vocabulary.js';

export interface TopicTreeOptions {
    now: Date;
    activeWindowMs: number;
    /** Branches among the top K by aggregate score are active regardless of age */
    topK: number;
    scoreOf: (interaction: Interaction) => number;
    vocabulary?: TopicVocabulary;
}

export interface TopicTree {
    /** Ordered: aggregate score desc, latest member desc, label asc */
    branches: TopicBranch[];
    /** Topic labels per interaction id; uncategorized interactions map to [] */
    assignments: Map<number, TopicLabel[]>;
}

interface BranchAccumulator {
    label: BranchLabel;
    members: number[];
    aggregate: number;
    latest: Date | null;
    hasRecentMember: boolean;
}

/** Text the builder classifies: both sides of the exchange */
export function interactionText(interaction: Pick<Interaction, 'text_in' | 'text_out'>): string {
    return [interaction.text_in, interaction.text_out]
        .filter((part): part is string => typeof part === 'string' && part.length > 0)
        .join('\n');
}

export function compareBranches(a: TopicBranch, b: TopicBranch): number {
    if (a.aggregate_score !== b.aggregate_score) return b.aggregate_score - a.aggregate_score;
    const aLatest = a.latest_member_at ? a.latest_member_at.getTime() : Number.NEGATIVE_INFINITY;
    const bLatest = b.latest_member_at ? b.latest_member_at.getTime() : Number.NEGATIVE_INFINITY;
    if (aLatest !== bLatest) return bLatest > aLatest ? 1 : -1;
    return a.label < b.label ? -1 : a.label > b.label ? 1 : 0;
}

/**
 * Group a recent window of interactions into topic branches. Branches are a
 * view rebuilt on every call; nothing here is retained between calls.
 */
export function buildTopicTree(interactions: readonly Interaction[], options: TopicTreeOptions): TopicTree {
    const vocabulary = options.vocabulary ?? topicVocabulary;
    const nowMs = options.now.getTime();
    const accumulators = new Map<BranchLabel, BranchAccumulator>();
    const assignments = new Map<number, TopicLabel[]>();

    const ordered = [...interactions].sort((a, b) => a.id - b.id);

    for (const interaction of ordered) {
        const topics = matchTopics(extractKeywords(interactionText(interaction), vocabulary), vocabulary);
        assignments.set(interaction.id, topics);

        const labels: BranchLabel[] = topics.length > 0 ? topics : ['uncategorized'];
        const weight = options.scoreOf(interaction);
        const timestamp = isValidTimestamp(interaction.timestamp) ? interaction.timestamp : null;
        const recent = timestamp !== null && nowMs - timestamp.getTime() < options.activeWindowMs;

        for (const label of labels) {
            let acc = accumulators.get(label);
            if (!acc) {
                acc = { label, members: [], aggregate: 0, latest: null, hasRecentMember: false };
                accumulators.set(label, acc);
            }
            acc.members.push(interaction.id);
            acc.aggregate += weight;
            if (timestamp && (!acc.latest || timestamp.getTime() > acc.latest.getTime())) {
                acc.latest = timestamp;
            }
            if (recent) acc.hasRecentMember = true;
        }
    }

    const branches: TopicBranch[] = [...accumulators.values()].map(acc => ({
        label: acc.label,
        member_interaction_ids: acc.members,
        is_active: acc.hasRecentMember,
        aggregate_score: acc.aggregate,
        latest_member_at: acc.latest
    }));
    branches.sort(compareBranches);

    // Ordering is by aggregate score first, so the top K are the first K.
    branches.slice(0, Math.max(0, options.topK)).forEach(branch => {
        branch.is_active = true;
    });

    return { branches, assignments };
}
