import type { ContextCategory, Interaction, InteractionKind, ProjectProfile, TopicLabel, UserPreference } from '../../types/index.js';
import { clipText } from '../../utils/text.js';
import { detectTechnologies, topicVocabulary, type TopicVocabulary } from '../topics/vocabulary.js';
import type { RankedCandidate } from './types.js';

/** Per-item clip length for interaction text */
export const ITEM_MAX_CHARS = 160;

/** Weight of items that come from the profile or preferences rather than a ranked interaction */
const STATIC_ITEM_WEIGHT = 1.0;

export const SECTION_TITLES: Readonly<Record<ContextCategory, string>> = {
    recent_actions: '## Recent actions',
    tech_stack: '## Tech stack',
    error_context: '## Error context',
    project_structure: '## Project structure',
    user_preferences: '## User preferences',
    conversation_history: '## Conversation history'
};

const KIND_LABELS: Readonly<Record<InteractionKind, string>> = {
    client_request: 'User request',
    agent_response: 'Agent response',
    conversation_turn: 'Conversation turn',
    health_check: 'Health check',
    other: 'Interaction'
};

const ACTION_KINDS: ReadonlySet<InteractionKind> = new Set(['client_request', 'agent_response', 'conversation_turn']);
const STRUCTURE_TOPICS: ReadonlySet<TopicLabel> = new Set(['architecture', 'documentation']);

export interface SectionItem {
    text: string;
    weight: number;
}

export interface SectionSources {
    candidates: readonly RankedCandidate[];
    profile: ProjectProfile;
    preferences: readonly UserPreference[];
    sessionId?: string | null;
    limit: number;
    vocabulary?: TopicVocabulary;
}

/** The text that best represents what happened in an interaction */
function primaryText(interaction: Interaction): string {
    const textIn = interaction.text_in?.trim() ?? '';
    const textOut = interaction.text_out?.trim() ?? '';
    if (interaction.kind === 'agent_response') return textOut || textIn;
    if (interaction.kind === 'conversation_turn' && textIn && textOut) return `${textIn} -> ${textOut}`;
    return textIn || textOut;
}

/** One bullet line for an interaction, or null when it carries no text */
export function describeInteraction(interaction: Interaction): string | null {
    const text = primaryText(interaction);
    if (!text) return null;
    const marker = interaction.status === 'error' ? ' [error]' : '';
    return `${KIND_LABELS[interaction.kind]}${marker}: ${clipText(text, ITEM_MAX_CHARS)}`;
}

function fromCandidates(candidates: readonly RankedCandidate[], include: (c: RankedCandidate) => boolean, limit: number): SectionItem[] {
    const items: SectionItem[] = [];
    for (const candidate of candidates) {
        if (items.length >= limit) break;
        if (!include(candidate)) continue;
        const text = describeInteraction(candidate.interaction);
        if (text) items.push({ text, weight: candidate.weight });
    }
    return items;
}

function staticItems(lines: readonly string[]): SectionItem[] {
    const seen = new Set<string>();
    const items: SectionItem[] = [];
    for (const line of lines) {
        const text = clipText(line, ITEM_MAX_CHARS);
        if (!text || seen.has(text)) continue;
        seen.add(text);
        items.push({ text, weight: STATIC_ITEM_WEIGHT });
    }
    return items;
}

function techStackItems(sources: SectionSources): SectionItem[] {
    if (sources.profile.techStack.length > 0) {
        return staticItems(sources.profile.techStack).slice(0, sources.limit);
    }
    const vocabulary = sources.vocabulary ?? topicVocabulary;
    const found = new Map<string, number>();
    for (const candidate of sources.candidates) {
        const { text_in, text_out } = candidate.interaction;
        for (const tech of detectTechnologies(`${text_in ?? ''}\n${text_out ?? ''}`, vocabulary)) {
            if (!found.has(tech)) found.set(tech, candidate.weight);
        }
        if (found.size >= sources.limit) break;
    }
    return [...found].slice(0, sources.limit).map(([text, weight]) => ({ text, weight }));
}

/**
 * Items for one category, best first, at most `limit`. The assembler decides
 * how many of them fit.
 */
export function buildSectionItems(category: ContextCategory, sources: SectionSources): SectionItem[] {
    const { candidates, limit } = sources;
    if (limit <= 0) return [];

    switch (category) {
        case 'recent_actions':
            return fromCandidates(candidates, c => ACTION_KINDS.has(c.interaction.kind), limit);
        case 'error_context':
            return fromCandidates(candidates, c => c.interaction.status === 'error' || c.topics.includes('debugging'), limit);
        case 'tech_stack':
            return techStackItems(sources);
        case 'project_structure': {
            const notes = staticItems(sources.profile.projectStructure);
            const related = fromCandidates(candidates, c => c.topics.some(topic => STRUCTURE_TOPICS.has(topic)), limit);
            return [...notes, ...related].slice(0, limit);
        }
        case 'user_preferences':
            return staticItems(sources.preferences.map(pref => `${pref.key}: ${pref.value}`)).slice(0, limit);
        case 'conversation_history': {
            const sessionId = sources.sessionId;
            return fromCandidates(
                candidates,
                c => (sessionId ? c.interaction.session_id === sessionId : c.interaction.kind === 'conversation_turn'),
                limit
            );
        }
    }
}

export function renderSection(category: ContextCategory, items: readonly SectionItem[]): string {
    return [SECTION_TITLES[category], ...items.map(item => `- ${item.text}`)].join('\n');
}
