import { z } from 'zod';
import rawVocabulary from '../../data/topic-vocabulary.json';
import { TOPIC_LABELS, type TopicLabel } from '../../types/index.js';
import { tokenize } from '../../utils/text.js';

const vocabularySchema = z.object({
    topics: z.record(z.string(), z.array(z.string().min(1))),
    technologies: z.array(z.string().min(1)),
    stopWords: z.array(z.string().min(1))
});

/**
 * Closed topic vocabulary. Built once, frozen, and shared by every component
 * that has to agree on which words mean which topic.
 */
export interface TopicVocabulary {
    readonly topics: ReadonlyMap<TopicLabel, ReadonlySet<string>>;
    readonly technologies: ReadonlySet<string>;
    readonly stopWords: ReadonlySet<string>;
}

function normalizeTerms(terms: string[]): ReadonlySet<string> {
    return new Set(terms.map(term => term.toLowerCase()));
}

export function loadTopicVocabulary(raw: unknown = rawVocabulary): TopicVocabulary {
    const parsed = vocabularySchema.parse(raw);

    const unknownLabels = Object.keys(parsed.topics).filter(
        key => !TOPIC_LABELS.some(label => label === key)
    );
    if (unknownLabels.length > 0) {
        throw new Error(`Topic vocabulary has labels outside the closed set: ${unknownLabels.join(', ')}`);
    }

    const topics = new Map<TopicLabel, ReadonlySet<string>>();
    for (const label of TOPIC_LABELS) {
        const terms = parsed.topics[label];
        if (!terms || terms.length === 0) {
            throw new Error(`Topic vocabulary is missing terms for "${label}"`);
        }
        topics.set(label, normalizeTerms(terms));
    }

    return Object.freeze({
        topics,
        technologies: normalizeTerms(parsed.technologies),
        stopWords: normalizeTerms(parsed.stopWords)
    });
}

export const topicVocabulary: TopicVocabulary = loadTopicVocabulary();

/**
 * Distinct non-stop-word tokens in order of first appearance.
 */
export function extractKeywords(text: string | null | undefined, vocabulary: TopicVocabulary = topicVocabulary): string[] {
    const seen = new Set<string>();
    const keywords: string[] = [];
    for (const token of tokenize(text)) {
        if (token.length < 2 || vocabulary.stopWords.has(token) || seen.has(token)) continue;
        seen.add(token);
        keywords.push(token);
    }
    return keywords;
}

/**
 * Topics with at least one keyword overlap, in vocabulary order.
 */
export function matchTopics(keywords: Iterable<string>, vocabulary: TopicVocabulary = topicVocabulary): TopicLabel[] {
    const tokens = new Set(keywords);
    const matched: TopicLabel[] = [];
    for (const [label, terms] of vocabulary.topics) {
        for (const token of tokens) {
            if (terms.has(token)) {
                matched.push(label);
                break;
            }
        }
    }
    return matched;
}

export function detectTechnologies(text: string | null | undefined, vocabulary: TopicVocabulary = topicVocabulary): string[] {
    return extractKeywords(text, vocabulary).filter(token => vocabulary.technologies.has(token));
}
