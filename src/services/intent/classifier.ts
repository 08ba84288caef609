import { z } from 'zod';
import rawIntentKeywords from '../../data/intent-keywords.json';
import type { Complexity, ContextCategory, PrimaryIntent, Urgency } from '../../types/index.js';
import { tokenize } from '../../utils/text.js';

export type KeywordIntent = Exclude<PrimaryIntent, 'general'>;

/** Tie-break order when two families have the same number of hits. */
export const INTENT_PRIORITY: readonly KeywordIntent[] = ['troubleshooting', 'development', 'explanation', 'optimization'];

/**
 * Fixed intent → category table. Order within each row is the assembler's
 * section priority.
 */
export const INTENT_CATEGORIES: Readonly<Record<PrimaryIntent, readonly ContextCategory[]>> = Object.freeze({
    troubleshooting: ['error_context', 'recent_actions', 'tech_stack'],
    development: ['project_structure', 'tech_stack', 'recent_actions'],
    explanation: ['project_structure', 'tech_stack', 'conversation_history'],
    optimization: ['tech_stack', 'recent_actions', 'project_structure'],
    general: ['conversation_history']
});

const keywordsSchema = z.object({
    families: z.object({
        troubleshooting: z.array(z.string().min(1)).min(1),
        development: z.array(z.string().min(1)).min(1),
        explanation: z.array(z.string().min(1)).min(1),
        optimization: z.array(z.string().min(1)).min(1)
    }),
    urgencyMarkers: z.array(z.string().min(1)),
    complexity: z.object({
        low: z.array(z.string().min(1)),
        high: z.array(z.string().min(1))
    })
});

export interface IntentKeywords {
    readonly families: ReadonlyMap<KeywordIntent, ReadonlySet<string>>;
    readonly urgencyMarkers: ReadonlySet<string>;
    readonly lowComplexity: ReadonlySet<string>;
    readonly highComplexity: ReadonlySet<string>;
}

export interface IntentClassification {
    primary_intent: PrimaryIntent;
    needed_categories: ContextCategory[];
    urgency: Urgency;
    complexity: Complexity;
    /** Hit count per keyword family */
    scores: Record<KeywordIntent, number>;
    matched_keywords: string[];
}

const toSet = (terms: string[]): ReadonlySet<string> => new Set(terms.map(term => term.toLowerCase()));

export function loadIntentKeywords(raw: unknown = rawIntentKeywords): IntentKeywords {
    const parsed = keywordsSchema.parse(raw);
    const families = new Map<KeywordIntent, ReadonlySet<string>>();
    for (const intent of INTENT_PRIORITY) {
        families.set(intent, toSet(parsed.families[intent]));
    }
    return Object.freeze({
        families,
        urgencyMarkers: toSet(parsed.urgencyMarkers),
        lowComplexity: toSet(parsed.complexity.low),
        highComplexity: toSet(parsed.complexity.high)
    });
}

/**
 * Rule-based intent classifier. Pure and total: any string, including an empty
 * one, gets a classification.
 */
export class IntentClassifier {
    constructor(private readonly keywords: IntentKeywords = loadIntentKeywords()) { }

    classify(message: string): IntentClassification {
        const tokens = tokenize(message);
        const scores: Record<KeywordIntent, number> = { troubleshooting: 0, development: 0, explanation: 0, optimization: 0 };
        const matched: string[] = [];

        for (const token of tokens) {
            for (const intent of INTENT_PRIORITY) {
                if (this.keywords.families.get(intent)?.has(token)) {
                    scores[intent] += 1;
                    if (!matched.includes(token)) matched.push(token);
                }
            }
        }

        let primary: PrimaryIntent = 'general';
        let best = 0;
        // Strictly greater keeps the earlier (higher priority) family on ties.
        for (const intent of INTENT_PRIORITY) {
            if (scores[intent] > best) {
                best = scores[intent];
                primary = intent;
            }
        }

        const urgent = primary === 'troubleshooting' || tokens.some(token => this.keywords.urgencyMarkers.has(token));

        return {
            primary_intent: primary,
            needed_categories: [...INTENT_CATEGORIES[primary]],
            urgency: urgent ? 'high' : 'normal',
            complexity: this.complexityOf(tokens),
            scores,
            matched_keywords: matched
        };
    }

    private complexityOf(tokens: string[]): Complexity {
        if (tokens.some(token => this.keywords.lowComplexity.has(token))) return 'low';
        if (tokens.some(token => this.keywords.highComplexity.has(token))) return 'high';
        return 'medium';
    }
}

export const intentClassifier = new IntentClassifier();
