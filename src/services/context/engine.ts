import {
    ACTIVE_TOP_K,
    ACTIVE_WINDOW_HOURS,
    MAX_MESSAGE_CHARS,
    MIN_SIMILARITY,
    RECENT_WINDOW_DAYS,
    RECENT_WINDOW_LIMIT,
    SECTION_ITEM_LIMIT,
    SEMANTIC_CANDIDATE_LIMIT,
    SESSION_HISTORY_LIMIT
} from '../../config.js';
import { InputError, StoreUnavailableError, errorMessage } from '../../types/errors.js';
import type {
    BranchLabel,
    ContextCategory,
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
import { logger } from '../../utils/logger.js';
import { intentClassifier, type IntentClassification, type IntentClassifier } from '../intent/classifier.js';
import {
    contextAssemblyDuration,
    contextPayloadChars,
    contextRequests,
    recordDegradations,
    semanticStatusTotal
} from '../metrics/context-metrics.js';
import { EMPTY_PROFILE } from '../profile/project-profile.js';
import type { ScoreCache } from '../relevance/score-cache.js';
import { scoreWithReport, isValidTimestamp, type ScoreReport } from '../relevance/scorer.js';
import type { NarrowResult, SemanticNarrower } from '../semantic/narrower.js';
import type { InteractionStore, PreferenceStore } from '../store/types.js';
import { buildTopicTree, interactionText } from '../topics/topic-tree.js';
import { extractKeywords, matchTopics, topicVocabulary, type TopicVocabulary } from '../topics/vocabulary.js';
import { assemble, renderPrompt } from './assembler.js';
import type {
    CandidateDebug,
    ContextResult,
    GetContextRequest,
    RankedCandidate,
    RelevanceDebugRequest,
    RelevanceDebugResult
} from './types.js';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

const SHARED_TOPIC_BOOST = 0.5;
const ACTIVE_BRANCH_BOOST = 0.25;
const SAME_SESSION_FACTOR = 1.2;

export const SESSION_ID_PATTERN = /^[A-Za-z0-9._:-]{1,128}$/;

export interface ContextEngineOptions {
    store: InteractionStore;
    preferences: PreferenceStore;
    narrower: SemanticNarrower;
    profile?: ProjectProfile;
    classifier?: IntentClassifier;
    vocabulary?: TopicVocabulary;
    scoreCache?: ScoreCache | null;
    clock?: () => Date;
    activeWindowHours?: number;
    activeTopK?: number;
    recentWindowLimit?: number;
    recentWindowDays?: number;
    /** Session rows read on top of the recent window when a session id is given */
    sessionHistoryLimit?: number;
    minSimilarity?: number;
    sectionItemLimit?: number;
    semanticCandidateLimit?: number;
    maxMessageChars?: number;
}

interface Ranking {
    candidates: RankedCandidate[];
    branches: TopicBranch[];
    activeBranches: BranchLabel[];
    messageTopics: TopicLabel[];
    keywords: string[];
    reports: Map<number, ScoreReport>;
    degradations: string[];
}

interface WindowResult {
    interactions: Interaction[];
    storeStatus: StoreStatus;
    degradations: string[];
}

/** Recent window plus any session rows it missed, ascending by id */
function mergeWindow(recent: Interaction[], session: readonly Interaction[]): Interaction[] {
    const seen = new Set(recent.map(interaction => interaction.id));
    const missing = session.filter(interaction => !seen.has(interaction.id));
    if (missing.length === 0) return recent;
    return [...recent, ...missing].sort((a, b) => a.id - b.id);
}

function compareCandidates(a: RankedCandidate, b: RankedCandidate): number {
    if (a.weight !== b.weight) return b.weight - a.weight;
    const aTime = isValidTimestamp(a.interaction.timestamp) ? a.interaction.timestamp.getTime() : Number.NEGATIVE_INFINITY;
    const bTime = isValidTimestamp(b.interaction.timestamp) ? b.interaction.timestamp.getTime() : Number.NEGATIVE_INFINITY;
    if (aTime !== bTime) return bTime > aTime ? 1 : -1;
    return b.interaction.id - a.interaction.id;
}

function degradationReason(degradation: string): string {
    const colon = degradation.indexOf(':');
    return colon === -1 ? degradation : degradation.slice(0, colon);
}

/**
 * Facade over the scorer, topic builder, semantic narrower and assembler.
 *
 * Holds no per-request state: everything a request computes lives in locals,
 * so concurrent calls only share the embedding index behind the narrower and
 * the optional score cache.
 */
export class ContextEngine {
    private readonly store: InteractionStore;
    private readonly preferenceStore: PreferenceStore;
    private readonly narrower: SemanticNarrower;
    private readonly profile: ProjectProfile;
    private readonly classifier: IntentClassifier;
    private readonly vocabulary: TopicVocabulary;
    private readonly scoreCache: ScoreCache | null;
    private readonly clock: () => Date;
    private readonly activeWindowMs: number;
    private readonly activeTopK: number;
    private readonly recentWindowLimit: number;
    private readonly recentWindowMs: number;
    private readonly sessionHistoryLimit: number;
    private readonly minSimilarity: number;
    private readonly sectionItemLimit: number;
    private readonly semanticCandidateLimit: number;
    private readonly maxMessageChars: number;

    constructor(options: ContextEngineOptions) {
        this.store = options.store;
        this.preferenceStore = options.preferences;
        this.narrower = options.narrower;
        this.profile = options.profile ?? EMPTY_PROFILE;
        this.classifier = options.classifier ?? intentClassifier;
        this.vocabulary = options.vocabulary ?? topicVocabulary;
        this.scoreCache = options.scoreCache ?? null;
        this.clock = options.clock ?? (() => new Date());
        this.activeWindowMs = (options.activeWindowHours ?? ACTIVE_WINDOW_HOURS) * HOUR_MS;
        this.activeTopK = options.activeTopK ?? ACTIVE_TOP_K;
        this.recentWindowLimit = options.recentWindowLimit ?? RECENT_WINDOW_LIMIT;
        this.recentWindowMs = (options.recentWindowDays ?? RECENT_WINDOW_DAYS) * DAY_MS;
        this.sessionHistoryLimit = options.sessionHistoryLimit ?? SESSION_HISTORY_LIMIT;
        this.minSimilarity = options.minSimilarity ?? MIN_SIMILARITY;
        this.sectionItemLimit = options.sectionItemLimit ?? SECTION_ITEM_LIMIT;
        this.semanticCandidateLimit = options.semanticCandidateLimit ?? SEMANTIC_CANDIDATE_LIMIT;
        this.maxMessageChars = options.maxMessageChars ?? MAX_MESSAGE_CHARS;
    }

    get semanticKind(): SemanticNarrower['kind'] {
        return this.narrower.kind;
    }

    /**
     * Build the context payload and rendered prompt for a new message.
     * Throws InputError for malformed input; every other failure degrades the
     * payload instead of failing the call.
     */
    async getContext(request: GetContextRequest): Promise<ContextResult> {
        this.validateMessage(request.message);
        const sessionId = this.validateSessionId(request.session_id);
        this.validateBudget(request.budget_chars);

        const endTimer = contextAssemblyDuration.startTimer({ operation: 'get_context' });
        const now = this.clock();
        const intent = this.classifier.classify(request.message);
        const categories: ContextCategory[] = request.categories ? [...request.categories] : intent.needed_categories;

        try {
            const window = await this.loadWindow(now, sessionId);
            if (window.storeStatus === 'unavailable') {
                const keywords = extractKeywords(request.message, this.vocabulary);
                const payload = this.emptyPayload(intent, categories, keywords, request.budget_chars, ['store_unavailable']);
                this.record(intent, payload, 'degraded');
                return { payload, prompt: renderPrompt(payload.entries, request.message) };
            }

            const ranking = this.rank(window.interactions, now, request.message, sessionId);
            const narrowed = await this.narrow(request.message, ranking.candidates, 'apply');
            const candidates = narrowed.candidates;
            const degradations = [...window.degradations, ...ranking.degradations, ...narrowed.result.degradations];

            const preferences = categories.includes('user_preferences')
                ? await this.loadPreferences(request.user_id ?? null, degradations)
                : [];

            const assembled = assemble({
                message: request.message,
                categories,
                candidates,
                profile: this.profile,
                preferences,
                budgetChars: request.budget_chars,
                sessionId,
                sectionItemLimit: this.sectionItemLimit
            });

            const payload: ContextPayload = {
                entries: assembled.entries,
                metadata: {
                    primary_intent: intent.primary_intent,
                    categories,
                    urgency: intent.urgency,
                    complexity: intent.complexity,
                    active_branches: ranking.activeBranches,
                    keywords: ranking.keywords,
                    confidence: assembled.confidence,
                    semantic_status: narrowed.result.status,
                    search_mode: narrowed.result.searchMode,
                    store_status: 'ok',
                    degradations,
                    budget_chars: request.budget_chars,
                    used_chars: assembled.usedChars,
                    candidate_count: candidates.length
                }
            };

            this.record(intent, payload, degradations.length > 0 ? 'degraded' : 'success');
            logger.tool(
                'context-engine',
                'assemble',
                `intent=${intent.primary_intent} entries=${payload.entries.length} used=${assembled.usedChars}/${request.budget_chars} semantic=${narrowed.result.status}`
            );
            return { payload, prompt: renderPrompt(payload.entries, request.message) };
        } catch (err) {
            contextRequests.inc({ intent: intent.primary_intent, status: 'error' });
            throw err;
        } finally {
            endTimer();
        }
    }

    /**
     * Same computation as getContext without side effects: nothing is written
     * to the embedding index and no access times are bumped.
     */
    async getRelevanceDebug(request: RelevanceDebugRequest): Promise<RelevanceDebugResult> {
        this.validateMessage(request.message);
        const sessionId = this.validateSessionId(request.session_id);

        const endTimer = contextAssemblyDuration.startTimer({ operation: 'relevance_debug' });
        try {
            const now = this.clock();
            const intent = this.classifier.classify(request.message);
            const window = await this.loadWindow(now, sessionId);

            if (window.storeStatus === 'unavailable') {
                return {
                    intent,
                    message_topics: matchTopics(extractKeywords(request.message, this.vocabulary), this.vocabulary),
                    active_branches: [],
                    branches: [],
                    scores: [],
                    semantic_status: 'skipped',
                    search_mode: this.narrower.searchMode,
                    semantic_matches: [],
                    store_status: 'unavailable',
                    degradations: ['store_unavailable']
                };
            }

            const ranking = this.rank(window.interactions, now, request.message, sessionId);
            const narrowed = await this.narrow(request.message, ranking.candidates, 'inspect');

            const scores: CandidateDebug[] = [];
            for (const candidate of narrowed.result.status === 'applied' ? narrowed.candidates : ranking.candidates) {
                const report = ranking.reports.get(candidate.interaction.id);
                if (!report) continue;
                scores.push({
                    ...report,
                    weight: candidate.weight,
                    topics: candidate.topics,
                    kind: candidate.interaction.kind,
                    session_id: candidate.interaction.session_id
                });
            }

            const semanticMatches = [...narrowed.result.similarities]
                .map(([interactionId, similarity]) => ({ interaction_id: interactionId, similarity }))
                .sort((a, b) => b.similarity - a.similarity || b.interaction_id - a.interaction_id);

            logger.tool('context-engine', 'debug', `intent=${intent.primary_intent} candidates=${scores.length} semantic=${narrowed.result.status}`);

            return {
                intent,
                message_topics: ranking.messageTopics,
                active_branches: ranking.activeBranches,
                branches: ranking.branches,
                scores,
                semantic_status: narrowed.result.status,
                search_mode: narrowed.result.searchMode,
                semantic_matches: semanticMatches,
                store_status: 'ok',
                degradations: [...window.degradations, ...ranking.degradations, ...narrowed.result.degradations]
            };
        } finally {
            endTimer();
        }
    }

    private validateMessage(message: unknown): void {
        if (typeof message !== 'string' || message.trim().length === 0) {
            throw new InputError('message must be a non-empty string');
        }
        if (message.length > this.maxMessageChars) {
            throw new InputError(`message exceeds ${this.maxMessageChars} characters`, {
                length: message.length,
                max: this.maxMessageChars
            });
        }
    }

    private validateSessionId(sessionId: string | null | undefined): string | null {
        if (sessionId === undefined || sessionId === null) return null;
        if (!SESSION_ID_PATTERN.test(sessionId)) {
            throw new InputError('session_id must match ^[A-Za-z0-9._:-]{1,128}$', { session_id: sessionId.slice(0, 140) });
        }
        return sessionId;
    }

    private validateBudget(budget: number): void {
        if (!Number.isInteger(budget) || budget <= 0) {
            throw new InputError('budget_chars must be a positive integer', { budget_chars: budget });
        }
    }

    /**
     * The recent window, widened with the caller's own session history so
     * older turns of that session stay reachable.
     */
    private async loadWindow(now: Date, sessionId: string | null): Promise<WindowResult> {
        const malformed = new Set<string>();
        const onMalformedRow = (rowId: string): void => {
            malformed.add(rowId);
        };
        try {
            const recent = await this.store.recent({
                limit: this.recentWindowLimit,
                since: new Date(now.getTime() - this.recentWindowMs),
                onMalformedRow
            });
            const session = sessionId !== null && this.sessionHistoryLimit > 0
                ? await this.store.bySession(sessionId, this.sessionHistoryLimit, onMalformedRow)
                : [];
            return {
                interactions: mergeWindow(recent, session),
                storeStatus: 'ok',
                degradations: [...malformed].map(rowId => `malformed_row:${rowId}`)
            };
        } catch (err) {
            if (!(err instanceof StoreUnavailableError)) throw err;
            logger.warn(`[ContextEngine] Interaction store unavailable: ${err.message}`);
            return { interactions: [], storeStatus: 'unavailable', degradations: [] };
        }
    }

    private async loadPreferences(userId: string | null, degradations: string[]): Promise<UserPreference[]> {
        if (!userId) return [];
        try {
            return await this.preferenceStore.list(userId);
        } catch (err) {
            if (!(err instanceof StoreUnavailableError)) throw err;
            logger.warn(`[ContextEngine] Preference store unavailable: ${errorMessage(err)}`);
            degradations.push('preferences_unavailable');
            return [];
        }
    }

    private scoreOf(interaction: Interaction, now: Date, memo: Map<number, ScoreReport>): ScoreReport {
        const memoized = memo.get(interaction.id);
        if (memoized) return memoized;
        let report = this.scoreCache?.get(interaction.id, now) ?? null;
        if (!report) {
            report = scoreWithReport(interaction, now);
            this.scoreCache?.set(interaction.id, now, report);
        }
        memo.set(interaction.id, report);
        return report;
    }

    private rank(interactions: readonly Interaction[], now: Date, message: string, sessionId: string | null): Ranking {
        const reports = new Map<number, ScoreReport>();
        const tree = buildTopicTree(interactions, {
            now,
            activeWindowMs: this.activeWindowMs,
            topK: this.activeTopK,
            scoreOf: interaction => this.scoreOf(interaction, now, reports).score,
            vocabulary: this.vocabulary
        });

        const keywords = extractKeywords(message, this.vocabulary);
        const messageTopics = new Set(matchTopics(keywords, this.vocabulary));
        const activeBranches = tree.branches.filter(branch => branch.is_active).map(branch => branch.label);
        const active = new Set<BranchLabel>(activeBranches);

        const degradations: string[] = [];
        const candidates: RankedCandidate[] = [];
        for (const interaction of interactions) {
            const report = this.scoreOf(interaction, now, reports);
            degradations.push(...report.warnings);

            const topics = tree.assignments.get(interaction.id) ?? [];
            const labels: BranchLabel[] = topics.length > 0 ? topics : ['uncategorized'];
            let topicFactor = 1;
            if (topics.some(topic => messageTopics.has(topic))) topicFactor += SHARED_TOPIC_BOOST;
            if (labels.some(label => active.has(label))) topicFactor += ACTIVE_BRANCH_BOOST;
            const sessionFactor = sessionId !== null && interaction.session_id === sessionId ? SAME_SESSION_FACTOR : 1;

            candidates.push({ interaction, score: report.score, weight: report.score * topicFactor * sessionFactor, topics });
        }
        candidates.sort(compareCandidates);

        return {
            candidates,
            branches: tree.branches,
            activeBranches,
            messageTopics: [...messageTopics],
            keywords,
            reports,
            degradations
        };
    }

    /**
     * Re-rank the head of the candidate list by similarity to the message.
     * With at least one match only matched candidates remain, ordered by
     * weight × (1 + similarity); otherwise the relevance ranking stands.
     */
    private async narrow(
        message: string,
        ranked: RankedCandidate[],
        mode: 'apply' | 'inspect'
    ): Promise<{ candidates: RankedCandidate[]; result: NarrowResult }> {
        const head = ranked
            .slice(0, this.semanticCandidateLimit)
            .map(candidate => ({ candidate, text: interactionText(candidate.interaction).trim() }))
            .filter(entry => entry.text.length > 0);

        if (head.length === 0) {
            const searchMode: SearchMode = this.narrower.searchMode;
            return { candidates: ranked, result: { status: 'skipped', searchMode, similarities: new Map(), degradations: [] } };
        }

        const result = await this.narrower.narrow({
            message,
            candidates: head.map(entry => ({ id: entry.candidate.interaction.id, text: entry.text })),
            minSimilarity: this.minSimilarity,
            mode
        });
        if (result.status !== 'applied') return { candidates: ranked, result };

        const matched: RankedCandidate[] = [];
        for (const { candidate } of head) {
            const similarity = result.similarities.get(candidate.interaction.id);
            if (similarity !== undefined) matched.push({ ...candidate, similarity });
        }
        const adjusted = (c: RankedCandidate): number => c.weight * (1 + (c.similarity ?? 0));
        matched.sort((a, b) => adjusted(b) - adjusted(a) || b.interaction.id - a.interaction.id);
        return { candidates: matched, result };
    }

    private emptyPayload(
        intent: IntentClassification,
        categories: ContextCategory[],
        keywords: string[],
        budget: number,
        degradations: string[]
    ): ContextPayload {
        const semanticStatus: SemanticStatus = 'skipped';
        return {
            entries: [],
            metadata: {
                primary_intent: intent.primary_intent,
                categories,
                urgency: intent.urgency,
                complexity: intent.complexity,
                active_branches: [],
                keywords,
                confidence: 0,
                semantic_status: semanticStatus,
                search_mode: this.narrower.searchMode,
                store_status: 'unavailable',
                degradations,
                budget_chars: budget,
                used_chars: 0,
                candidate_count: 0
            }
        };
    }

    private record(intent: IntentClassification, payload: ContextPayload, status: 'success' | 'degraded'): void {
        contextRequests.inc({ intent: intent.primary_intent, status });
        contextPayloadChars.observe(payload.metadata.used_chars);
        semanticStatusTotal.inc({ status: payload.metadata.semantic_status });
        for (const degradation of payload.metadata.degradations) {
            recordDegradations.inc({ reason: degradationReason(degradation) });
        }
    }
}
