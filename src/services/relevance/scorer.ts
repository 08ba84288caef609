import type { Interaction, InteractionKind } from '../../types/index.js';

const HOUR_MS = 60 * 60 * 1000;

/** Recency buckets, most recent first. An age exactly on a bound takes that bucket. */
const RECENCY_BUCKETS: ReadonlyArray<{ maxAgeMs: number; factor: number }> = [
    { maxAgeMs: HOUR_MS, factor: 1.8 },
    { maxAgeMs: 6 * HOUR_MS, factor: 1.5 },
    { maxAgeMs: 24 * HOUR_MS, factor: 1.2 }
];

const KIND_FACTORS: Readonly<Record<InteractionKind, number>> = {
    conversation_turn: 1.5,
    client_request: 1.3,
    agent_response: 1.2,
    health_check: 1.0,
    other: 1.0
};

/** Length buckets, largest first; only the first match applies. */
const LENGTH_BUCKETS: ReadonlyArray<{ minExclusive: number; factor: number }> = [
    { minExclusive: 200, factor: 1.3 },
    { minExclusive: 100, factor: 1.2 }
];

const SUCCESS_FACTOR = 1.1;

export interface ScoreFactors {
    recency: number;
    kind: number;
    length: number;
    status: number;
}

export interface ScoreReport {
    interaction_id: number;
    score: number;
    factors: ScoreFactors;
    /** Null when the timestamp was missing or invalid */
    age_ms: number | null;
    warnings: string[];
}

export function isValidTimestamp(timestamp: Date | null | undefined): timestamp is Date {
    return timestamp instanceof Date && !Number.isNaN(timestamp.getTime());
}

export function contentLength(interaction: Pick<Interaction, 'text_in' | 'text_out'>): number {
    const textIn = typeof interaction.text_in === 'string' ? interaction.text_in.length : 0;
    const textOut = typeof interaction.text_out === 'string' ? interaction.text_out.length : 0;
    return textIn + textOut;
}

function recencyFactor(ageMs: number): number {
    const clamped = Math.max(0, ageMs);
    for (const bucket of RECENCY_BUCKETS) {
        if (clamped <= bucket.maxAgeMs) return bucket.factor;
    }
    return 1.0;
}

function lengthFactor(length: number): number {
    for (const bucket of LENGTH_BUCKETS) {
        if (length > bucket.minExclusive) return bucket.factor;
    }
    return 1.0;
}

/**
 * Score one interaction with its per-factor breakdown. Never throws: a record
 * with a missing or unparseable timestamp scores as old and carries a warning.
 */
export function scoreWithReport(interaction: Interaction, now: Date): ScoreReport {
    const warnings: string[] = [];

    let ageMs: number | null = null;
    let recency = 1.0;
    if (isValidTimestamp(interaction.timestamp)) {
        ageMs = now.getTime() - interaction.timestamp.getTime();
        recency = recencyFactor(ageMs);
    } else {
        warnings.push(`invalid_timestamp:${interaction.id}`);
    }

    const kind = KIND_FACTORS[interaction.kind] ?? 1.0;
    const length = lengthFactor(contentLength(interaction));
    const status = interaction.status === 'success' ? SUCCESS_FACTOR : 1.0;

    return {
        interaction_id: interaction.id,
        score: 1.0 * recency * kind * length * status,
        factors: { recency, kind, length, status },
        age_ms: ageMs,
        warnings
    };
}

export function score(interaction: Interaction, now: Date): number {
    return scoreWithReport(interaction, now).score;
}
