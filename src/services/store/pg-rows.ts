import { z } from 'zod';
import { INTERACTION_KINDS, INTERACTION_STATUSES, type Interaction, type UserPreference } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import type { MalformedRowHandler } from './types.js';

// Anything unreadable (garbage text, pg's Infinity) becomes an invalid Date; scoring treats those as neutral.
const timestampColumn = z.union([z.date(), z.string(), z.null()])
    .transform(value => (typeof value === 'string' ? new Date(value) : value))
    .catch(() => new Date(Number.NaN));

export const interactionRowSchema = z.object({
    // BIGSERIAL comes back as a string
    id: z.coerce.number().int(),
    timestamp: timestampColumn,
    session_id: z.string().nullable(),
    user_id: z.string().nullable(),
    kind: z.enum(INTERACTION_KINDS).catch('other'),
    text_in: z.string().nullable(),
    text_out: z.string().nullable(),
    status: z.enum(INTERACTION_STATUSES).catch('pending'),
    metadata: z.record(z.unknown()).nullable().optional().transform(value => value ?? {}).catch({})
});

export const preferenceRowSchema = z.object({
    user_id: z.string(),
    key: z.string(),
    value: z.string(),
    updated_at: z.union([z.date(), z.string()]).transform(value => (typeof value === 'string' ? new Date(value) : value))
});

export function toInteraction(row: unknown): Interaction {
    return interactionRowSchema.parse(row);
}

function rowIdOf(row: unknown): string {
    if (typeof row === 'object' && row !== null && 'id' in row) {
        const id = row.id;
        if (typeof id === 'string' || typeof id === 'number') return String(id);
    }
    return 'unknown';
}

/** Parse every readable row; the rest are logged, reported and left out */
export function toInteractions(rows: readonly unknown[], onMalformedRow?: MalformedRowHandler): Interaction[] {
    const interactions: Interaction[] = [];
    for (const row of rows) {
        const parsed = interactionRowSchema.safeParse(row);
        if (parsed.success) {
            interactions.push(parsed.data);
            continue;
        }
        const rowId = rowIdOf(row);
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        logger.warn(`[PgRows] Skipping malformed interaction row ${rowId}: ${issues}`);
        onMalformedRow?.(rowId);
    }
    return interactions;
}

export function toPreference(row: unknown): UserPreference {
    return preferenceRowSchema.parse(row);
}
