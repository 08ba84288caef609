import { StoreUnavailableError, errorMessage } from '../../types/errors.js';
import type { Interaction, NewInteraction } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { pgHealthCheck, type SqlClient } from './pg-client.js';
import { toInteraction, toInteractions } from './pg-rows.js';
import { DEFAULT_SESSION_HISTORY_LIMIT, type InteractionStore, type MalformedRowHandler, type RecentQuery } from './types.js';

const COLUMNS = 'id, timestamp, session_id, user_id, kind, text_in, text_out, status, metadata';

export class PgInteractionStore implements InteractionStore {
    readonly kind = 'postgres' as const;

    constructor(private readonly client: SqlClient) { }

    async recent(query: RecentQuery): Promise<Interaction[]> {
        if (query.limit <= 0) return [];
        const conditions: string[] = [];
        const params: unknown[] = [];
        if (query.since) {
            params.push(query.since);
            conditions.push(`(timestamp >= $${params.length} OR timestamp IS NULL)`);
        }
        if (query.sessionId !== undefined) {
            params.push(query.sessionId);
            conditions.push(`session_id = $${params.length}`);
        }
        if (query.kind !== undefined) {
            params.push(query.kind);
            conditions.push(`kind = $${params.length}`);
        }
        params.push(query.limit);
        const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
        const rows = await this.run('recent', `SELECT ${COLUMNS} FROM interactions${where} ORDER BY id DESC LIMIT $${params.length}`, params);
        return toInteractions(rows, query.onMalformedRow).reverse();
    }

    async bySession(
        sessionId: string,
        limit: number = DEFAULT_SESSION_HISTORY_LIMIT,
        onMalformedRow?: MalformedRowHandler
    ): Promise<Interaction[]> {
        if (limit <= 0) return [];
        const rows = await this.run(
            'bySession',
            `SELECT ${COLUMNS} FROM interactions WHERE session_id = $1 ORDER BY id DESC LIMIT $2`,
            [sessionId, limit]
        );
        return toInteractions(rows, onMalformedRow).reverse();
    }

    async append(interaction: NewInteraction): Promise<Interaction> {
        const rows = await this.run(
            'append',
            `INSERT INTO interactions (timestamp, session_id, user_id, kind, text_in, text_out, status, metadata)
             VALUES (COALESCE($1, now()), $2, $3, $4, $5, $6, $7, $8)
             RETURNING ${COLUMNS}`,
            [
                interaction.timestamp ?? null,
                interaction.session_id,
                interaction.user_id,
                interaction.kind,
                interaction.text_in,
                interaction.text_out,
                interaction.status,
                JSON.stringify(interaction.metadata)
            ]
        );
        const [row] = rows;
        if (row === undefined) {
            throw new StoreUnavailableError('Insert returned no row', { operation: 'append' });
        }
        return toInteraction(row);
    }

    async healthCheck(): Promise<boolean> {
        return pgHealthCheck(this.client);
    }

    async close(): Promise<void> {
        await this.client.end();
    }

    private async run(operation: string, text: string, params: unknown[]): Promise<unknown[]> {
        try {
            const result = await this.client.query(text, params);
            return result.rows;
        } catch (err) {
            logger.error(`[PgInteractionStore] ${operation} failed`, err);
            throw new StoreUnavailableError(`Interaction store ${operation} failed: ${errorMessage(err)}`, { operation });
        }
    }
}
