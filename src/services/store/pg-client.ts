// Postgres access for the stores. Everything above this file talks to SqlClient,
// so tests can hand the stores a fake without touching pg.

import pg from 'pg';
import { logger } from '../../utils/logger.js';
import { errorMessage } from '../../types/errors.js';
import { INTERACTIONS_SCHEMA_SQL } from './pg-schema.js';

export interface SqlResult {
    rows: unknown[];
    rowCount?: number | null;
}

export interface SqlClient {
    query(text: string, params?: unknown[]): Promise<SqlResult>;
    end(): Promise<void>;
}

export interface PgConfig {
    connectionString: string;
    poolMax?: number;
    idleTimeoutMs?: number;
    connectionTimeoutMs?: number;
    statementTimeoutMs?: number;
}

export class PgSqlClient implements SqlClient {
    constructor(private readonly pool: pg.Pool) { }

    async query(text: string, params: unknown[] = []): Promise<SqlResult> {
        const result = await this.pool.query(text, params);
        return { rows: result.rows, rowCount: result.rowCount };
    }

    async end(): Promise<void> {
        await this.pool.end();
    }
}

export function createPgClient(config: PgConfig): PgSqlClient {
    const pool = new pg.Pool({
        connectionString: config.connectionString,
        max: config.poolMax ?? 10,
        idleTimeoutMillis: config.idleTimeoutMs ?? 30_000,
        connectionTimeoutMillis: config.connectionTimeoutMs ?? 5_000,
        statement_timeout: config.statementTimeoutMs ?? 30_000,
        application_name: 'context-intelligence'
    });

    // Idle-client errors must not take the process down; the next query reports them.
    pool.on('error', (err) => {
        logger.warn(`[pg-client] Pool background error: ${err.message}`);
    });

    return new PgSqlClient(pool);
}

export async function pgHealthCheck(client: SqlClient): Promise<boolean> {
    try {
        const result = await client.query('SELECT 1 AS ok');
        const [row] = result.rows;
        return typeof row === 'object' && row !== null && 'ok' in row && row.ok === 1;
    } catch (err) {
        logger.warn(`[pg-client] Health check failed: ${errorMessage(err)}`);
        return false;
    }
}

export async function ensureSchema(client: SqlClient): Promise<void> {
    await client.query(INTERACTIONS_SCHEMA_SQL);
    logger.debug('[pg-client] Schema ensured');
}
