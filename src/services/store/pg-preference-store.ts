import { StoreUnavailableError, errorMessage } from '../../types/errors.js';
import type { UserPreference } from '../../types/index.js';
import type { SqlClient } from './pg-client.js';
import { toPreference } from './pg-rows.js';
import type { PreferenceStore } from './types.js';

export class PgPreferenceStore implements PreferenceStore {
    constructor(private readonly client: SqlClient) { }

    async list(userId: string): Promise<UserPreference[]> {
        const rows = await this.run(
            'list',
            'SELECT user_id, key, value, updated_at FROM user_preferences WHERE user_id = $1 ORDER BY key ASC',
            [userId]
        );
        return rows.map(toPreference);
    }

    async set(userId: string, key: string, value: string): Promise<UserPreference> {
        const rows = await this.run(
            'set',
            `INSERT INTO user_preferences (user_id, key, value, updated_at) VALUES ($1, $2, $3, now())
             ON CONFLICT (user_id, key) DO UPDATE SET value = EXCLUDED.value, updated_at = EXCLUDED.updated_at
             RETURNING user_id, key, value, updated_at`,
            [userId, key, value]
        );
        const [row] = rows;
        if (row === undefined) {
            throw new StoreUnavailableError('Upsert returned no row', { operation: 'set' });
        }
        return toPreference(row);
    }

    async remove(userId: string, key: string): Promise<boolean> {
        const rows = await this.run(
            'remove',
            'DELETE FROM user_preferences WHERE user_id = $1 AND key = $2 RETURNING key',
            [userId, key]
        );
        return rows.length > 0;
    }

    private async run(operation: string, text: string, params: unknown[]): Promise<unknown[]> {
        try {
            const result = await this.client.query(text, params);
            return result.rows;
        } catch (err) {
            throw new StoreUnavailableError(`Preference store ${operation} failed: ${errorMessage(err)}`, { operation });
        }
    }
}
