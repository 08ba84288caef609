import { logger } from '../../utils/logger.js';
import { createPgClient, ensureSchema } from './pg-client.js';
import { PgInteractionStore } from './pg-interaction-store.js';
import { PgPreferenceStore } from './pg-preference-store.js';
import { InMemoryInteractionStore } from './memory-interaction-store.js';
import { InMemoryPreferenceStore } from './memory-preference-store.js';
import type { InteractionStore, PreferenceStore } from './types.js';

export interface Stores {
    interactions: InteractionStore;
    preferences: PreferenceStore;
}

/**
 * Postgres when a connection string is given, process memory otherwise.
 * Schema creation failures are logged; the store then reports unavailable
 * per request instead of refusing to start.
 */
export async function createStores(databaseUrl: string): Promise<Stores> {
    if (!databaseUrl) {
        logger.info('[StoreFactory] DATABASE_URL not set, using in-memory interaction store');
        return { interactions: new InMemoryInteractionStore(), preferences: new InMemoryPreferenceStore() };
    }

    const client = createPgClient({ connectionString: databaseUrl });
    try {
        await ensureSchema(client);
    } catch (err) {
        logger.error('[StoreFactory] Could not ensure Postgres schema', err);
    }
    logger.info('[StoreFactory] Using Postgres interaction store');
    return { interactions: new PgInteractionStore(client), preferences: new PgPreferenceStore(client) };
}
