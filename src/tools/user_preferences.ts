import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { PreferenceStore } from '../services/store/types.js';
import { runTool } from './tool-runner.js';
import { toPreferenceView } from './views.js';

export const ADD_USER_PREFERENCE_TOOL = 'add_user_preference';
export const LIST_USER_PREFERENCES_TOOL = 'list_user_preferences';
export const REMOVE_USER_PREFERENCE_TOOL = 'remove_user_preference';

const userId = z.string().min(1).max(128).describe('Owner of the preference');
const key = z.string().min(1).max(128).describe('Preference name, e.g. "language"');

export async function handleAddUserPreference(
    store: PreferenceStore,
    args: { user_id: string; key: string; value: string }
): Promise<CallToolResult> {
    return runTool(ADD_USER_PREFERENCE_TOOL, 'preference', async () => {
        const preference = await store.set(args.user_id, args.key, args.value);
        return {
            output: { preference: toPreferenceView(preference) },
            summary: `set user=${args.user_id} key=${args.key}`
        };
    });
}

export async function handleListUserPreferences(store: PreferenceStore, args: { user_id: string }): Promise<CallToolResult> {
    return runTool(LIST_USER_PREFERENCES_TOOL, 'preference', async () => {
        const preferences = await store.list(args.user_id);
        return {
            output: { user_id: args.user_id, preferences: preferences.map(toPreferenceView) },
            summary: `list user=${args.user_id} count=${preferences.length}`
        };
    });
}

export async function handleRemoveUserPreference(
    store: PreferenceStore,
    args: { user_id: string; key: string }
): Promise<CallToolResult> {
    return runTool(REMOVE_USER_PREFERENCE_TOOL, 'preference', async () => {
        const removed = await store.remove(args.user_id, args.key);
        return {
            output: { user_id: args.user_id, key: args.key, removed },
            summary: `remove user=${args.user_id} key=${args.key} removed=${removed}`
        };
    });
}

export function registerUserPreferenceTools(server: McpServer, store: PreferenceStore): void {
    server.registerTool(
        ADD_USER_PREFERENCE_TOOL,
        {
            title: 'Add or update a user preference',
            description: 'Store a preference that get_context includes under user_preferences.',
            inputSchema: { user_id: userId, key, value: z.string().min(1).max(1000) }
        },
        async (args) => handleAddUserPreference(store, args)
    );

    server.registerTool(
        LIST_USER_PREFERENCES_TOOL,
        {
            title: 'List user preferences',
            description: 'All stored preferences of a user, by key.',
            inputSchema: { user_id: userId }
        },
        async (args) => handleListUserPreferences(store, args)
    );

    server.registerTool(
        REMOVE_USER_PREFERENCE_TOOL,
        {
            title: 'Remove a user preference',
            description: 'Delete one preference by key.',
            inputSchema: { user_id: userId, key }
        },
        async (args) => handleRemoveUserPreference(store, args)
    );
}
