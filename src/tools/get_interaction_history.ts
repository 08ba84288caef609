import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { SESSION_ID_PATTERN } from '../services/context/engine.js';
import type { InteractionStore } from '../services/store/types.js';
import { INTERACTION_KINDS, type InteractionKind } from '../types/index.js';
import { runTool } from './tool-runner.js';
import { toInteractionView } from './views.js';

export const GET_INTERACTION_HISTORY_TOOL = 'get_interaction_history';
export const DEFAULT_HISTORY_LIMIT = 20;
export const MAX_HISTORY_LIMIT = 200;

export const getInteractionHistoryInputShape = {
    session_id: z.string().regex(SESSION_ID_PATTERN).optional().describe('Only this session; omit for the most recent interactions overall'),
    kind: z.enum(INTERACTION_KINDS).optional().describe('Only interactions of this kind'),
    limit: z.number().int().min(1).max(MAX_HISTORY_LIMIT).optional().describe(`Maximum interactions (default ${DEFAULT_HISTORY_LIMIT})`)
};

export async function handleGetInteractionHistory(
    store: InteractionStore,
    args: { session_id?: string; kind?: InteractionKind; limit?: number }
): Promise<CallToolResult> {
    return runTool(GET_INTERACTION_HISTORY_TOOL, 'history', async () => {
        const interactions = await store.recent({
            limit: args.limit ?? DEFAULT_HISTORY_LIMIT,
            sessionId: args.session_id,
            kind: args.kind
        });
        return {
            output: {
                session_id: args.session_id ?? null,
                kind: args.kind ?? null,
                count: interactions.length,
                interactions: interactions.map(toInteractionView)
            },
            summary: `session=${args.session_id ?? '*'} kind=${args.kind ?? '*'} count=${interactions.length}`
        };
    });
}

export function registerGetInteractionHistoryTool(server: McpServer, store: InteractionStore): void {
    server.registerTool(
        GET_INTERACTION_HISTORY_TOOL,
        {
            title: 'Interaction history',
            description: 'List logged interactions in chronological order, for one session or across all sessions, optionally of one kind.',
            inputSchema: getInteractionHistoryInputShape
        },
        async (args) => handleGetInteractionHistory(store, args)
    );
}
