import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { summarizeConversation } from '../services/context/summary.js';
import type { InteractionStore } from '../services/store/types.js';
import { runTool } from './tool-runner.js';
import { toSummaryView } from './views.js';

export const GET_CONVERSATION_SUMMARY_TOOL = 'get_conversation_summary';
const SUMMARY_WINDOW = 200;

export const getConversationSummaryInputShape = {
    session_id: z.string().min(1).optional().describe('Session to summarize; omit for recent activity overall')
};

export async function handleGetConversationSummary(
    store: InteractionStore,
    args: { session_id?: string }
): Promise<CallToolResult> {
    return runTool(GET_CONVERSATION_SUMMARY_TOOL, 'summary', async () => {
        const sessionId = args.session_id ?? null;
        const interactions = sessionId
            ? await store.bySession(sessionId, SUMMARY_WINDOW)
            : await store.recent({ limit: SUMMARY_WINDOW });
        const summary = summarizeConversation(interactions, sessionId);
        return {
            output: toSummaryView(summary),
            text: summary.text,
            summary: `session=${sessionId ?? '*'} total=${summary.total}`
        };
    });
}

export function registerGetConversationSummaryTool(server: McpServer, store: InteractionStore): void {
    server.registerTool(
        GET_CONVERSATION_SUMMARY_TOOL,
        {
            title: 'Conversation summary',
            description: 'Counts per kind and status, time span, top topics and the latest actions of a conversation.',
            inputSchema: getConversationSummaryInputShape
        },
        async (args) => handleGetConversationSummary(store, args)
    );
}
