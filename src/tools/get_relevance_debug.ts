import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import type { ContextEngine } from '../services/context/engine.js';
import { runTool } from './tool-runner.js';
import { toRelevanceDebugView } from './views.js';

export const GET_RELEVANCE_DEBUG_TOOL = 'get_relevance_debug';

export const getRelevanceDebugInputShape = {
    message: z.string().min(1).describe('Message to classify and rank candidates for'),
    session_id: z.string().optional()
};

export async function handleGetRelevanceDebug(
    engine: ContextEngine,
    args: { message: string; session_id?: string }
): Promise<CallToolResult> {
    return runTool(GET_RELEVANCE_DEBUG_TOOL, 'debug', async () => {
        const result = await engine.getRelevanceDebug(args);
        return {
            output: toRelevanceDebugView(result),
            summary: `intent=${result.intent.primary_intent} candidates=${result.scores.length} semantic=${result.semantic_status}`
        };
    });
}

export function registerGetRelevanceDebugTool(server: McpServer, engine: ContextEngine): void {
    server.registerTool(
        GET_RELEVANCE_DEBUG_TOOL,
        {
            title: 'Explain relevance ranking',
            description: 'Show intent, topic branches, per-interaction score factors and semantic matches for a message. '
                + 'Read-only: does not add embeddings or change eviction order.',
            inputSchema: getRelevanceDebugInputShape
        },
        async (args) => handleGetRelevanceDebug(engine, args)
    );
}
