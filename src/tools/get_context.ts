import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { CONTEXT_CATEGORIES, type ContextCategory } from '../types/index.js';
import type { ContextEngine } from '../services/context/engine.js';
import { runTool } from './tool-runner.js';

export const GET_CONTEXT_TOOL = 'get_context';

export const getContextInputShape = {
    message: z.string().min(1).describe('The new user message that needs context'),
    budget_chars: z.number().int().positive().describe('Maximum characters of assembled context entries'),
    session_id: z.string().optional().describe('Session of the caller; its interactions rank higher'),
    user_id: z.string().optional().describe('User whose stored preferences may be included'),
    categories: z.array(z.enum(CONTEXT_CATEGORIES)).optional()
        .describe('Override the categories chosen by intent classification')
};

export interface GetContextArgs {
    message: string;
    budget_chars: number;
    session_id?: string;
    user_id?: string;
    categories?: ContextCategory[];
}

export async function handleGetContext(engine: ContextEngine, args: GetContextArgs): Promise<CallToolResult> {
    return runTool(GET_CONTEXT_TOOL, 'assemble', async () => {
        const result = await engine.getContext(args);
        const { metadata } = result.payload;
        return {
            output: { prompt: result.prompt, payload: result.payload },
            text: result.prompt,
            summary: `intent=${metadata.primary_intent} entries=${result.payload.entries.length} used=${metadata.used_chars}/${metadata.budget_chars}`
        };
    });
}

export function registerGetContextTool(server: McpServer, engine: ContextEngine): void {
    server.registerTool(
        GET_CONTEXT_TOOL,
        {
            title: 'Get context for a message',
            description: 'Assemble the most relevant prior interactions, project facts and preferences for a new message, '
                + 'bounded by budget_chars, and return the rendered prompt with the structured payload.',
            inputSchema: getContextInputShape
        },
        async (args) => handleGetContext(engine, args)
    );
}
