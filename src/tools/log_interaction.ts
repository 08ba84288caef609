import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { InputError } from '../types/errors.js';
import { INTERACTION_KINDS, INTERACTION_STATUSES, type Interaction, type InteractionKind, type InteractionStatus } from '../types/index.js';
import { SESSION_ID_PATTERN } from '../services/context/engine.js';
import type { InteractionStore } from '../services/store/types.js';
import { runTool } from './tool-runner.js';
import { toInteractionView } from './views.js';

export const LOG_INTERACTION_TOOL = 'log_interaction';

export const logInteractionInputShape = {
    kind: z.enum(INTERACTION_KINDS),
    text_in: z.string().optional(),
    text_out: z.string().optional(),
    session_id: z.string().optional(),
    user_id: z.string().optional(),
    status: z.enum(INTERACTION_STATUSES).optional().describe('Defaults to success'),
    metadata: z.record(z.unknown()).optional()
};

export interface LogInteractionArgs {
    kind: InteractionKind;
    text_in?: string;
    text_out?: string;
    session_id?: string;
    user_id?: string;
    status?: InteractionStatus;
    metadata?: Record<string, unknown>;
}

/** Validate and append; shared by the tool and the REST route */
export async function recordInteraction(store: InteractionStore, args: LogInteractionArgs): Promise<Interaction> {
    if (args.session_id !== undefined && !SESSION_ID_PATTERN.test(args.session_id)) {
        throw new InputError('session_id must match ^[A-Za-z0-9._:-]{1,128}$');
    }
    if (!args.text_in && !args.text_out) {
        throw new InputError('text_in or text_out is required');
    }
    return store.append({
        kind: args.kind,
        text_in: args.text_in ?? null,
        text_out: args.text_out ?? null,
        session_id: args.session_id ?? null,
        user_id: args.user_id ?? null,
        status: args.status ?? 'success',
        metadata: args.metadata ?? {}
    });
}

export async function handleLogInteraction(store: InteractionStore, args: LogInteractionArgs): Promise<CallToolResult> {
    return runTool(LOG_INTERACTION_TOOL, 'record', async () => {
        const stored = await recordInteraction(store, args);
        return {
            output: { interaction: toInteractionView(stored) },
            summary: `id=${stored.id} kind=${stored.kind} session=${stored.session_id ?? '-'}`
        };
    });
}

export function registerLogInteractionTool(server: McpServer, store: InteractionStore): void {
    server.registerTool(
        LOG_INTERACTION_TOOL,
        {
            title: 'Log an interaction',
            description: 'Append a request, response or conversation turn to the interaction log so later context requests can use it.',
            inputSchema: logInteractionInputShape
        },
        async (args) => handleLogInteraction(store, args)
    );
}
