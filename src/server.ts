import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AppServices } from './bootstrap.js';
import { getBuildVersion } from './utils/build-version.js';
import { structuredLogger } from './utils/structured-logger.js';
import { registerGetContextTool } from './tools/get_context.js';
import { registerGetRelevanceDebugTool } from './tools/get_relevance_debug.js';
import { registerGetInteractionHistoryTool } from './tools/get_interaction_history.js';
import { registerGetConversationSummaryTool } from './tools/get_conversation_summary.js';
import { registerLogInteractionTool } from './tools/log_interaction.js';
import { registerUserPreferenceTools } from './tools/user_preferences.js';

// Create and configure the MCP server
export function createServer(services: AppServices): McpServer {
    const server = new McpServer(
        {
            name: 'context-intelligence',
            version: getBuildVersion()
        },
        {
            capabilities: {
                tools: {}
            }
        }
    );

    registerGetContextTool(server, services.engine);
    registerGetRelevanceDebugTool(server, services.engine);
    registerGetInteractionHistoryTool(server, services.interactions);
    registerGetConversationSummaryTool(server, services.interactions);
    registerLogInteractionTool(server, services.interactions);
    registerUserPreferenceTools(server, services.preferences);

    structuredLogger.debug('MCP server created and configured');
    return server;
}
