import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { ContextEngineError, errorMessage } from '../types/errors.js';
import { logger, type ToolOperation } from '../utils/logger.js';
import { mcpToolCalls, mcpToolDuration, mcpToolErrors, mcpToolOutputSize } from '../services/metrics/mcp-metrics.js';

export interface ToolOutcome {
    /** Returned as structuredContent and, serialized, as the text content */
    output: Record<string, unknown>;
    /** Text content to return instead of the serialized output */
    text?: string;
    /** One-line summary for the tool log */
    summary: string;
}

export function errorResult(code: string, message: string, details?: Record<string, unknown>): CallToolResult {
    const body = details ? { error: code, message, details } : { error: code, message };
    return {
        isError: true,
        content: [{ type: 'text', text: JSON.stringify(body) }]
    };
}

/**
 * Shared wrapper for tool handlers: metrics, the tool log line and the mapping
 * of engine errors to `isError` results.
 */
export async function runTool(
    toolName: string,
    operation: ToolOperation,
    handler: () => Promise<ToolOutcome>
): Promise<CallToolResult> {
    const timer = mcpToolDuration.startTimer({ tool: toolName });
    try {
        const outcome = await handler();
        const result: CallToolResult = {
            content: [{ type: 'text', text: outcome.text ?? JSON.stringify(outcome.output) }],
            structuredContent: outcome.output
        };
        mcpToolCalls.inc({ tool: toolName, status: 'success' });
        mcpToolOutputSize.observe({ tool: toolName }, JSON.stringify(result).length);
        timer({ status: 'success' });
        logger.tool(toolName, operation, outcome.summary);
        return result;
    } catch (error) {
        mcpToolCalls.inc({ tool: toolName, status: 'error' });
        timer({ status: 'error' });
        if (error instanceof ContextEngineError) {
            mcpToolErrors.inc({ tool: toolName, error_code: error.code });
            logger.warn(`[${toolName}] ${error.code}: ${error.message}`);
            return errorResult(error.code, error.message, error.details);
        }
        mcpToolErrors.inc({ tool: toolName, error_code: 'INTERNAL_ERROR' });
        logger.error(`[${toolName}] Unexpected failure`, error);
        return errorResult('INTERNAL_ERROR', errorMessage(error));
    }
}
