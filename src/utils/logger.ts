/**
 * Module-facing logger.
 *
 * Engine components log through this singleton with a `[ComponentName]` prefix
 * in the message; records land on the shared Pino instance from log-core.ts.
 *
 * Format control:
 * - LOG_FORMAT=text (default): human-readable single line
 * - LOG_FORMAT=json: structured JSON for log aggregation
 */

import { getBaseLogger } from './log-core.js';
import { NODE_ENV } from '../config.js';

export type ToolOperation = 'assemble' | 'debug' | 'history' | 'summary' | 'record' | 'preference';

function describeError(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
        return {
            message: error.message,
            name: error.name,
            stack: NODE_ENV === 'development' ? error.stack : undefined
        };
    }
    return { message: String(error) };
}

class Logger {
    /**
     * Log debug messages (emitted only when LOG_LEVEL=debug)
     */
    debug(message: string): void {
        getBaseLogger().debug(message);
    }

    info(message: string): void {
        getBaseLogger().info(message);
    }

    warn(message: string, details?: Record<string, unknown>): void {
        if (details) {
            getBaseLogger().warn(details, message);
        } else {
            getBaseLogger().warn(message);
        }
    }

    /**
     * Log error messages with the error's message and, in development, its stack
     */
    error(message: string, error?: unknown): void {
        if (error === undefined) {
            getBaseLogger().error(message);
            return;
        }
        getBaseLogger().error({ error: describeError(error) }, message);
    }

    /**
     * Concise one-line record of a tool operation
     */
    tool(toolName: string, operation: ToolOperation, details: string): void {
        getBaseLogger().info(
            { tool: toolName, operation: operation.toUpperCase(), details },
            `[${toolName}] ${operation.toUpperCase()} ${details}`
        );
    }
}

export const logger = new Logger();
