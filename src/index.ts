/**
 * Context intelligence MCP server
 *
 * HTTP transport: MCP at POST /mcp, REST under /api, health and metrics.
 */

import { structuredLogger } from './utils/structured-logger.js';
import { installGlobalErrorHandlers } from './utils/global-error-handlers.js';
import { createServices } from './bootstrap.js';
import { createServer } from './server.js';
import { startHttpServer } from './http/http-server.js';

async function main(): Promise<void> {
    // Install once at startup to capture any background errors/warnings
    installGlobalErrorHandlers();

    const services = await createServices();
    const storeHealthy = await services.interactions.healthCheck();
    if (!storeHealthy) {
        structuredLogger.warn(`${services.interactions.kind} interaction store is not reachable yet; context requests will degrade until it is`);
    }

    const httpServer = startHttpServer(services, () => createServer(services));

    const shutdown = (signal: string): void => {
        structuredLogger.info(`${signal} received, shutting down`);
        httpServer.close();
        services.interactions.close().then(
            () => process.exit(0),
            (err: unknown) => {
                structuredLogger.error('Error while closing the interaction store', err);
                process.exit(1);
            }
        );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
    structuredLogger.error('Fatal error during startup', err);
    // Ensure non-zero exit so supervisors can detect failure
    process.exitCode = 1;
});
