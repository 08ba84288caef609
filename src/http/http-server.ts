import type { Server } from 'node:http';
import express from 'express';
import type { AppServices } from '../bootstrap.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { getBuildVersion } from '../utils/build-version.js';
import { PORT } from '../config.js';

// Import modular components
import { configureMiddleware } from './http-server-config.js';
import { setupHealthRoutes, type HealthRouteOptions } from './http-health-routes.js';
import { setupApiRoutes } from './http-api-routes.js';
import { setupMcpRoutes, type McpServerFactory } from './http-mcp-handler.js';
import { setupErrorHandlers } from './http-error-handlers.js';
import { startHttpServerWithErrorHandling } from './http-server-startup.js';

/**
 * Build the express app without listening, so tests can drive it with supertest.
 */
export function createHttpApp(services: AppServices, serverFactory: McpServerFactory, options: HealthRouteOptions = {}): express.Express {
    const app = express();

    configureMiddleware(app);
    setupHealthRoutes(app, services, options);
    setupApiRoutes(app, services);
    setupMcpRoutes(app, serverFactory);
    setupErrorHandlers(app);

    return app;
}

export function startHttpServer(services: AppServices, serverFactory: McpServerFactory, port: number = PORT): Server {
    structuredLogger.success('Context intelligence server starting', `version ${getBuildVersion()}`);
    structuredLogger.info('Port: ' + port);
    return startHttpServerWithErrorHandling(createHttpApp(services, serverFactory), port);
}
