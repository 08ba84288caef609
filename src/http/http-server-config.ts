import express from 'express';
import { httpLogger } from '../utils/structured-logger.js';
import { httpMetricsMiddleware } from './http-metrics-middleware.js';

export const JSON_BODY_LIMIT = '1mb';

/**
 * Configure Express application with middleware
 * @param app Express application instance
 */
export function configureMiddleware(app: express.Express): void {
    // Structured HTTP access logging middleware
    app.use(httpLogger);
    // HTTP metrics middleware for Prometheus
    app.use(httpMetricsMiddleware);
    app.use(express.json({ limit: JSON_BODY_LIMIT }));
}
