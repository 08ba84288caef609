import express from 'express';
import { httpActiveConnections, httpRequestDuration, httpRequests } from '../services/metrics/http-metrics.js';

/**
 * HTTP metrics middleware for Prometheus.
 * The route label is resolved at finish time so parameterized paths stay one series.
 */
export function httpMetricsMiddleware(req: express.Request, res: express.Response, next: express.NextFunction): void {
    const method = req.method;
    httpActiveConnections.inc();
    const timer = httpRequestDuration.startTimer({ method });

    res.on('finish', () => {
        const routePath: unknown = req.route?.path;
        const route = typeof routePath === 'string' ? `${req.baseUrl}${routePath}` : 'unmatched';
        const status = res.statusCode.toString();
        httpRequests.inc({ method, route, status });
        timer({ route, status });
        httpActiveConnections.dec();
    });

    next();
}
