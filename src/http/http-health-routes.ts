import express from 'express';
import type { AppServices } from '../bootstrap.js';
import { register } from '../services/metrics/registry.js';
import { getBuildVersion } from '../utils/build-version.js';
import { HEALTH_CHECK_TIMEOUT_MS, METRICS_ENABLED } from '../config.js';
import { errorMessage } from '../types/errors.js';
import { asyncRoute } from './async-route.js';

interface CheckResult {
    healthy: boolean;
    message: string;
}

/** Resolve the check or report a timeout, whichever comes first */
async function withTimeout(check: Promise<CheckResult>, timeoutMs: number, label: string): Promise<CheckResult> {
    let timeoutId: NodeJS.Timeout | undefined;
    const timeout = new Promise<CheckResult>(resolve => {
        timeoutId = setTimeout(() => resolve({ healthy: false, message: `${label} health check timed out` }), timeoutMs);
    });
    try {
        return await Promise.race([
            check.catch((err: unknown) => ({ healthy: false, message: `${label} health check failed: ${errorMessage(err)}` })),
            timeout
        ]);
    } finally {
        clearTimeout(timeoutId);
    }
}

export interface HealthRouteOptions {
    timeoutMs?: number;
    metricsEnabled?: boolean;
}

/**
 * Set up health check, metrics and basic info routes
 * @param app Express application instance
 * @param services Engine services to check
 */
export function setupHealthRoutes(app: express.Express, services: AppServices, options: HealthRouteOptions = {}): void {
    const timeoutMs = options.timeoutMs ?? HEALTH_CHECK_TIMEOUT_MS;
    const metricsEnabled = options.metricsEnabled ?? METRICS_ENABLED;

    app.get('/health', asyncRoute(async (req, res) => {
        const storeCheck = services.interactions.healthCheck()
            .then(ok => ({ healthy: ok, message: ok ? `${services.interactions.kind} store reachable` : `${services.interactions.kind} store unreachable` }));
        const embeddingCheck: Promise<CheckResult> = services.embedding
            ? services.embedding.healthCheck(timeoutMs)
            : Promise.resolve({ healthy: true, message: 'Semantic narrowing disabled (lexical only)' });

        const [store, embedding] = await Promise.all([
            withTimeout(storeCheck, timeoutMs, 'Store'),
            withTimeout(embeddingCheck, timeoutMs, 'Embedding')
        ]);

        // The engine answers without embeddings, so only the store is critical.
        const status = store.healthy ? (embedding.healthy ? 'healthy' : 'degraded') : 'unhealthy';

        res.status(store.healthy ? 200 : 503).json({
            status,
            service: 'context-intelligence',
            version: getBuildVersion(),
            uptime: Math.floor(process.uptime()),
            dependencies: {
                store: store.healthy ? 'healthy' : 'unhealthy',
                embedding: embedding.healthy ? 'healthy' : 'unhealthy'
            },
            details: {
                store: store.message,
                embedding: embedding.message,
                semantic: services.engine.semanticKind,
                search_mode: services.index?.searchMode ?? 'brute_force',
                index_size: services.index?.size ?? 0,
                provider: services.embedding?.getConfig().provider ?? 'none'
            }
        });
    }));

    app.get('/metrics', asyncRoute(async (req, res) => {
        if (!metricsEnabled) {
            res.status(404).json({ error: 'NOT_FOUND', message: 'Metrics are disabled' });
            return;
        }
        res.set('Content-Type', register.contentType);
        res.send(await register.metrics());
    }));

    app.get('/', (req, res) => {
        res.json({
            service: 'context-intelligence',
            version: getBuildVersion(),
            endpoints: {
                health: 'GET /health',
                metrics: 'GET /metrics',
                mcp: 'POST /mcp',
                context: 'POST /api/context',
                relevance_debug: 'POST /api/relevance-debug',
                interactions: 'GET|POST /api/interactions',
                session_summary: 'GET /api/sessions/:id/summary'
            }
        });
    });
}
