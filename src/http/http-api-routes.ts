import express from 'express';
import { z } from 'zod';
import type { AppServices } from '../bootstrap.js';
import { summarizeConversation } from '../services/context/summary.js';
import { SESSION_ID_PATTERN } from '../services/context/engine.js';
import { InputError } from '../types/errors.js';
import { INTERACTION_KINDS } from '../types/index.js';
import { getContextInputShape } from '../tools/get_context.js';
import { getRelevanceDebugInputShape } from '../tools/get_relevance_debug.js';
import { DEFAULT_HISTORY_LIMIT, MAX_HISTORY_LIMIT } from '../tools/get_interaction_history.js';
import { logInteractionInputShape, recordInteraction } from '../tools/log_interaction.js';
import { toInteractionView, toRelevanceDebugView, toSummaryView } from '../tools/views.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { asyncRoute } from './async-route.js';

const contextBody = z.object(getContextInputShape);
const relevanceDebugBody = z.object(getRelevanceDebugInputShape);
const interactionBody = z.object(logInteractionInputShape);
const historyQuery = z.object({
    session_id: z.string().regex(SESSION_ID_PATTERN).optional(),
    kind: z.enum(INTERACTION_KINDS).optional(),
    limit: z.coerce.number().int().min(1).max(MAX_HISTORY_LIMIT).optional()
});

const SUMMARY_WINDOW = 200;

/**
 * Set up the REST API over the engine and the stores
 * @param app Express application instance
 * @param services Engine services
 */
export function setupApiRoutes(app: express.Express, services: AppServices): void {
    app.post('/api/context', asyncRoute(async (req, res) => {
        const startTime = Date.now();
        const body = contextBody.parse(req.body);
        const result = await services.engine.getContext(body);
        structuredLogger.debug(`POST /api/context intent=${result.payload.metadata.primary_intent} entries=${result.payload.entries.length}`);
        res.status(200).json({ ...result, duration_ms: Date.now() - startTime });
    }));

    app.post('/api/relevance-debug', asyncRoute(async (req, res) => {
        const body = relevanceDebugBody.parse(req.body);
        const result = await services.engine.getRelevanceDebug(body);
        res.status(200).json(toRelevanceDebugView(result));
    }));

    app.get('/api/interactions', asyncRoute(async (req, res) => {
        const query = historyQuery.parse(req.query);
        const interactions = await services.interactions.recent({
            limit: query.limit ?? DEFAULT_HISTORY_LIMIT,
            sessionId: query.session_id,
            kind: query.kind
        });
        res.status(200).json({
            session_id: query.session_id ?? null,
            kind: query.kind ?? null,
            count: interactions.length,
            interactions: interactions.map(toInteractionView)
        });
    }));

    app.post('/api/interactions', asyncRoute(async (req, res) => {
        const body = interactionBody.parse(req.body);
        const stored = await recordInteraction(services.interactions, body);
        res.status(201).json({ interaction: toInteractionView(stored) });
    }));

    app.get('/api/sessions/:id/summary', asyncRoute(async (req, res) => {
        const sessionId = req.params['id'] ?? '';
        if (!SESSION_ID_PATTERN.test(sessionId)) {
            throw new InputError('session id must match ^[A-Za-z0-9._:-]{1,128}$');
        }
        const interactions = await services.interactions.bySession(sessionId, SUMMARY_WINDOW);
        res.status(200).json(toSummaryView(summarizeConversation(interactions, sessionId)));
    }));
}
