import express from 'express';
import { ZodError } from 'zod';
import { ContextEngineError } from '../types/errors.js';
import { structuredLogger } from '../utils/structured-logger.js';

export interface ErrorBody {
    error: string;
    message: string;
    details?: Record<string, unknown>;
}

/** Map a thrown value to a status code and JSON body */
export function toErrorResponse(err: unknown): { status: number; body: ErrorBody } {
    if (err instanceof ContextEngineError) {
        const body: ErrorBody = { error: err.code, message: err.message };
        if (err.details) body.details = err.details;
        return { status: err.statusCode, body };
    }
    if (err instanceof ZodError) {
        return {
            status: 400,
            body: {
                error: 'INPUT_ERROR',
                message: 'Request validation failed',
                details: { issues: err.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })) }
            }
        };
    }
    if (err instanceof SyntaxError) {
        return { status: 400, body: { error: 'INPUT_ERROR', message: 'Malformed JSON body' } };
    }
    return { status: 500, body: { error: 'INTERNAL_ERROR', message: 'Internal server error' } };
}

/**
 * Set up the error handler and the catch-all 404 (must be registered last)
 * @param app Express application instance
 */
export function setupErrorHandlers(app: express.Express): void {
    app.use((req: express.Request, res: express.Response) => {
        res.status(404).json({ error: 'NOT_FOUND', message: `No route for ${req.method} ${req.path}` });
    });

    // Express recognizes error handlers by arity, so `next` must stay in the signature.
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    app.use((err: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
        const { status, body } = toErrorResponse(err);
        const rid = req.headers['x-request-id'] ?? 'unknown';
        if (status >= 500) {
            structuredLogger.error(`HTTP error on ${req.method} ${req.url} [id: ${String(rid)}]`, err);
        } else {
            structuredLogger.warn(`HTTP ${status} on ${req.method} ${req.url}: ${body.message}`);
        }

        if (!res.headersSent) {
            res.status(status).json(body);
        } else {
            res.end();
        }
    });
}
