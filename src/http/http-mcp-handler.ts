import crypto from 'node:crypto';
import express from 'express';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { structuredLogger } from '../utils/structured-logger.js';
import { LOG_LEVEL } from '../config.js';

interface McpSession {
    transport: StreamableHTTPServerTransport;
    server: McpServer;
    createdAt: number;
}

export type McpServerFactory = () => McpServer;

const SLOW_REQUEST_MS = 25000;

function describeBody(body: unknown): { id: string; method: string; toolName: string } {
    const record: Record<string, unknown> = typeof body === 'object' && body !== null ? { ...body } : {};
    const params: Record<string, unknown> = typeof record['params'] === 'object' && record['params'] !== null ? { ...record['params'] } : {};
    const id = record['id'];
    return {
        id: typeof id === 'string' || typeof id === 'number' ? String(id) : 'unknown',
        method: typeof record['method'] === 'string' ? record['method'] : 'unknown',
        toolName: typeof params['name'] === 'string' ? params['name'] : 'unknown'
    };
}

function sessionHeader(req: express.Request): string | undefined {
    const value = req.headers['mcp-session-id'];
    return Array.isArray(value) ? value[0] : value;
}

/**
 * Set up MCP endpoint handling using stateful sessions.
 *
 * Each MCP client session gets its own McpServer + Transport pair.
 * The SDK enforces one-transport-per-server; stateful sessions let
 * multiple clients coexist without "already connected" errors.
 */
export function setupMcpRoutes(app: express.Express, serverFactory: McpServerFactory): void {
    const sessions = new Map<string, McpSession>();

    async function createSession(): Promise<McpSession> {
        const server = serverFactory();
        const transport: StreamableHTTPServerTransport = new StreamableHTTPServerTransport({
            sessionIdGenerator: () => crypto.randomUUID(),
            enableJsonResponse: true,
            onsessioninitialized: (sessionId: string) => {
                sessions.set(sessionId, session);
                structuredLogger.info(`MCP session registered: ${sessionId} (active: ${sessions.size})`);
            }
        });
        const session: McpSession = { transport, server, createdAt: Date.now() };

        transport.onclose = () => {
            const sid = transport.sessionId;
            if (sid && sessions.delete(sid)) {
                structuredLogger.info(`MCP session removed: ${sid} (active: ${sessions.size})`);
            }
        };

        // Connect server ↔ transport (one-to-one, never reconnected)
        await server.connect(transport);
        return session;
    }

    app.post('/mcp', (req, res, next) => {
        const requestStart = Date.now();
        const { id: requestId, method, toolName } = describeBody(req.body);
        const label = `${method}${toolName !== 'unknown' ? ` (${toolName})` : ''} [id: ${requestId}]`;

        if (LOG_LEVEL === 'debug' || method !== 'notifications/cancelled') {
            structuredLogger.info(`→ MCP ${label}`);
        }

        const handle = async (): Promise<void> => {
            const sessionId = sessionHeader(req);
            let session: McpSession | undefined;

            if (method === 'initialize') {
                session = await createSession();
            } else if (sessionId) {
                session = sessions.get(sessionId);
            }

            if (!session) {
                const code = sessionId ? 404 : 400;
                const msg = sessionId ? 'Session not found' : 'Bad Request: Mcp-Session-Id header is required';
                res.status(code).json({
                    jsonrpc: '2.0',
                    error: { code: -32000, message: msg },
                    id: requestId === 'unknown' ? null : requestId
                });
                return;
            }

            const timeoutHandler = setTimeout(() => {
                structuredLogger.requestTimeout(label, Date.now() - requestStart);
            }, SLOW_REQUEST_MS);
            res.on('close', () => clearTimeout(timeoutHandler));

            try {
                await session.transport.handleRequest(req, res, req.body);
            } finally {
                clearTimeout(timeoutHandler);
            }

            if (LOG_LEVEL === 'debug') {
                structuredLogger.info(`✓ Completed ${Date.now() - requestStart}ms [id: ${requestId}]`);
            }
        };

        handle().catch((error: unknown) => {
            structuredLogger.error(`✗ MCP error: ${label} after ${Date.now() - requestStart}ms`, error);
            if (!res.headersSent) {
                res.status(500).json({
                    jsonrpc: '2.0',
                    error: { code: -32603, message: 'Internal server error' },
                    id: requestId === 'unknown' ? null : requestId
                });
                return;
            }
            next(error);
        });
    });

    app.get('/mcp', (req, res, next) => {
        const sessionId = sessionHeader(req);
        const session = sessionId ? sessions.get(sessionId) : undefined;
        if (!session) {
            res.status(400).json({
                jsonrpc: '2.0',
                error: { code: -32000, message: 'Bad Request: valid Mcp-Session-Id header is required for GET SSE' },
                id: null
            });
            return;
        }
        session.transport.handleRequest(req, res).catch(next);
    });

    app.delete('/mcp', (req, res, next) => {
        const sessionId = sessionHeader(req);
        const session = sessionId ? sessions.get(sessionId) : undefined;
        if (!sessionId || !session) {
            res.status(404).json({
                jsonrpc: '2.0',
                error: { code: -32001, message: 'Session not found' },
                id: null
            });
            return;
        }
        const close = async (): Promise<void> => {
            await session.transport.close();
            await session.server.close();
            sessions.delete(sessionId);
            structuredLogger.info(`MCP session closed: ${sessionId}`);
            res.status(200).end();
        };
        close().catch(next);
    });
}
