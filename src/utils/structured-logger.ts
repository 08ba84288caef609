/**
 * Structured HTTP access logging and the server-side logger.
 *
 * Pino is the source of truth: every record is structured JSON with
 * request correlation and timing, rendered as text when LOG_FORMAT=text.
 */

import { randomUUID } from 'node:crypto';
import type { Request, Response, NextFunction } from 'express';
import type pino from 'pino';
import { getBaseLogger } from './log-core.js';
import { NODE_ENV } from '../config.js';

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function getClientIp(req: Request): string {
  return req.socket?.remoteAddress || req.ip || 'unknown';
}

/**
 * Express middleware: one record when the request arrives, one when it finishes.
 */
export function httpLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  const requestId = headerValue(req, 'x-request-id') ?? `req-${randomUUID()}`;
  const base = getBaseLogger();

  base.debug({
    http: { method: req.method, path: req.url, protocol: `HTTP/${req.httpVersion}` },
    client: { ip: getClientIp(req) },
    request_id: requestId
  }, `${req.method} ${req.url}`);

  res.on('finish', () => {
    const record = {
      http: { method: req.method, path: req.url, protocol: `HTTP/${req.httpVersion}` },
      status: res.statusCode,
      response_time_ms: Date.now() - start,
      client: { ip: getClientIp(req) },
      user_agent: headerValue(req, 'user-agent') ?? null,
      request_id: requestId
    };
    const message = `${req.method} ${req.url} -> ${res.statusCode}`;
    if (res.statusCode >= 500) base.error(record, message);
    else if (res.statusCode >= 400) base.warn(record, message);
    else base.info(record, message);
  });

  next();
}

class StructuredLogger {
  debug(message: string): void {
    getBaseLogger().debug(message);
  }

  info(message: string): void {
    getBaseLogger().info({ category: 'info' }, message);
  }

  success(operation: string, details: string): void {
    getBaseLogger().info({ operation, details, category: 'success' }, `[${operation}] ${details}`);
  }

  warn(message: string): void {
    getBaseLogger().warn({ category: 'warning' }, message);
  }

  error(message: string, error?: unknown): void {
    const errorData: Record<string, unknown> = { category: 'error' };
    if (error !== undefined) {
      errorData['error'] = error instanceof Error
        ? { message: error.message, stack: NODE_ENV === 'development' ? error.stack : undefined }
        : error;
    }
    getBaseLogger().error(errorData, message);
  }

  /**
   * Log MCP request timeout errors
   */
  requestTimeout(operation: string, timeoutMs: number): void {
    getBaseLogger().error({
      operation,
      timeoutMs,
      category: 'timeout',
      note: 'Client did not receive response'
    }, `${operation} timed out after ${timeoutMs}ms`);
  }

  getPinoLogger(): pino.Logger {
    return getBaseLogger();
  }
}

export const structuredLogger = new StructuredLogger();
