/**
 * Shared Pino-based logging core.
 * Single source of truth for LOG_LEVEL and LOG_FORMAT, used by both logger.ts
 * and structured-logger.ts so the JSON shape is identical.
 */

import pino from 'pino';
import type { Request, Response } from 'express';
import { Writable } from 'stream';
import { LOG_LEVEL, LOG_FORMAT } from '../config.js';

const REDACT_PATHS = [
  'req.headers.authorization',
  '*.password',
  '*.secret',
  '*.apiKey',
  'req.headers.cookie',
  'res.headers["set-cookie"]'
];

function readField(data: unknown, key: string): unknown {
  if (typeof data !== 'object' || data === null) return undefined;
  return Object.getOwnPropertyDescriptor(data, key)?.value;
}

function textFormatStream(): Writable {
  const out = process.stdout;
  return new Writable({
    write(chunk: Buffer, _enc, cb) {
      const line = chunk.toString();
      if (!line.trim()) {
        cb();
        return;
      }
      try {
        const data: unknown = JSON.parse(line);
        const rawTime = readField(data, 'time');
        const time = typeof rawTime === 'string' ? rawTime.slice(11, 19) : '00:00:00';
        const level = String(readField(data, 'level') ?? 'info').toUpperCase().padEnd(7);
        const msg = String(readField(data, 'msg') ?? '');
        out.write(`[${time}] [${level}] ${msg}\n`);
      } catch {
        out.write(line);
      }
      cb();
    }
  });
}

function createBaseLogger(): pino.Logger {
  const dest = LOG_FORMAT === 'text' ? textFormatStream() : process.stdout;

  return pino({
    level: LOG_LEVEL,
    // Text mode renders the level label itself, so keep it a string.
    formatters: { level: (label) => ({ level: label }) },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    serializers: {
      req(req: Request) {
        return {
          method: req.method,
          url: req.url,
          headers: {
            'user-agent': req.headers['user-agent'],
            'x-request-id': req.headers['x-request-id']
          }
        };
      },
      res(res: Response) {
        return { statusCode: res.statusCode };
      }
    }
  }, dest);
}

let baseLoggerInstance: pino.Logger | null = null;

/**
 * Returns the shared Pino logger. Creates it on first call.
 */
export function getBaseLogger(): pino.Logger {
  if (!baseLoggerInstance) {
    baseLoggerInstance = createBaseLogger();
  }
  return baseLoggerInstance;
}
