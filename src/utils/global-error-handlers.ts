/**
 * Global process-level error handlers.
 * Captures uncaught exceptions, unhandled rejections and Node warnings
 * and forwards them to the structured logger.
 */

import { structuredLogger } from './structured-logger.js';

let installed = false;

export function installGlobalErrorHandlers(): void {
  if (installed) return;
  installed = true;

  process.on('uncaughtException', (err: unknown) => {
    structuredLogger.error('Uncaught exception', err instanceof Error ? err : new Error(String(err)));
    // Leave the exit decision to the supervisor; mark non-zero.
    process.exitCode = 1;
  });

  process.on('unhandledRejection', (reason: unknown) => {
    const err = reason instanceof Error ? reason : new Error(String(reason));
    structuredLogger.error('Unhandled promise rejection', err);
  });

  process.on('rejectionHandled', () => {
    structuredLogger.warn('Promise rejection handled asynchronously');
  });

  process.on('warning', (warning) => {
    structuredLogger.warn(`Node warning: ${warning.name} - ${warning.message}`);
  });
}
