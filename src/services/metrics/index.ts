/**
 * Metrics service.
 *
 * Metrics are organized by category:
 * - Context assembly (context-metrics.ts)
 * - Embedding provider and index (embedding-metrics.ts)
 * - MCP tools (mcp-metrics.ts)
 * - HTTP server (http-metrics.ts)
 */

export { register } from './registry.js';
export * from './context-metrics.js';
export * from './embedding-metrics.js';
export * from './mcp-metrics.js';
export * from './http-metrics.js';
