import { Counter, Gauge, Histogram } from 'prom-client';
import { register } from './registry.js';

/**
 * HTTP server metrics.
 */

export const httpRequests = new Counter({
  name: 'ctxi_http_requests_total',
  help: 'Total number of HTTP requests',
  labelNames: ['method', 'route', 'status'],
  registers: [register]
});

export const httpRequestDuration = new Histogram({
  name: 'ctxi_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [register]
});

export const httpActiveConnections = new Gauge({
  name: 'ctxi_http_active_connections',
  help: 'Current number of in-flight HTTP requests',
  registers: [register]
});
