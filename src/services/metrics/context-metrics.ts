import { Counter, Histogram } from 'prom-client';
import { register } from './registry.js';

/**
 * Context assembly metrics: request outcomes, latency, payload size and how
 * often semantic narrowing actually ran.
 */

export const contextRequests = new Counter({
  name: 'ctxi_context_requests_total',
  help: 'Total number of context requests by primary intent and outcome',
  labelNames: ['intent', 'status'],
  registers: [register]
});

export const contextAssemblyDuration = new Histogram({
  name: 'ctxi_context_assembly_duration_seconds',
  help: 'End-to-end context gathering duration in seconds',
  labelNames: ['operation'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5],
  registers: [register]
});

export const contextPayloadChars = new Histogram({
  name: 'ctxi_context_payload_chars',
  help: 'Characters used by assembled context payloads',
  buckets: [0, 250, 500, 1000, 2000, 4000, 8000, 16000, 32000],
  registers: [register]
});

export const semanticStatusTotal = new Counter({
  name: 'ctxi_semantic_status_total',
  help: 'Semantic narrowing outcome per request',
  labelNames: ['status'],
  registers: [register]
});

export const recordDegradations = new Counter({
  name: 'ctxi_record_degradations_total',
  help: 'Individual interaction records skipped or degraded during assembly',
  labelNames: ['reason'],
  registers: [register]
});
