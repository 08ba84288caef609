import { Counter, Gauge, Histogram } from 'prom-client';
import { register } from './registry.js';

/**
 * Embedding provider and embedding index metrics.
 */

export const embeddingRequests = new Counter({
  name: 'ctxi_embedding_requests_total',
  help: 'Total number of embedding provider requests',
  labelNames: ['provider', 'status'],
  registers: [register]
});

export const embeddingDuration = new Histogram({
  name: 'ctxi_embedding_duration_seconds',
  help: 'Embedding generation duration in seconds',
  labelNames: ['provider'],
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [register]
});

export const embeddingBatchSize = new Histogram({
  name: 'ctxi_embedding_batch_size',
  help: 'Number of texts per embedding request',
  buckets: [1, 2, 5, 10, 25, 50, 100, 200],
  registers: [register]
});

export const embeddingIndexSize = new Gauge({
  name: 'ctxi_embedding_index_size',
  help: 'Embedding records currently held by the index',
  registers: [register]
});

export const embeddingIndexEvictions = new Counter({
  name: 'ctxi_embedding_index_evictions_total',
  help: 'Embedding records evicted because the index was at capacity',
  registers: [register]
});

export const embeddingSearchMode = new Gauge({
  name: 'ctxi_embedding_search_mode',
  help: 'Active similarity search mode (1 for the active mode, 0 otherwise)',
  labelNames: ['mode'],
  registers: [register]
});
