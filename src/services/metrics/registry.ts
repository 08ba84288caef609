import { Registry } from 'prom-client';
import { getBuildVersion } from '../../utils/build-version.js';
import { INSTANCE_ID } from '../../config.js';

/**
 * Prometheus metrics registry.
 *
 * All metrics are registered here and exposed via the /metrics endpoint.
 * Default labels are applied to every metric.
 */
export const register = new Registry();

register.setDefaultLabels({
  service: 'context-intelligence',
  version: getBuildVersion(),
  instance: INSTANCE_ID
});

