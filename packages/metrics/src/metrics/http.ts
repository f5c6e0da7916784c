import type { RegistryMetricCreator } from '../utils/registry-metric-creator'

export type HttpMetrics = ReturnType<typeof createHttpMetrics>

/**
 * Create HTTP query metrics
 */
export function createHttpMetrics(register: RegistryMetricCreator) {
  return {
    requestsTotal: register.counter<'route' | 'status'>({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['route', 'status'],
    }),
    requestDuration: register.histogram<'route'>({
      name: 'http_request_duration_seconds',
      help: 'HTTP request duration',
      labelNames: ['route'],
      buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1, 0.5],
    }),
  }
}
