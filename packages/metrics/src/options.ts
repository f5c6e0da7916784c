export type Metadata = {
  /** Version string, e.g., "v1.0.0" */
  version: string
  /** Network the block files belong to */
  network: string
}

export type MetricsOptions = {
  enabled?: boolean
  /** Optional metadata exposed as a constant info metric */
  metadata?: Metadata
  /** Prefix for metric names */
  prefix?: string
  /** Whether to collect default Node.js metrics */
  collectDefaultMetrics?: boolean
}

export const defaultMetricsOptions = {
  enabled: true,
  prefix: 'blockquery',
  collectDefaultMetrics: true,
} satisfies MetricsOptions
