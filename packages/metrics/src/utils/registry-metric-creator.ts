import {
  Counter,
  type CounterConfiguration,
  Gauge,
  type GaugeConfiguration,
  Histogram,
  type HistogramConfiguration,
  Registry,
} from 'prom-client'

type MetricConfig<C> = Omit<C, 'registers'>

/**
 * Registry that creates its own metrics, prefixing every name.
 */
export class RegistryMetricCreator extends Registry {
  constructor(readonly prefix = '') {
    super()
  }

  private name(name: string): string {
    return this.prefix === '' ? name : `${this.prefix}_${name}`
  }

  gauge<T extends string = string>(config: MetricConfig<GaugeConfiguration<T>>): Gauge<T> {
    return new Gauge<T>({ ...config, name: this.name(config.name), registers: [this] })
  }

  counter<T extends string = string>(
    config: MetricConfig<CounterConfiguration<T>>,
  ): Counter<T> {
    return new Counter<T>({ ...config, name: this.name(config.name), registers: [this] })
  }

  histogram<T extends string = string>(
    config: MetricConfig<HistogramConfiguration<T>>,
  ): Histogram<T> {
    return new Histogram<T>({ ...config, name: this.name(config.name), registers: [this] })
  }

  /**
   * Constant gauge carrying its information in labels, set to 1.
   */
  static(config: { name: string; help: string; value: Record<string, string> }): void {
    this.gauge({
      name: config.name,
      help: config.help,
      labelNames: Object.keys(config.value),
    }).set(config.value, 1)
  }
}
