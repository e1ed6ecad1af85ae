import type { ServiceResource } from '../observability/service-resource';
import { renderHostMetrics, sampleHost, type HostSample } from './host-metrics';

export interface PrometheusRenderer {
  renderPrometheus(): string;
}

/**
 * One per service process. Host metrics are always rendered; service modules
 * register their own collectors on init.
 */
export class MetricsRegistry {
  private readonly renderers: PrometheusRenderer[] = [];

  constructor(
    private readonly resource: ServiceResource,
    private readonly sample: () => HostSample = sampleHost,
  ) {}

  register(renderer: PrometheusRenderer): void {
    if (!this.renderers.includes(renderer)) {
      this.renderers.push(renderer);
    }
  }

  render(): string {
    return [
      renderHostMetrics(this.resource, this.sample()),
      ...this.renderers.map((renderer) => renderer.renderPrometheus()),
    ].join('');
  }
}
