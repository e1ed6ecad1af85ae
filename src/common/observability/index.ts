export {
  initObservability,
  type ObservabilityConfig,
  type ObservabilityHandle,
} from './init-observability';
export { ObservabilityModule } from './observability.module';
export { OBSERVABILITY_HANDLE } from './observability.tokens';
export { describeServiceResource, type ServiceResource } from './service-resource';
