// Metrics module exports
export {
  MetricsEmitter,
  logMetricsSink,
  noopMetrics,
  type MetricsEmitterOptions,
  type MetricsEvent,
  type MetricsEventType,
  type MetricsPayload,
  type MetricsRecorder,
  type MetricsSink,
} from './metricsEmitter.js';
