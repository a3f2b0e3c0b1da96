export { MetricsClient } from './metrics';
export type { MetricQuery } from './metrics';
export { Scanner } from './scanner';
export type { MetricsFactory, ScanFailure, ScanResult, ScannerOptions } from './scanner';
export { REGIONAL_COLLECTORS, collectBuckets } from './collectors';
export type { Collector, CollectorContext } from './types';
