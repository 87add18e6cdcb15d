export { MetricRegistry } from './MetricRegistry.js';
export type {
  CounterHandle,
  HistogramHandle,
  InstrumentSet,
  HttpInstrumentSet,
  MetricSnapshot,
  MetricRegistryOptions,
} from './MetricRegistry.js';

export { MetricReader, PushgatewaySink } from './MetricReader.js';
export type { MetricExportSink, MetricReaderOptions } from './MetricReader.js';
