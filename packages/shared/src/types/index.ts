export type {
  CpuSnapshot,
  CpuDelta,
  DiskCounters,
  IoRates,
  MetricSample,
  SampleFailure,
  StopReason,
  MonitorSummary,
} from './metrics.js';

export type { MonitorConfig, IoMode, ZeroRatePolicy } from './config.js';

export type { EventBusMessage } from './events.js';
