// Counter sources
export { ProcCounterSource, readCounterFile } from './counters/CounterSource.js';
export type { CounterSource, ProcCounterSourceOptions } from './counters/CounterSource.js';
export { parseCpuSnapshot, parseCounter } from './counters/cpuStat.js';
export { parseDiskCounters } from './counters/diskStats.js';

// Metrics
export { delta, cpuDelta, diskDelta, assertSameDisk } from './metrics/delta.js';
export { cpuBusyPercent, ioRates, sectorsToKb } from './metrics/rates.js';

// Sampling
export { Sampler, sleep } from './sampling/Sampler.js';
export type { SamplerOptions, Sleep } from './sampling/Sampler.js';

// Run loop
export { ResourceMonitor, isAbortError } from './monitor/ResourceMonitor.js';
export type { ResourceMonitorOptions } from './monitor/ResourceMonitor.js';
export { createResourceMonitor } from './monitor/createResourceMonitor.js';

// Events
export { EventBus } from './events/EventBus.js';
export type { EventName } from './events/EventBus.js';
