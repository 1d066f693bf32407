/**
 * Cumulative CPU ticks in the user, nice, system and idle states, as read from
 * the aggregate `cpu` line of `/proc/stat`.
 */
export type CpuSnapshot = readonly [user: number, nice: number, system: number, idle: number];

/**
 * Element-wise difference of two CPU snapshots. Fields are non-negative for a
 * live system whose counters have not wrapped or been reset.
 */
export type CpuDelta = readonly [user: number, nice: number, system: number, idle: number];

export interface DiskCounters {
  disk: string;
  sectorsRead: number;
  msReading: number;
  sectorsWritten: number;
  msWriting: number;
}

export interface IoRates {
  readKbps: number;
  writeKbps: number;
}

export interface MetricSample {
  cpuPercent: number;
  readKbps: number;
  writeKbps: number;
  timestamp: Date;
}

export interface SampleFailure {
  code: string;
  message: string;
  consecutiveFailures: number;
  timestamp: Date;
}

export type StopReason = 'completed' | 'aborted' | 'failed';

export interface MonitorSummary {
  ticks: number;
  failures: number;
  reason: StopReason;
}
