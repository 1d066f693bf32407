/**
 * How disk throughput is derived from two snapshots.
 *
 * - `delta-then-rate`: subtract the raw sector and millisecond counters, then
 *   compute one rate from the difference.
 * - `rate-then-delta`: compute a rate from each snapshot on its own, then
 *   subtract the two rates. Matches the output of older resmon releases.
 */
export type IoMode = 'delta-then-rate' | 'rate-then-delta';

/** What a rate derivation does when its divisor is zero. */
export type ZeroRatePolicy = 'error' | 'zero';

export interface MonitorConfig {
  /** Seconds between the two snapshots of one tick. */
  sampleInterval: number;
  /** Seconds to keep reporting. `null` runs until aborted. */
  runTime: number | null;
  /** Seconds to pause between reporting ticks. */
  tickDelay: number;
  disks: readonly string[];
  ioMode: IoMode;
  concurrent: boolean;
  zeroRatePolicy: ZeroRatePolicy;
  maxConsecutiveFailures: number;
  cpuStatPath: string;
  diskStatsPath: string;
}
