import { DivideByZeroError, KB_DIVISOR, MS_PER_SECOND, SECTOR_SIZE } from '@resmon/shared';
import type { CpuDelta, DiskCounters, IoRates, ZeroRatePolicy } from '@resmon/shared';

/**
 * Busy percentage over a CPU delta: everything that was not idle.
 */
export function cpuBusyPercent(d: CpuDelta, policy: ZeroRatePolicy = 'error'): number {
  const total = d.reduce((sum, ticks) => sum + ticks, 0);
  if (total === 0) {
    if (policy === 'zero') return 0;
    throw new DivideByZeroError('total CPU ticks');
  }
  const idle = d[3];
  return 100 - (idle * 100) / total;
}

export function sectorsToKb(sectors: number): number {
  return (sectors * SECTOR_SIZE) / KB_DIVISOR;
}

function kbPerSecond(
  sectors: number,
  ms: number,
  quantity: string,
  policy: ZeroRatePolicy,
): number {
  if (ms === 0) {
    if (policy === 'zero') return 0;
    throw new DivideByZeroError(quantity);
  }
  return sectorsToKb(sectors) / (ms / MS_PER_SECOND);
}

/**
 * Throughput over the time the disk spent on each direction of I/O.
 *
 * Works on either a single snapshot (cumulative counters since boot) or on
 * the delta of two snapshots.
 */
export function ioRates(counters: DiskCounters, policy: ZeroRatePolicy = 'error'): IoRates {
  return {
    readKbps: kbPerSecond(counters.sectorsRead, counters.msReading, 'milliseconds reading', policy),
    writeKbps: kbPerSecond(
      counters.sectorsWritten,
      counters.msWriting,
      'milliseconds writing',
      policy,
    ),
  };
}
