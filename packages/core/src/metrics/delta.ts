import { DiskMismatchError, ShapeMismatchError } from '@resmon/shared';
import type { CpuDelta, CpuSnapshot, DiskCounters } from '@resmon/shared';

/**
 * Element-wise `b[i] - a[i]`. Negative results (counter wraparound or reset)
 * are passed through unchanged.
 */
export function delta(a: readonly number[], b: readonly number[]): number[] {
  if (a.length !== b.length) {
    throw new ShapeMismatchError(a.length, b.length);
  }
  return b.map((value, i) => value - a[i]);
}

export function cpuDelta(first: CpuSnapshot, second: CpuSnapshot): CpuDelta {
  const [user, nice, system, idle] = delta(first, second);
  return [user, nice, system, idle];
}

/**
 * Both snapshots must describe the same disk. With several allowed disks the
 * last matching row can differ between reads.
 */
export function assertSameDisk(first: DiskCounters, second: DiskCounters): void {
  if (first.disk !== second.disk) {
    throw new DiskMismatchError(first.disk, second.disk);
  }
}

export function diskDelta(first: DiskCounters, second: DiskCounters): DiskCounters {
  assertSameDisk(first, second);
  const [sectorsRead, msReading, sectorsWritten, msWriting] = delta(
    [first.sectorsRead, first.msReading, first.sectorsWritten, first.msWriting],
    [second.sectorsRead, second.msReading, second.sectorsWritten, second.msWriting],
  );
  return { disk: first.disk, sectorsRead, msReading, sectorsWritten, msWriting };
}
