import { setTimeout as delay } from 'node:timers/promises';
import { MS_PER_SECOND, getLogger } from '@resmon/shared';
import type { IoRates, MetricSample, MonitorConfig } from '@resmon/shared';
import type { CounterSource } from '../counters/CounterSource.js';
import { parseCpuSnapshot } from '../counters/cpuStat.js';
import { parseDiskCounters } from '../counters/diskStats.js';
import { assertSameDisk, cpuDelta, delta, diskDelta } from '../metrics/delta.js';
import { cpuBusyPercent, ioRates } from '../metrics/rates.js';

const logger = getLogger();

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Abortable sleep. Rejects with an `AbortError` when the signal fires.
 */
export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export interface SamplerOptions {
  source: CounterSource;
  sleep?: Sleep;
}

/**
 * Takes two snapshots of each counter table `sampleInterval` seconds apart and
 * turns the difference into a metric sample. Holds no state between calls.
 */
export class Sampler {
  private config: MonitorConfig;
  private source: CounterSource;
  private sleep: Sleep;

  constructor(config: MonitorConfig, options: SamplerOptions) {
    this.config = config;
    this.source = options.source;
    this.sleep = options.sleep ?? sleep;
  }

  async sample(signal?: AbortSignal): Promise<MetricSample> {
    let cpuPercent: number;
    let io: IoRates;

    if (this.config.concurrent) {
      [cpuPercent, io] = await Promise.all([this.sampleCpu(signal), this.sampleIo(signal)]);
    } else {
      cpuPercent = await this.sampleCpu(signal);
      io = await this.sampleIo(signal);
    }

    return {
      cpuPercent,
      readKbps: io.readKbps,
      writeKbps: io.writeKbps,
      timestamp: new Date(),
    };
  }

  async sampleCpu(signal?: AbortSignal): Promise<number> {
    const first = parseCpuSnapshot(await this.source.readCpuStat());
    await this.wait(signal);
    const second = parseCpuSnapshot(await this.source.readCpuStat());

    const d = cpuDelta(first, second);
    logger.trace({ first, second, delta: d }, 'CPU snapshots taken');
    return cpuBusyPercent(d, this.config.zeroRatePolicy);
  }

  async sampleIo(signal?: AbortSignal): Promise<IoRates> {
    const { disks, ioMode, zeroRatePolicy } = this.config;

    const first = parseDiskCounters(await this.source.readDiskStats(), disks);
    // rate-then-delta rates the first snapshot before the pause
    const firstRates = ioMode === 'rate-then-delta' ? ioRates(first, zeroRatePolicy) : null;
    await this.wait(signal);
    const second = parseDiskCounters(await this.source.readDiskStats(), disks);
    logger.trace({ first, second, ioMode }, 'Disk snapshots taken');

    if (firstRates) {
      assertSameDisk(first, second);
      const secondRates = ioRates(second, zeroRatePolicy);
      const [readKbps, writeKbps] = delta(
        [firstRates.readKbps, firstRates.writeKbps],
        [secondRates.readKbps, secondRates.writeKbps],
      );
      return { readKbps, writeKbps };
    }

    return ioRates(diskDelta(first, second), zeroRatePolicy);
  }

  private wait(signal?: AbortSignal): Promise<void> {
    return this.sleep(this.config.sampleInterval * MS_PER_SECOND, signal);
  }
}
