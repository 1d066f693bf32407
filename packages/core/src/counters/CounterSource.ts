import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { CPU_STAT_FILE, CounterSourceError, DISK_STATS_FILE } from '@resmon/shared';

/**
 * Supplies the raw text of the two kernel counter tables.
 */
export interface CounterSource {
  readCpuStat(): Promise<string>;
  readDiskStats(): Promise<string>;
}

export interface ProcCounterSourceOptions {
  cpuStatPath?: string;
  diskStatsPath?: string;
}

export class ProcCounterSource implements CounterSource {
  readonly cpuStatPath: string;
  readonly diskStatsPath: string;

  constructor(options: ProcCounterSourceOptions = {}) {
    this.cpuStatPath = options.cpuStatPath ?? CPU_STAT_FILE;
    this.diskStatsPath = options.diskStatsPath ?? DISK_STATS_FILE;
  }

  readCpuStat(): Promise<string> {
    return readCounterFile(this.cpuStatPath);
  }

  readDiskStats(): Promise<string> {
    return readCounterFile(this.diskStatsPath);
  }
}

/**
 * Read a whole counter file, closing the handle on every path.
 */
export async function readCounterFile(path: string): Promise<string> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err) {
    throw new CounterSourceError(path, err);
  }

  try {
    return await handle.readFile({ encoding: 'utf8' });
  } catch (err) {
    throw new CounterSourceError(path, err);
  } finally {
    await handle.close().catch((err: unknown) => {
      throw new CounterSourceError(path, err);
    });
  }
}
