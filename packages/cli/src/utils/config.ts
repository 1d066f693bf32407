import { Command } from 'commander';
import {
  ConfigValidationError,
  ENV_PREFIX,
  getLogger,
  isLogLevel,
  parseList,
  parseMonitorConfig,
  toSeconds,
} from '@resmon/shared';
import type { MonitorConfig } from '@resmon/shared';

export interface SourceOptions {
  disks?: string;
  cpuStat?: string;
  diskStats?: string;
}

export interface SamplingOptions extends SourceOptions {
  interval?: string;
  ioMode?: string;
  concurrent?: boolean;
  zeroRates?: string;
  logLevel?: string;
}

export interface MonitorOptions extends SamplingOptions {
  runTime?: string;
  forever?: boolean;
  tickDelay?: string;
  maxFailures?: string;
}

export type Env = Record<string, string | undefined>;

export function withSourceOptions(command: Command): Command {
  return command
    .option('-d, --disks <list>', 'Comma separated disks to report on (default: sda)')
    .option('--cpu-stat <path>', 'CPU counter file (default: /proc/stat)')
    .option('--disk-stats <path>', 'Disk counter file (default: /proc/diskstats)');
}

export function withSamplingOptions(command: Command): Command {
  return withSourceOptions(command)
    .option('-i, --interval <duration>', 'Time between the two snapshots of a sample (default: 2s)')
    .option('--io-mode <mode>', 'delta-then-rate or rate-then-delta')
    .option('--concurrent', 'Sample CPU and disk counters at the same time')
    .option('--zero-rates <policy>', 'On a zero divisor: error or zero (default: zero)')
    .option('--log-level <level>', 'trace, debug, info, warn, error, fatal or silent');
}

/**
 * Build the monitor config from environment variables and flags.
 * Flags win over the environment, which wins over the defaults.
 */
export function resolveConfig(options: MonitorOptions = {}, env: Env = process.env): MonitorConfig {
  const input: Record<string, unknown> = {};
  const errors: string[] = [];

  const fromEnv = (name: string): string | undefined => {
    const value = env[`${ENV_PREFIX}${name}`];
    return value === '' ? undefined : value;
  };

  const setSeconds = (key: string, value: string | undefined): void => {
    if (value === undefined) return;
    try {
      input[key] = toSeconds(value);
    } catch (err) {
      errors.push(`${key}: ${err instanceof Error ? err.message : String(err)}`);
    }
  };

  setSeconds('sampleInterval', options.interval ?? fromEnv('SAMPLE_INTERVAL'));
  if (options.forever) {
    input.runTime = null;
  } else {
    setSeconds('runTime', options.runTime ?? fromEnv('RUN_TIME'));
  }
  setSeconds('tickDelay', options.tickDelay ?? fromEnv('TICK_DELAY'));

  const disks = options.disks ?? fromEnv('DISKS');
  if (disks !== undefined) input.disks = parseList(disks);

  const ioMode = options.ioMode ?? fromEnv('IO_MODE');
  if (ioMode !== undefined) input.ioMode = ioMode;

  if (options.concurrent) input.concurrent = true;
  if (options.zeroRates !== undefined) input.zeroRatePolicy = options.zeroRates;
  if (options.maxFailures !== undefined) input.maxConsecutiveFailures = Number(options.maxFailures);
  if (options.cpuStat !== undefined) input.cpuStatPath = options.cpuStat;
  if (options.diskStats !== undefined) input.diskStatsPath = options.diskStats;

  if (errors.length > 0) {
    throw new ConfigValidationError(errors);
  }
  return parseMonitorConfig(input);
}

export function applyLogLevel(level: string | undefined): void {
  if (level === undefined) return;
  if (!isLogLevel(level)) {
    throw new ConfigValidationError([`logLevel: unknown level "${level}"`]);
  }
  getLogger().level = level;
}
