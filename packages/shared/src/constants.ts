export const RESMON_VERSION = '0.1.0';

export const CPU_STAT_FILE = '/proc/stat';
export const DISK_STATS_FILE = '/proc/diskstats';

export const DEFAULT_SAMPLE_INTERVAL = 2;
export const DEFAULT_RUN_TIME = 60;
export const DEFAULT_TICK_DELAY = 2;
export const DEFAULT_DISKS: readonly string[] = ['sda'];
export const DEFAULT_IO_MODE = 'delta-then-rate' as const;
export const DEFAULT_ZERO_RATE_POLICY = 'zero' as const;
export const DEFAULT_MAX_CONSECUTIVE_FAILURES = 5;

// /proc/diskstats counts 512-byte sectors regardless of the device's real sector size.
export const SECTOR_SIZE = 512;
export const KB_DIVISOR = 128;
export const MS_PER_SECOND = 1000;

export const ENV_PREFIX = 'RESMON_';
