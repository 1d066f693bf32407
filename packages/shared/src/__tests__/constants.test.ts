import { describe, it, expect } from 'vitest';
import {
  RESMON_VERSION,
  CPU_STAT_FILE,
  DISK_STATS_FILE,
  DEFAULT_SAMPLE_INTERVAL,
  DEFAULT_RUN_TIME,
  DEFAULT_TICK_DELAY,
  DEFAULT_DISKS,
  DEFAULT_IO_MODE,
  DEFAULT_ZERO_RATE_POLICY,
  DEFAULT_MAX_CONSECUTIVE_FAILURES,
  SECTOR_SIZE,
  KB_DIVISOR,
  MS_PER_SECOND,
} from '../constants.js';

describe('constants', () => {
  describe('RESMON_VERSION', () => {
    it('should follow semver format', () => {
      expect(RESMON_VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });
  });

  describe('counter sources', () => {
    it('should point at the procfs CPU and disk tables', () => {
      expect(CPU_STAT_FILE).toBe('/proc/stat');
      expect(DISK_STATS_FILE).toBe('/proc/diskstats');
    });
  });

  describe('sampling defaults', () => {
    it('should sample over a 2 second interval', () => {
      expect(DEFAULT_SAMPLE_INTERVAL).toBe(2);
    });

    it('should run for 60 seconds', () => {
      expect(DEFAULT_RUN_TIME).toBe(60);
    });

    it('should pause 2 seconds between ticks', () => {
      expect(DEFAULT_TICK_DELAY).toBe(2);
    });

    it('should monitor sda only', () => {
      expect(DEFAULT_DISKS).toEqual(['sda']);
    });

    it('should default to the delta-then-rate I/O mode', () => {
      expect(DEFAULT_IO_MODE).toBe('delta-then-rate');
    });

    it('should report zero for rates with a zero divisor', () => {
      expect(DEFAULT_ZERO_RATE_POLICY).toBe('zero');
    });

    it('should allow a positive number of consecutive failures', () => {
      expect(DEFAULT_MAX_CONSECUTIVE_FAILURES).toBeGreaterThan(0);
      expect(Number.isInteger(DEFAULT_MAX_CONSECUTIVE_FAILURES)).toBe(true);
    });
  });

  describe('unit conversion', () => {
    it('should use 512 byte sectors and a divisor of 128', () => {
      expect(SECTOR_SIZE).toBe(512);
      expect(KB_DIVISOR).toBe(128);
      expect((SECTOR_SIZE * 1) / KB_DIVISOR).toBe(4);
    });

    it('should convert milliseconds with 1000 per second', () => {
      expect(MS_PER_SECOND).toBe(1000);
    });
  });
});
