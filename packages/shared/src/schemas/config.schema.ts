import { z } from 'zod';
import {
  CPU_STAT_FILE,
  DISK_STATS_FILE,
  DEFAULT_DISKS,
  DEFAULT_IO_MODE,
  DEFAULT_MAX_CONSECUTIVE_FAILURES,
  DEFAULT_RUN_TIME,
  DEFAULT_SAMPLE_INTERVAL,
  DEFAULT_TICK_DELAY,
  DEFAULT_ZERO_RATE_POLICY,
} from '../constants.js';

export const ioModeSchema = z.enum(['delta-then-rate', 'rate-then-delta']);

export const zeroRatePolicySchema = z.enum(['error', 'zero']);

export const diskNameSchema = z
  .string()
  .min(1)
  .regex(/^\S+$/, 'disk names cannot contain whitespace');

export const monitorConfigSchema = z.object({
  sampleInterval: z.number().positive().default(DEFAULT_SAMPLE_INTERVAL),
  runTime: z.number().min(0).nullable().default(DEFAULT_RUN_TIME),
  tickDelay: z.number().min(0).default(DEFAULT_TICK_DELAY),
  disks: z.array(diskNameSchema).min(1).default([...DEFAULT_DISKS]),
  ioMode: ioModeSchema.default(DEFAULT_IO_MODE),
  concurrent: z.boolean().default(false),
  zeroRatePolicy: zeroRatePolicySchema.default(DEFAULT_ZERO_RATE_POLICY),
  maxConsecutiveFailures: z.number().int().min(1).default(DEFAULT_MAX_CONSECUTIVE_FAILURES),
  cpuStatPath: z.string().min(1).default(CPU_STAT_FILE),
  diskStatsPath: z.string().min(1).default(DISK_STATS_FILE),
});

export type ValidatedMonitorConfig = z.infer<typeof monitorConfigSchema>;
