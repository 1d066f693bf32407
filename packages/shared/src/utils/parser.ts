import msLib from 'ms';
import type { MetricSample } from '../types/index.js';

/**
 * Parse a duration string to milliseconds.
 * Supports: '30s', '5m', '1h', '100ms', etc.
 */
export function parseDuration(value: string | number): number {
  if (typeof value === 'number') return value;

  const result = msLib(value);
  if (result === undefined) {
    throw new Error(`Invalid duration string: "${value}"`);
  }
  return result;
}

/**
 * Parse a time option to seconds. Bare numbers are already seconds;
 * anything with a unit goes through parseDuration.
 */
export function toSeconds(value: string | number): number {
  if (typeof value === 'number') return value;

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }
  return parseDuration(trimmed) / 1000;
}

/**
 * Format milliseconds to a human-readable duration string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${Math.round(ms / 1000)}s`;
  if (ms < 3_600_000) return `${Math.round(ms / 60_000)}m`;
  if (ms < 86_400_000) return `${Math.round(ms / 3_600_000)}h`;
  return `${Math.round(ms / 86_400_000)}d`;
}

/**
 * Split a comma or whitespace separated list, dropping empty entries.
 */
export function parseList(value: string): string[] {
  return value
    .split(/[\s,]+/)
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Format one sample as a report line. Downstream consumers parse this
 * line, so the layout and precision are fixed.
 */
export function formatMetricLine(sample: Pick<MetricSample, 'cpuPercent' | 'readKbps' | 'writeKbps'>): string {
  return `CPU ${sample.cpuPercent.toFixed(2)}% IO rkbps ${sample.readKbps.toFixed(3)} IO wkbps ${sample.writeKbps.toFixed(3)}`;
}
