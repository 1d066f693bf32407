import { NotFoundError, ParseError } from '@resmon/shared';
import type { DiskCounters } from '@resmon/shared';
import { parseCounter } from './cpuStat.js';

// Field positions in a /proc/diskstats row.
const NAME_FIELD = 2;
const SECTORS_READ_FIELD = 5;
const MS_READING_FIELD = 6;
const SECTORS_WRITTEN_FIELD = 9;
const MS_WRITING_FIELD = 10;
const MIN_FIELDS = 11;

/**
 * Find the row for one of `disks` in a `/proc/diskstats` blob and extract its
 * sector and time counters. When several rows match, the last one wins.
 */
export function parseDiskCounters(source: string, disks: readonly string[]): DiskCounters {
  let match: DiskCounters | null = null;

  for (const line of source.split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length <= NAME_FIELD) continue;

    const disk = fields[NAME_FIELD];
    if (!disks.includes(disk)) continue;

    if (fields.length < MIN_FIELDS) {
      throw new ParseError(
        `Disk statistics row for ${disk} has ${fields.length} fields, expected at least ${MIN_FIELDS}`,
      );
    }

    match = {
      disk,
      sectorsRead: parseCounter(fields[SECTORS_READ_FIELD], `${disk} sectors read`),
      msReading: parseCounter(fields[MS_READING_FIELD], `${disk} ms reading`),
      sectorsWritten: parseCounter(fields[SECTORS_WRITTEN_FIELD], `${disk} sectors written`),
      msWriting: parseCounter(fields[MS_WRITING_FIELD], `${disk} ms writing`),
    };
  }

  if (!match) {
    throw new NotFoundError(disks);
  }
  return match;
}
