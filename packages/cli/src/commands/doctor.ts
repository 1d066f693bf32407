import { Command } from 'commander';
import chalk from 'chalk';
import { ResmonError } from '@resmon/shared';
import type { MonitorConfig } from '@resmon/shared';
import { ProcCounterSource, parseCpuSnapshot, parseDiskCounters } from '@resmon/core';
import { resolveConfig, withSourceOptions } from '../utils/config.js';
import type { SourceOptions } from '../utils/config.js';
import { reportError } from '../utils/format.js';

export function createDoctorCommand(): Command {
  return withSourceOptions(
    new Command('doctor').description('Check that the counter sources can be read'),
  ).action(async (options: SourceOptions) => {
    let config: MonitorConfig;
    try {
      config = resolveConfig(options);
    } catch (err) {
      reportError(err);
      return;
    }

    console.log(chalk.bold('\n  resmon doctor\n'));

    let issues = 0;

    // Check Node.js version
    const nodeVersion = process.versions.node;
    const major = parseInt(nodeVersion.split('.')[0], 10);
    if (major >= 20) {
      console.log(chalk.green(`  ✓ Node.js version: ${nodeVersion}`));
    } else {
      console.log(chalk.red(`  ✗ Node.js version: ${nodeVersion} (requires >= 20)`));
      issues++;
    }

    const source = new ProcCounterSource(config);

    try {
      const snapshot = parseCpuSnapshot(await source.readCpuStat());
      console.log(chalk.green(`  ✓ CPU counters: ${source.cpuStatPath} (${snapshot.join(' ')})`));
    } catch (err) {
      if (!(err instanceof ResmonError)) throw err;
      console.log(chalk.red(`  ✗ CPU counters: ${err.message}`));
      issues++;
    }

    let diskStats: string | null = null;
    try {
      diskStats = await source.readDiskStats();
      console.log(chalk.green(`  ✓ Disk counters: ${source.diskStatsPath}`));
    } catch (err) {
      if (!(err instanceof ResmonError)) throw err;
      console.log(chalk.red(`  ✗ Disk counters: ${err.message}`));
      issues++;
    }

    if (diskStats !== null) {
      for (const disk of config.disks) {
        try {
          const counters = parseDiskCounters(diskStats, [disk]);
          console.log(
            chalk.green(
              `  ✓ Disk ${disk}: ${counters.sectorsRead} sectors read, ${counters.sectorsWritten} written`,
            ),
          );
        } catch (err) {
          if (!(err instanceof ResmonError)) throw err;
          console.log(chalk.red(`  ✗ Disk ${disk}: ${err.message}`));
          issues++;
        }
      }
    }

    console.log('');

    if (issues > 0) {
      console.log(chalk.red(`  Found ${issues} issue(s) to fix.\n`));
      process.exitCode = 1;
    } else {
      console.log(chalk.green(`  No issues found! Counters are readable.\n`));
    }
  });
}
