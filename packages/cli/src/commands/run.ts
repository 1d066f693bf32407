import { Command } from 'commander';
import { formatMetricLine } from '@resmon/shared';
import type { MonitorConfig } from '@resmon/shared';
import { EventBus, ProcCounterSource, createResourceMonitor } from '@resmon/core';
import { applyLogLevel, resolveConfig, withSamplingOptions } from '../utils/config.js';
import type { MonitorOptions } from '../utils/config.js';
import { formatFailure, formatSummary, reportError } from '../utils/format.js';

export interface RunOptions extends MonitorOptions {
  json?: boolean;
}

export function createRunCommand(): Command {
  return withSamplingOptions(
    new Command('run')
      .description('Print CPU and disk throughput every tick until the run time is up')
      .option('-t, --run-time <duration>', 'Stop after this long (default: 60s)')
      .option('--forever', 'Run until interrupted')
      .option('--tick-delay <duration>', 'Pause between ticks (default: 2s)')
      .option('--max-failures <n>', 'Give up after this many unreadable ticks in a row (default: 5)')
      .option('--json', 'Print every event as a JSON line'),
  ).action(async (options: RunOptions) => {
    let config: MonitorConfig;
    try {
      applyLogLevel(options.logLevel);
      config = resolveConfig(options);
    } catch (err) {
      reportError(err);
      return;
    }

    const eventBus = new EventBus();
    if (options.json) {
      eventBus.onAny((message) => console.log(JSON.stringify(message)));
    } else {
      eventBus.on('sample:collected', (sample) => console.log(formatMetricLine(sample)));
      eventBus.on('sample:failed', (failure) => console.error(formatFailure(failure)));
    }

    const controller = new AbortController();
    const stop = (): void => controller.abort();
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    try {
      const monitor = createResourceMonitor(config, new ProcCounterSource(config), eventBus);
      const summary = await monitor.run(controller.signal);
      if (!options.json) {
        console.error(formatSummary(summary));
      }
    } catch (err) {
      reportError(err);
    } finally {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
    }
  });
}
