import { Command } from 'commander';
import { formatMetricLine } from '@resmon/shared';
import { ProcCounterSource, Sampler } from '@resmon/core';
import { applyLogLevel, resolveConfig, withSamplingOptions } from '../utils/config.js';
import type { SamplingOptions } from '../utils/config.js';
import { reportError } from '../utils/format.js';

export interface SampleOptions extends SamplingOptions {
  json?: boolean;
}

export function createSampleCommand(): Command {
  return withSamplingOptions(
    new Command('sample')
      .description('Take a single sample and print it')
      .option('--json', 'Print the sample as JSON'),
  ).action(async (options: SampleOptions) => {
    try {
      applyLogLevel(options.logLevel);
      const config = resolveConfig(options);
      const sampler = new Sampler(config, { source: new ProcCounterSource(config) });
      const sample = await sampler.sample();
      console.log(options.json ? JSON.stringify(sample) : formatMetricLine(sample));
    } catch (err) {
      reportError(err);
    }
  });
}
