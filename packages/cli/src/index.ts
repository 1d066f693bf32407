#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { RESMON_VERSION } from '@resmon/shared';
import { createRunCommand } from './commands/run.js';
import { createSampleCommand } from './commands/sample.js';
import { createDoctorCommand } from './commands/doctor.js';

const program = new Command();

program
  .name('resmon')
  .version(RESMON_VERSION, '-v, --version')
  .description(chalk.bold('resmon') + ' - CPU busy and disk throughput sampler for Linux')
  // 'run' is the default when no command is given
  .addCommand(createRunCommand(), { isDefault: true })
  .addCommand(createSampleCommand())
  .addCommand(createDoctorCommand());

await program.parseAsync(process.argv);
