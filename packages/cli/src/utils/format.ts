import chalk from 'chalk';
import { ResmonError, getLogger } from '@resmon/shared';
import type { MonitorSummary, SampleFailure } from '@resmon/shared';

export function formatFailure(failure: SampleFailure): string {
  return chalk.yellow(`  ⚠ Tick skipped [${failure.code}]: ${failure.message}`);
}

export function formatSummary(summary: MonitorSummary): string {
  const text = `  Stopped after ${summary.ticks} tick(s), ${summary.failures} failed (${summary.reason})`;
  return summary.failures > 0 ? chalk.yellow(text) : chalk.gray(text);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Print a command failure and mark the process as failed.
 */
export function reportError(err: unknown): void {
  if (err instanceof ResmonError) {
    console.error(chalk.red(`  ✗ ${err.message}`));
  } else {
    getLogger().error({ err }, 'Unexpected error');
    console.error(chalk.red(`  ✗ Unexpected error: ${errorMessage(err)}`));
  }
  process.exitCode = 1;
}
