import {
  CounterSourceError,
  MS_PER_SECOND,
  ResmonError,
  SourceUnavailableError,
  formatDuration,
  getLogger,
} from '@resmon/shared';
import type { MonitorConfig, MonitorSummary, StopReason } from '@resmon/shared';
import { EventBus } from '../events/EventBus.js';
import { sleep as defaultSleep } from '../sampling/Sampler.js';
import type { Sampler, Sleep } from '../sampling/Sampler.js';

const logger = getLogger();

export interface ResourceMonitorOptions {
  sampler: Sampler;
  eventBus?: EventBus;
  sleep?: Sleep;
  /** Wall clock in milliseconds. */
  now?: () => number;
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}

/**
 * Drives the sampler once per reporting tick until the run time has elapsed
 * or the signal aborts. Samples and failures are published on the event bus.
 */
export class ResourceMonitor {
  readonly eventBus: EventBus;
  private config: MonitorConfig;
  private sampler: Sampler;
  private sleep: Sleep;
  private now: () => number;

  constructor(config: MonitorConfig, options: ResourceMonitorOptions) {
    this.config = config;
    this.sampler = options.sampler;
    this.eventBus = options.eventBus ?? new EventBus();
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async run(signal?: AbortSignal): Promise<MonitorSummary> {
    const { runTime, tickDelay, maxConsecutiveFailures } = this.config;
    const startedAt = this.wholeSeconds();
    let elapsed = 0;
    let ticks = 0;
    let failures = 0;
    let consecutiveFailures = 0;
    let reason: StopReason = 'completed';

    logger.info(
      {
        sampleInterval: this.config.sampleInterval,
        runTime: runTime === null ? 'unbounded' : formatDuration(runTime * MS_PER_SECOND),
        disks: this.config.disks,
        ioMode: this.config.ioMode,
      },
      'Resource monitor started',
    );
    this.eventBus.emit('monitor:start', this.config);

    while (runTime === null || elapsed <= runTime) {
      if (signal?.aborted) {
        reason = 'aborted';
        break;
      }

      ticks++;
      try {
        const sample = await this.sampler.sample(signal);
        consecutiveFailures = 0;
        this.eventBus.emit('sample:collected', sample);
      } catch (err) {
        if (isAbortError(err)) {
          reason = 'aborted';
          break;
        }
        if (!(err instanceof ResmonError)) throw err;

        failures++;
        consecutiveFailures = err instanceof CounterSourceError ? consecutiveFailures + 1 : 0;

        logger.warn({ err, tick: ticks, consecutiveFailures }, 'Sample failed, skipping tick');
        this.eventBus.emit('sample:failed', {
          code: err.code,
          message: err.message,
          consecutiveFailures,
          timestamp: new Date(),
        });

        if (consecutiveFailures >= maxConsecutiveFailures) {
          const fatal = new SourceUnavailableError(consecutiveFailures);
          logger.error({ err: fatal }, 'Resource monitor giving up');
          this.eventBus.emit('monitor:stop', { ticks, failures, reason: 'failed' });
          throw fatal;
        }
      }

      try {
        await this.sleep(tickDelay * MS_PER_SECOND, signal);
      } catch (err) {
        if (!isAbortError(err)) throw err;
        reason = 'aborted';
        break;
      }

      elapsed = this.wholeSeconds() - startedAt;
    }

    const summary: MonitorSummary = { ticks, failures, reason };
    logger.info(summary, 'Resource monitor stopped');
    this.eventBus.emit('monitor:stop', summary);
    return summary;
  }

  private wholeSeconds(): number {
    return Math.round(this.now() / MS_PER_SECOND);
  }
}
