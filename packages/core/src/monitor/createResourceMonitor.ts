import type { MonitorConfig } from '@resmon/shared';
import { ProcCounterSource } from '../counters/CounterSource.js';
import type { CounterSource } from '../counters/CounterSource.js';
import { EventBus } from '../events/EventBus.js';
import { Sampler } from '../sampling/Sampler.js';
import { ResourceMonitor } from './ResourceMonitor.js';

/**
 * Wire a monitor to the procfs counter sources named in the config.
 */
export function createResourceMonitor(
  config: MonitorConfig,
  source: CounterSource = new ProcCounterSource(config),
  eventBus: EventBus = new EventBus(),
): ResourceMonitor {
  const sampler = new Sampler(config, { source });
  return new ResourceMonitor(config, { sampler, eventBus });
}
