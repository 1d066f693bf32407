import { EventEmitter } from 'node:events';
import { nanoid } from 'nanoid';
import type {
  EventBusMessage,
  MetricSample,
  MonitorConfig,
  MonitorSummary,
  SampleFailure,
} from '@resmon/shared';

type EventMap = {
  'monitor:start': MonitorConfig;
  'monitor:stop': MonitorSummary;
  'sample:collected': MetricSample;
  'sample:failed': SampleFailure;
};

export type EventName = keyof EventMap;

export class EventBus {
  private emitter: EventEmitter;

  constructor() {
    this.emitter = new EventEmitter();
    this.emitter.setMaxListeners(100);
  }

  emit<K extends EventName>(event: K, data: EventMap[K]): void {
    this.emitter.emit(event, data);
    // Also emit a generic message for subscribers that want everything
    const message: EventBusMessage = {
      id: nanoid(),
      type: event,
      source: 'core',
      timestamp: new Date(),
      data,
    };
    this.emitter.emit('*', message);
  }

  on<K extends EventName>(event: K, handler: (data: EventMap[K]) => void): void {
    this.emitter.on(event, handler);
  }

  onAny(handler: (message: EventBusMessage) => void): void {
    this.emitter.on('*', handler);
  }
}
