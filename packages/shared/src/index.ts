// Types
export type {
  CpuSnapshot,
  CpuDelta,
  DiskCounters,
  IoRates,
  MetricSample,
  SampleFailure,
  StopReason,
  MonitorSummary,
  MonitorConfig,
  IoMode,
  ZeroRatePolicy,
  EventBusMessage,
} from './types/index.js';

// Constants
export {
  RESMON_VERSION,
  CPU_STAT_FILE,
  DISK_STATS_FILE,
  DEFAULT_SAMPLE_INTERVAL,
  DEFAULT_RUN_TIME,
  DEFAULT_TICK_DELAY,
  DEFAULT_DISKS,
  DEFAULT_IO_MODE,
  DEFAULT_ZERO_RATE_POLICY,
  DEFAULT_MAX_CONSECUTIVE_FAILURES,
  SECTOR_SIZE,
  KB_DIVISOR,
  MS_PER_SECOND,
  ENV_PREFIX,
} from './constants.js';

// Schemas
export {
  monitorConfigSchema,
  ioModeSchema,
  zeroRatePolicySchema,
  diskNameSchema,
} from './schemas/config.schema.js';

export type { ValidatedMonitorConfig } from './schemas/config.schema.js';

// Utilities
export {
  parseDuration,
  toSeconds,
  formatDuration,
  parseList,
  formatMetricLine,
} from './utils/parser.js';

export { parseMonitorConfig } from './utils/config.js';

export { createLogger, getLogger, setDefaultLogger, isLogLevel } from './utils/logger.js';
export type { LogLevel, CreateLoggerOptions } from './utils/logger.js';

export {
  ResmonError,
  ParseError,
  NotFoundError,
  ShapeMismatchError,
  DiskMismatchError,
  DivideByZeroError,
  CounterSourceError,
  SourceUnavailableError,
  ConfigValidationError,
} from './utils/errors.js';
