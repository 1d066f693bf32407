import { monitorConfigSchema } from '../schemas/config.schema.js';
import type { MonitorConfig } from '../types/index.js';
import { ConfigValidationError } from './errors.js';

/**
 * Validate a partial configuration and fill in defaults.
 */
export function parseMonitorConfig(input: unknown = {}): MonitorConfig {
  const result = monitorConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      }),
    );
  }
  return result.data;
}
