import { pino } from 'pino';
import type { Logger } from 'pino';

const root = pino({
  name: 'requisition',
  level: process.env.LOG_LEVEL ?? 'info',
});

export type { Logger };

export function createLogger(component: string): Logger {
  return root.child({ component });
}

/** Applies to loggers created after the call. */
export function setLogLevel(level: string): void {
  root.level = level;
}
