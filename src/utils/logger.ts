/**
 * Logger - Component-tagged structured log events
 *
 * Every event goes to registered collectors. The default collector writes
 * `[Component] message` lines to stderr so stdout stays free for command output.
 */

import { getGlobalConfig, LogLevel } from '../config/global';

export interface LogEvent {
  level: LogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
  timestamp: number;
}

export type LogCollector = (event: LogEvent) => void;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function formatData(data: Record<string, unknown>): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (value instanceof Error) {
      parts.push(`${key}=${value.message}`);
    } else if (typeof value === 'object' && value !== null) {
      parts.push(`${key}=${JSON.stringify(value)}`);
    } else {
      parts.push(`${key}=${String(value)}`);
    }
  }
  return parts.join(' ');
}

export function formatLogEvent(event: LogEvent): string {
  const prefix = event.level === 'warn' || event.level === 'error'
    ? `[${event.component}] ${event.level.toUpperCase()}: `
    : `[${event.component}] `;
  const suffix = event.data && Object.keys(event.data).length > 0 ? ` (${formatData(event.data)})` : '';
  return `${prefix}${event.message}${suffix}`;
}

const stderrCollector: LogCollector = (event) => {
  if (LEVEL_ORDER[event.level] < LEVEL_ORDER[getGlobalConfig().logLevel]) {
    return;
  }
  console.error(formatLogEvent(event));
};

let collectors: LogCollector[] = [stderrCollector];

/**
 * Register an external collector. Returns a function that removes it.
 */
export function addLogCollector(collector: LogCollector): () => void {
  collectors.push(collector);
  return () => {
    collectors = collectors.filter((c) => c !== collector);
  };
}

/**
 * Drop the stderr collector (e.g. when the embedding process owns stderr).
 */
export function setStderrLogging(enabled: boolean): void {
  collectors = collectors.filter((c) => c !== stderrCollector);
  if (enabled) {
    collectors.unshift(stderrCollector);
  }
}

function emit(event: LogEvent): void {
  for (const collector of collectors) {
    try {
      collector(event);
    } catch (err) {
      console.error(`[Logger] Collector failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}

export function createLogger(component: string): Logger {
  const log = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    emit({ level, component, message, data, timestamp: Date.now() });
  };
  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}
