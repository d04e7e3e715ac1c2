// ============================================================================
// @toonbench/core — Logging
// ============================================================================

import process from 'node:process';

/**
 * Log levels, least to most severe.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Log entry structure.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Callback for log events.
 */
export type LogCallback = (entry: LogEntry) => void;

const callbacks: Set<LogCallback> = new Set();

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Map the TOONBENCH_DEBUG environment variable to a level.
 */
export function levelFromEnv(value: string | undefined): LogLevel {
  if (value === '1' || value === 'true') return 'debug';
  if (value === 'warn') return 'warn';
  if (value === 'error') return 'error';
  return 'info';
}

let currentLevel: LogLevel = levelFromEnv(process.env.TOONBENCH_DEBUG);

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  const msg = `[toonbench] ${message}${dataStr}`;

  switch (level) {
    case 'debug':
      console.debug(msg);
      break;
    case 'info':
      console.info(msg);
      break;
    case 'warn':
      console.warn(msg);
      break;
    case 'error':
      console.error(msg);
      break;
  }

  for (const cb of callbacks) {
    try {
      cb(entry);
    } catch (e) {
      console.error('[toonbench] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging. Only emitted when TOONBENCH_DEBUG=1.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function info(message: string, data?: Record<string, unknown>): void {
  log('info', message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

export function error(message: string, data?: Record<string, unknown>): void {
  log('error', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Measures the duration of an operation and logs it at debug level.
 */
export class Timer {
  private readonly startTime: number;
  private readonly label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /** Milliseconds since the timer started, without logging. */
  elapsed(): number {
    return performance.now() - this.startTime;
  }

  end(data?: Record<string, unknown>): number {
    const duration = this.elapsed();
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

// ---------------------------------------------------------------------------
// Subscriptions & Configuration
// ---------------------------------------------------------------------------

/**
 * Register a callback for log events. Returns an unsubscribe function.
 */
export function onLog(callback: LogCallback): () => void {
  callbacks.add(callback);
  return () => {
    callbacks.delete(callback);
  };
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}
