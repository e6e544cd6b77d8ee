// ============================================================================
// @zxconv/core — Logging
// ============================================================================

import process from 'node:process';

/**
 * Log levels for zxconv.
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
 * Current log level (controlled by ZXCONV_DEBUG env var).
 */
let currentLevel: LogLevel = 'info';

function initLevel(): void {
  const debug = process.env.ZXCONV_DEBUG;
  if (debug === '1' || debug === 'true') {
    currentLevel = 'debug';
  } else if (debug === 'warn') {
    currentLevel = 'warn';
  } else if (debug === 'error') {
    currentLevel = 'error';
  } else {
    currentLevel = 'info';
  }
}

initLevel();

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
  const msg = `[zxconv] ${message}${dataStr}`;

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
      console.error('[zxconv] Log callback error:', e);
    }
  }
}

/**
 * Debug-level logging (most verbose).
 * Only logs when ZXCONV_DEBUG=1 is set.
 */
export function debug(message: string, data?: Record<string, unknown>): void {
  log('debug', message, data);
}

export function warn(message: string, data?: Record<string, unknown>): void {
  log('warn', message, data);
}

// ---------------------------------------------------------------------------
// Performance Timing
// ---------------------------------------------------------------------------

/**
 * Performance timer for measuring operation duration.
 */
export class Timer {
  private startTime: number;
  private label: string;

  constructor(label: string) {
    this.label = label;
    this.startTime = performance.now();
  }

  /**
   * End the timer and log the result.
   */
  end(): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { durationMs: duration });
    return duration;
  }

  endWith(data: Record<string, unknown>): number {
    const duration = performance.now() - this.startTime;
    debug(`${this.label}: ${duration.toFixed(2)}ms`, { ...data, durationMs: duration });
    return duration;
  }
}

export function timer(label: string): Timer {
  return new Timer(label);
}

// ---------------------------------------------------------------------------
// Event Callbacks
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

// ---------------------------------------------------------------------------
// Specific Log Events
// ---------------------------------------------------------------------------

/**
 * Log a leading header that bounds the payload.
 */
export function logHeaderFound(kind: 'plus3dos' | 'tape', payloadLength: number): void {
  debug(`${kind} header found, payload bounded to ${payloadLength} bytes`, {
    kind,
    payloadLength,
  });
}

/**
 * Log a header that was present but rejected. A rejected +3DOS header
 * usually means a raw file; a tape header is always supplied by the
 * caller, so ignoring it is a warning.
 */
export function logHeaderRejected(kind: 'plus3dos' | 'tape', reason: string): void {
  const emit = kind === 'tape' ? warn : debug;
  emit(`${kind} header rejected: ${reason}`, { kind, reason });
}

/**
 * Log a scan stopped by the soft-EOF byte.
 */
export function logSoftEof(offset: number): void {
  debug(`soft-EOF at offset ${offset}`, { offset });
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isDebugEnabled(): boolean {
  return currentLevel === 'debug';
}
