/**
 * Structured logger with configurable verbosity
 * Supports lazy evaluation and batched writes so per-record logging stays cheap
 */

import type { GradeRecord } from '../types/opportunity';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
};

// Global log store for later inspection
const logStore: LogEntry[] = [];
const MAX_LOG_ENTRIES = 1000;

// Log level hierarchy
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

// Default log level from environment
const DEFAULT_LOG_LEVEL: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

const GRADE_EMOJI: Record<GradeRecord['grade_letter'], string> = {
  A: '🟢',
  B: '🟢',
  C: '🟡',
  D: '🟠',
  F: '🔴',
};

export class Logger {
  private pendingLogs: LogEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private currentLevel: number;

  constructor(
    private module: string,
    private level: LogLevel = DEFAULT_LOG_LEVEL
  ) {
    this.currentLevel = LOG_LEVELS[level];
  }

  /**
   * Debug logging with lazy evaluation
   */
  debug(message: string | (() => string), data?: unknown | (() => unknown)) {
    if (this.currentLevel > LOG_LEVELS.debug) return;

    // Lazy evaluation - only compute if needed
    const actualMessage = typeof message === 'function' ? message() : message;
    const actualData: unknown = typeof data === 'function' ? data() : data;

    this.log('debug', actualMessage, actualData);
  }

  info(message: string, data?: unknown) {
    if (this.currentLevel > LOG_LEVELS.info) return;
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown) {
    if (this.currentLevel > LOG_LEVELS.warn) return;
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  /**
   * Log a section header for better organization
   */
  section(title: string, emoji = '📌') {
    if (this.currentLevel > LOG_LEVELS.info) return;

    const separator = '═'.repeat(35);
    this.log('info', `${emoji} ${title.toUpperCase()}\n${separator}`);
  }

  /**
   * Log a summary with formatted key-value pairs
   */
  summary(data: Record<string, unknown>) {
    if (this.currentLevel > LOG_LEVELS.info) return;

    const lines = Object.entries(data).map(([key, value]) => {
      const formattedKey = key.replace(/_/g, ' ').replace(/\b\w/g, l => l.toUpperCase());
      return `  • ${formattedKey}: ${value}`;
    });

    this.log('info', lines.join('\n'));
  }

  /**
   * One line per graded opportunity
   */
  grade(record: GradeRecord) {
    if (this.currentLevel > LOG_LEVELS.info) return;

    const emoji = GRADE_EMOJI[record.grade_letter];
    const flags = record.diagnostics.flags.length > 0 ? ` | Flags: ${record.diagnostics.flags.join(', ')}` : '';
    const message =
      `${emoji} GRADE ${record.grade_letter}: ${record.identity} (${record.composite_score.toFixed(1)})\n` +
      `   EV: ${record.ev_score.toFixed(1)} | Timing: ${record.timing_score.toFixed(1)} | ` +
      `Trend: ${record.ev_trend_score.toFixed(1)} | Confidence: ${record.bayesian_confidence.toFixed(1)}${flags}`;

    this.log('info', message);
  }

  /**
   * Outcomes that need human review
   */
  pendManual(identity: string, reason: string) {
    if (this.currentLevel > LOG_LEVELS.warn) return;
    this.log('warn', `  ⚠️ Manual review: ${identity}\n     Reason: ${reason}`);
  }

  /**
   * Performance timing helper
   */
  time(label: string): () => void {
    if (this.currentLevel > LOG_LEVELS.debug) return () => {};

    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} took ${duration.toFixed(2)}ms`);
    };
  }

  /**
   * Core logging function with batching
   */
  private log(level: LogLevel, message: string, data?: unknown) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: this.module,
      message,
      data,
    };

    // In-memory store (circular buffer)
    logStore.push(entry);
    if (logStore.length > MAX_LOG_ENTRIES) {
      logStore.shift();
    }

    this.pendingLogs.push(entry);

    if (!this.flushTimer) {
      this.flushTimer = setTimeout(() => this.flush(), 10);
    }
  }

  /**
   * Flush pending logs to console
   */
  private flush() {
    if (this.pendingLogs.length === 0) return;

    for (const log of this.pendingLogs) {
      const prefix = `[${log.timestamp}] [${log.level.toUpperCase()}] [${log.module}]`;
      const color = this.getColor(log.level);

      console.log(`${color}${prefix}${this.resetColor()} ${log.message}`);

      if (log.data) {
        console.log(JSON.stringify(log.data, null, 2));
      }
    }

    this.pendingLogs = [];
    this.flushTimer = null;
  }

  private getColor(level: LogLevel): string {
    // Only use colors in development
    if (process.env.NODE_ENV === 'production') return '';

    switch (level) {
      case 'debug': return '\x1b[90m'; // Gray
      case 'info': return '\x1b[36m';  // Cyan
      case 'warn': return '\x1b[33m';  // Yellow
      case 'error': return '\x1b[31m'; // Red
    }
  }

  private resetColor(): string {
    return process.env.NODE_ENV === 'production' ? '' : '\x1b[0m';
  }
}

/**
 * Get all stored logs
 */
export function getStoredLogs(
  filter?: {
    level?: LogLevel;
    module?: string;
    startTime?: string;
    endTime?: string;
    search?: string;
  }
): LogEntry[] {
  let logs = [...logStore];

  if (filter) {
    if (filter.level) {
      const minLevel = LOG_LEVELS[filter.level];
      logs = logs.filter(log => LOG_LEVELS[log.level] >= minLevel);
    }

    if (filter.module) {
      const moduleFilter = filter.module;
      logs = logs.filter(log => log.module.includes(moduleFilter));
    }

    if (filter.startTime) {
      const startTimeFilter = filter.startTime;
      logs = logs.filter(log => log.timestamp >= startTimeFilter);
    }

    if (filter.endTime) {
      const endTimeFilter = filter.endTime;
      logs = logs.filter(log => log.timestamp <= endTimeFilter);
    }

    if (filter.search) {
      const searchLower = filter.search.toLowerCase();
      logs = logs.filter(log =>
        log.message.toLowerCase().includes(searchLower) ||
        (log.data !== undefined && JSON.stringify(log.data).toLowerCase().includes(searchLower))
      );
    }
  }

  return logs;
}

export function clearStoredLogs() {
  logStore.length = 0;
}

/**
 * Export logs as CSV
 */
export function exportLogsAsCSV(logs: LogEntry[]): string {
  const headers = ['Timestamp', 'Level', 'Module', 'Message', 'Data'];
  const rows = logs.map(log => [
    log.timestamp,
    log.level,
    log.module,
    log.message,
    log.data !== undefined ? JSON.stringify(log.data) : '',
  ]);

  return [
    headers.join(','),
    ...rows.map(row => row.map(cell => `"${cell.replace(/"/g, '""')}"`).join(','))
  ].join('\n');
}
