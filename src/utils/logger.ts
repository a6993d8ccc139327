/**
 * Logging - module-scoped console loggers with optional file output (CLI only)
 */

import { appendFileSync, existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  module: string;
  message: string;
  timestamp: string;
  data?: unknown;
}

// File logging, enabled by the CLI
let logFilePath: string | null = null;

/**
 * Enable file logging (CLI only); the log file is truncated on every run
 */
export function initFileLogging(logDir: string, filename = 'subfix.log'): void {
  try {
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }

    const path = join(logDir, filename);
    writeFileSync(path, '', 'utf-8');
    logFilePath = path;
  } catch (error) {
    console.error('❌ Cannot create log file:', error);
  }
}

function formatLog(entry: LogEntry): string {
  const time = entry.timestamp.split('T')[1].split('.')[0]; // HH:MM:SS
  return `${time} [${entry.module}] ${entry.message}`;
}

// Terminal colors
const colors = {
  debug: '\x1b[36m',  // cyan
  info: '\x1b[32m',   // green
  warn: '\x1b[33m',   // yellow
  error: '\x1b[31m',  // red
  reset: '\x1b[0m',
};

let globalDebug = false;

export class Logger {
  private module: string;
  private debugEnabled: boolean;

  constructor(module: string, debugEnabled = false) {
    this.module = module;
    this.debugEnabled = debugEnabled;
  }

  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (level === 'debug' && !this.debugEnabled) {
      return;
    }

    const entry: LogEntry = {
      level,
      module: this.module,
      message,
      timestamp: new Date().toISOString(),
      data,
    };

    const formatted = formatLog(entry);
    const color = colors[level];
    if (data !== undefined) {
      console.log(`${color}${formatted}${colors.reset}`, data);
    } else {
      console.log(`${color}${formatted}${colors.reset}`);
    }

    if (logFilePath) {
      const fileLog = data !== undefined
        ? `${formatted} ${JSON.stringify(data)}\n`
        : `${formatted}\n`;
      try {
        appendFileSync(logFilePath, fileLog, 'utf-8');
      } catch (error) {
        // stop writing to a file that went away, keep console output
        logFilePath = null;
        console.error('❌ Log file write failed, file logging disabled:', error);
      }
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', `🔍 ${message}`, data);
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', `⚠️ ${message}`, data);
  }

  error(message: string, data?: unknown): void {
    this.log('error', `❌ ${message}`, data);
  }
}

// Logger instance cache
const loggers = new Map<string, Logger>();

/**
 * Get or create the logger of a module
 * @param module module name
 */
export function setupLogger(module: string): Logger {
  const existing = loggers.get(module);
  if (existing) {
    return existing;
  }
  const logger = new Logger(module, globalDebug);
  loggers.set(module, logger);
  return logger;
}

/**
 * Toggle debug output on every logger, including ones created later
 */
export function setGlobalDebug(enabled: boolean): void {
  globalDebug = enabled;
  loggers.forEach(logger => logger.setDebug(enabled));
}
