import { Logger, LogLevel } from '../types';
import { v4 as uuidv4 } from 'uuid';
import * as fs from 'fs';
import * as path from 'path';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
  sessionId?: string;
  component?: string;
}

export interface LoggerConfig {
  level: LogLevel;
  enableFileLogging: boolean;
  logDirectory: string;
  enableConsole: boolean;
  sessionId?: string;
  component?: string;
}

const LEVELS: LogLevel[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function levelEnabled(current: LogLevel, level: LogLevel): boolean {
  return LEVELS.indexOf(level) <= LEVELS.indexOf(current);
}

/**
 * Logger with console output and optional JSON-lines file output.
 * Every run gets its own session id so file logs from separate runs can be told apart.
 */
export class EnhancedLogger implements Logger {
  private readonly config: LoggerConfig;
  private currentLogFile?: string;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: 'INFO',
      enableFileLogging: false,
      logDirectory: './logs',
      enableConsole: true,
      sessionId: uuidv4(),
      ...config,
    };

    if (this.config.enableFileLogging) {
      this.initializeFileLogging();
    }
  }

  error(message: string, meta?: unknown): void {
    this.log('ERROR', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('WARN', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('INFO', message, meta);
  }

  debug(message: string, meta?: unknown): void {
    this.log('DEBUG', message, meta);
  }

  getSessionId(): string | undefined {
    return this.config.sessionId;
  }

  getLogFilePath(): string | undefined {
    return this.currentLogFile;
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!levelEnabled(this.config.level, level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      meta,
      sessionId: this.config.sessionId,
      component: this.config.component,
    };

    if (this.config.enableConsole) {
      this.logToConsole(entry);
    }

    if (this.config.enableFileLogging) {
      this.logToFile(entry);
    }
  }

  private logToConsole(entry: LogEntry): void {
    const prefix = `[${entry.level}] ${entry.timestamp}`;
    const suffix = entry.component ? ` [${entry.component}]` : '';
    const metaStr = entry.meta !== undefined ? ` ${JSON.stringify(entry.meta)}` : '';

    const fullMessage = `${prefix}${suffix} ${entry.message}${metaStr}`;

    switch (entry.level) {
      case 'ERROR':
        console.error(fullMessage);
        break;
      case 'WARN':
        console.warn(fullMessage);
        break;
      case 'INFO':
        console.info(fullMessage);
        break;
      case 'DEBUG':
        console.debug(fullMessage);
        break;
    }
  }

  private logToFile(entry: LogEntry): void {
    if (!this.currentLogFile) {
      return;
    }

    const logLine = JSON.stringify(entry) + '\n';

    try {
      fs.appendFileSync(this.currentLogFile, logLine);
    } catch (error) {
      console.error('Failed to write to log file:', error);
    }
  }

  private newLogFileName(): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    return path.join(this.config.logDirectory, `sweep-${timestamp}.log`);
  }

  private initializeFileLogging(): void {
    try {
      fs.mkdirSync(this.config.logDirectory, { recursive: true });
      this.currentLogFile = this.newLogFileName();
      fs.writeFileSync(this.currentLogFile, '');
    } catch (error) {
      console.error('Failed to initialize file logging:', error);
      this.config.enableFileLogging = false;
    }
  }
}

/**
 * Plain console logger, used by tests and library callers
 */
export class ConsoleLogger implements Logger {
  private readonly logLevel: LogLevel;

  constructor(logLevel: LogLevel = 'INFO') {
    this.logLevel = logLevel;
  }

  error(message: string, meta?: unknown): void {
    if (levelEnabled(this.logLevel, 'ERROR')) {
      console.error(`[ERROR] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  warn(message: string, meta?: unknown): void {
    if (levelEnabled(this.logLevel, 'WARN')) {
      console.warn(`[WARN] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  info(message: string, meta?: unknown): void {
    if (levelEnabled(this.logLevel, 'INFO')) {
      console.info(`[INFO] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }

  debug(message: string, meta?: unknown): void {
    if (levelEnabled(this.logLevel, 'DEBUG')) {
      console.debug(`[DEBUG] ${message}`, meta !== undefined ? JSON.stringify(meta, null, 2) : '');
    }
  }
}
