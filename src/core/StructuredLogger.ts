// Système de logs structurés avec niveaux et contexte

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  FATAL = 4
}

export interface LogContext {
  component?: string;
  operation?: string;
  source?: string;
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: string;
  message: string;
  context: LogContext;
  error?: Error;
}

export type LogSink = (level: LogLevel, line: string) => void;

const COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m', // Cyan
  [LogLevel.INFO]: '\x1b[32m',  // Green
  [LogLevel.WARN]: '\x1b[33m',  // Yellow
  [LogLevel.ERROR]: '\x1b[31m', // Red
  [LogLevel.FATAL]: '\x1b[35m'  // Magenta
};

const consoleSink: LogSink = (level, line) => {
  const reset = '\x1b[0m';
  if (level >= LogLevel.ERROR) {
    console.error(`${COLORS[level]}${line}${reset}`);
  } else if (level === LogLevel.WARN) {
    console.warn(`${COLORS[level]}${line}${reset}`);
  } else {
    console.log(`${COLORS[level]}${line}${reset}`);
  }
};

/**
 * Convertit LOG_LEVEL (debug, info, warn, error, fatal) en LogLevel
 */
export function parseLogLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
  switch (value?.trim().toLowerCase()) {
    case 'debug': return LogLevel.DEBUG;
    case 'info': return LogLevel.INFO;
    case 'warn':
    case 'warning': return LogLevel.WARN;
    case 'error': return LogLevel.ERROR;
    case 'fatal': return LogLevel.FATAL;
    default: return fallback;
  }
}

export class StructuredLogger {
  private logLevel: LogLevel;
  private readonly baseContext: LogContext;
  private readonly sink: LogSink;
  private parent: StructuredLogger | null = null;

  constructor(
    logLevel: LogLevel = LogLevel.INFO,
    baseContext: LogContext = {},
    sink: LogSink = consoleSink
  ) {
    this.logLevel = logLevel;
    this.baseContext = baseContext;
    this.sink = sink;
  }

  /**
   * Logger dérivé partageant niveau et sortie, avec un composant fixé
   */
  child(component: string): StructuredLogger {
    const child = new StructuredLogger(this.logLevel, { ...this.baseContext, component }, this.sink);
    child.parent = this;
    return child;
  }

  debug(message: string, context: LogContext = {}): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context: LogContext = {}): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context: LogContext = {}): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: Error, context: LogContext = {}): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  fatal(message: string, error?: Error, context: LogContext = {}): void {
    this.log(LogLevel.FATAL, message, context, error);
  }

  /**
   * Changer le niveau de log dynamiquement (propagé depuis le logger racine)
   */
  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  getLogLevel(): LogLevel {
    return this.parent ? this.parent.getLogLevel() : this.logLevel;
  }

  private log(level: LogLevel, message: string, context: LogContext, error?: Error): void {
    if (level < this.getLogLevel()) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel[level],
      message,
      context: { ...this.baseContext, ...context },
      error
    };

    this.sink(level, formatLogEntry(entry));
  }
}

export function formatLogEntry(entry: LogEntry): string {
  const { timestamp, level, message, context, error } = entry;

  let formatted = `[${timestamp}] ${level}: ${message}`;

  if (Object.keys(context).length > 0) {
    formatted += ` | Context: ${JSON.stringify(context)}`;
  }

  if (error) {
    formatted += ` | Error: ${error.message}`;
    if (error.stack) {
      formatted += ` | Stack: ${error.stack}`;
    }
  }

  return formatted;
}

// Logger racine, niveau ajusté au démarrage depuis CONFIG.LOG_LEVEL
export const logger = new StructuredLogger(parseLogLevel(process.env.LOG_LEVEL));
