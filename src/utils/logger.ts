export enum LogLevel {
  QUIET = 0,
  NORMAL = 1,
  VERBOSE = 2,
  DEBUG = 3
}

class Logger {
  private static instance: Logger;
  private level: LogLevel = LogLevel.NORMAL;

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  // Create a contextual logger
  createContext(context: string): ContextualLogger {
    return new ContextualLogger(context, this);
  }

  // Core logging methods
  log(level: LogLevel, message: string, context?: string, data?: unknown): void {
    if (level > this.level) return;

    const formattedMessage = `${this.prefix(context)}${message}`;

    // In quiet mode, only show essential completion messages
    if (this.level === LogLevel.QUIET) {
      if (level === LogLevel.QUIET) {
        console.log(formattedMessage);
      }
      return;
    }

    console.log(formattedMessage);
    if (data !== undefined) {
      console.log(data);
    }
  }

  // Convenience methods
  quiet(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.QUIET, message, context, data);
  }

  normal(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.NORMAL, message, context, data);
  }

  verbose(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.VERBOSE, message, context, data);
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  error(message: string, context?: string, data?: unknown): void {
    // Errors always show unless in quiet mode
    if (this.level > LogLevel.QUIET) {
      console.error(`${this.prefix(context)}${message}`);
      if (data !== undefined) {
        console.error(data);
      }
    }
  }

  // Progress indicators
  success(label: string, message: string): void {
    if (this.level >= LogLevel.NORMAL) {
      console.log(`✓ ${label.padEnd(20)} ${message}`);
    }
  }

  failure(label: string, message: string): void {
    if (this.level >= LogLevel.NORMAL) {
      console.log(`✗ ${label.padEnd(20)} ${message}`);
    }
  }

  // Separator line
  separator(): void {
    if (this.level >= LogLevel.NORMAL && this.level < LogLevel.DEBUG) {
      console.log('━'.repeat(50));
    }
  }

  private prefix(context?: string): string {
    return context ? `[${context}] ` : '';
  }
}

// Contextual logger for component-specific logging
export class ContextualLogger {
  constructor(
    private context: string,
    private logger: Logger
  ) {}

  quiet(message: string, data?: unknown): void {
    this.logger.quiet(message, this.context, data);
  }

  normal(message: string, data?: unknown): void {
    this.logger.normal(message, this.context, data);
  }

  verbose(message: string, data?: unknown): void {
    this.logger.verbose(message, this.context, data);
  }

  debug(message: string, data?: unknown): void {
    this.logger.debug(message, this.context, data);
  }

  error(message: string, data?: unknown): void {
    this.logger.error(message, this.context, data);
  }
}

// Export singleton instance
export const logger = Logger.getInstance();

// Helper to parse log level from string
export function parseLogLevel(level: string | undefined): LogLevel {
  if (!level) return LogLevel.NORMAL;

  switch (level.toLowerCase()) {
    case 'quiet':
    case 'q':
      return LogLevel.QUIET;
    case 'verbose':
    case 'v':
      return LogLevel.VERBOSE;
    case 'debug':
    case 'd':
      return LogLevel.DEBUG;
    default:
      return LogLevel.NORMAL;
  }
}

// Format helpers
export const formatTime = (ms: number): string => {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  const minutes = Math.floor(ms / 60000);
  const seconds = Math.floor((ms % 60000) / 1000);
  return `${minutes}m ${seconds}s`;
};

export const formatProgress = (current: number, total: number): string => {
  const percentage = total === 0 ? 0 : Math.floor((current / total) * 100);
  return `${current}/${total} (${percentage}%)`;
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
