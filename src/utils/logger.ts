/**
 * Log level
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  HIGHLIGHT = 'HIGHLIGHT',
  SILENT = 'SILENT',
}

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
};

const LEVEL_ORDER = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.SUCCESS,
  LogLevel.WARNING,
  LogLevel.ERROR,
  LogLevel.HIGHLIGHT,
  LogLevel.SILENT,
];

/**
 * ANSI color codes
 */
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
};

/**
 * Logger class with colored console output.
 *
 * There is no shared instance: the CLI creates one per run and hands it to
 * everything that logs.
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? true,
    };
  }

  private getEmoji(level: LogLevel): string {
    switch (level) {
      case LogLevel.DEBUG:
        return '🔍';
      case LogLevel.INFO:
        return 'ℹ️';
      case LogLevel.SUCCESS:
        return '✅';
      case LogLevel.WARNING:
        return '⚠️';
      case LogLevel.ERROR:
        return '❌';
      case LogLevel.HIGHLIGHT:
        return '🌟';
      default:
        return '•';
    }
  }

  /**
   * Format date to human readable string (MM-DD HH:mm:ss)
   */
  private formatDate(date: Date): string {
    const month = (date.getMonth() + 1).toString().padStart(2, '0');
    const day = date.getDate().toString().padStart(2, '0');
    const hour = date.getHours().toString().padStart(2, '0');
    const min = date.getMinutes().toString().padStart(2, '0');
    const sec = date.getSeconds().toString().padStart(2, '0');
    return `${month}-${day} ${hour}:${min}:${sec}`;
  }

  private format(level: LogLevel, message: string): string {
    return `${this.formatDate(new Date())} ${this.getEmoji(level)} ${message}`;
  }

  private colorize(text: string, color: string): string {
    if (!this.config.useColors) return text;
    return `${color}${text}${colors.reset}`;
  }

  debug(message: string): void {
    if (this.shouldLog(LogLevel.DEBUG)) {
      console.log(this.format(LogLevel.DEBUG, this.colorize(message, colors.dim)));
    }
  }

  info(message: string): void {
    if (this.shouldLog(LogLevel.INFO)) {
      console.log(this.format(LogLevel.INFO, this.colorize(message, colors.blue)));
    }
  }

  success(message: string): void {
    if (this.shouldLog(LogLevel.SUCCESS)) {
      console.log(this.format(LogLevel.SUCCESS, this.colorize(message, colors.green)));
    }
  }

  warning(message: string): void {
    if (this.shouldLog(LogLevel.WARNING)) {
      console.log(this.format(LogLevel.WARNING, this.colorize(message, colors.yellow)));
    }
  }

  error(message: string): void {
    if (this.shouldLog(LogLevel.ERROR)) {
      console.error(this.format(LogLevel.ERROR, this.colorize(message, colors.red)));
    }
  }

  /**
   * Log highlighted message (new matches)
   */
  highlight(message: string): void {
    if (this.shouldLog(LogLevel.HIGHLIGHT)) {
      console.log(this.format(LogLevel.HIGHLIGHT, this.colorize(message, colors.bright + colors.magenta)));
    }
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.config.level === LogLevel.SILENT) return false;
    return LEVEL_ORDER.indexOf(level) >= LEVEL_ORDER.indexOf(this.config.level);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }
}

/**
 * Logger that swallows everything, for callers that do not care about output
 */
export function createSilentLogger(): Logger {
  return new Logger({ level: LogLevel.SILENT, useColors: false });
}
