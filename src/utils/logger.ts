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
}

const LEVEL_ORDER: LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.SUCCESS,
  LogLevel.WARNING,
  LogLevel.ERROR,
  LogLevel.HIGHLIGHT,
];

/**
 * Logger configuration
 */
export type LoggerConfig = {
  level: LogLevel;
  useColors: boolean;
  /** Line sink, stderr by default so stdout stays free for command output */
  write: (line: string) => void;
};

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

const LEVEL_STYLE: Record<LogLevel, { emoji: string; color: string }> = {
  [LogLevel.DEBUG]: { emoji: '🔍', color: colors.dim },
  [LogLevel.INFO]: { emoji: 'ℹ️', color: colors.blue },
  [LogLevel.SUCCESS]: { emoji: '✅', color: colors.green },
  [LogLevel.WARNING]: { emoji: '⚠️', color: colors.yellow },
  [LogLevel.ERROR]: { emoji: '❌', color: colors.red },
  [LogLevel.HIGHLIGHT]: { emoji: '🌟', color: colors.bright + colors.magenta },
};

/**
 * Parse a user-supplied level name ("warning", "Debug", "warn")
 *
 * @returns The matching level, or undefined for unknown names
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  const upper = name.trim().toUpperCase();
  if (upper === 'WARN') return LogLevel.WARNING;
  return LEVEL_ORDER.find((level) => level === upper);
}

function defaultUseColors(): boolean {
  return Boolean(process.stderr.isTTY) && process.env.NO_COLOR === undefined;
}

/**
 * Logger class with colored output
 */
export class Logger {
  private config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      level: config.level ?? LogLevel.INFO,
      useColors: config.useColors ?? defaultUseColors(),
      write: config.write ?? ((line) => process.stderr.write(`${line}\n`)),
    };
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

  private log(level: LogLevel, message: string): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.config.level)) {
      return;
    }
    const { emoji, color } = LEVEL_STYLE[level];
    const text = this.config.useColors ? `${color}${message}${colors.reset}` : message;
    this.config.write(`${this.formatDate(new Date())} ${emoji} ${text}`);
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  success(message: string): void {
    this.log(LogLevel.SUCCESS, message);
  }

  warning(message: string): void {
    this.log(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  highlight(message: string): void {
    this.log(LogLevel.HIGHLIGHT, message);
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  setUseColors(useColors: boolean): void {
    this.config.useColors = useColors;
  }
}

// Default logger instance
export const logger: Logger = new Logger();
