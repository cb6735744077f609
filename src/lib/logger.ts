// Console logger for the CLI and library modules. Everything goes to stderr so
// stdout carries only command output.

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogMetadata {
  readonly [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  color: boolean;
}

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const;

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export class Logger {
  private options: LoggerOptions;

  constructor(options: Partial<LoggerOptions> = {}) {
    this.options = {
      level: 'info',
      json: false,
      color: Boolean(process.stderr.isTTY),
      ...options,
    };
  }

  configure(options: Partial<LoggerOptions>): void {
    this.options = { ...this.options, ...options };
  }

  get level(): LogLevel {
    return this.options.level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_VALUES[level] >= LOG_LEVEL_VALUES[this.options.level];
  }

  format(level: LogLevel, message: string, metadata?: LogMetadata): string {
    const timestamp = new Date().toISOString();
    const hasMetadata = metadata !== undefined && Object.keys(metadata).length > 0;

    if (this.options.json) {
      return JSON.stringify({ timestamp, level, message, ...(hasMetadata ? metadata : {}) });
    }

    const paint = (color: string, text: string) => (this.options.color ? `${color}${text}${COLORS.reset}` : text);

    let line = `${paint(COLORS.dim, timestamp)} ${paint(LEVEL_COLORS[level], LEVEL_LABELS[level])} ${message}`;
    if (hasMetadata) {
      const metaStr = Object.entries(metadata)
        .map(([key, value]) => `${paint(COLORS.cyan, key)}=${typeof value === 'object' ? JSON.stringify(value) : String(value)}`)
        .join(' ');
      line += ` ${paint(COLORS.dim, `(${metaStr})`)}`;
    }
    return line;
  }

  private log(level: LogLevel, message: string, metadata?: LogMetadata): void {
    if (!this.isLevelEnabled(level)) return;
    console.error(this.format(level, message, metadata));
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', message, metadata);
  }
}

export const logger = new Logger();
