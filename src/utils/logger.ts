import { WardenRequest, WardenResponse, Timings } from '../types/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamp?: boolean;
  colors?: boolean;
  /**
   * Where formatted lines go
   * @default console.log
   */
  sink?: (line: string) => void;
}

/**
 * True when `DEBUG` names this package or everything (`*`)
 */
export function debugFromEnv(env: string | undefined = process.env.DEBUG): boolean {
  const value = env || '';
  return value.includes('warden') || value.includes('*');
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',

  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 999,
};

// Never echo credentials into logs
const REDACTED_HEADERS = new Set(['authorization', 'proxy-authorization']);

export class Logger {
  private level: LogLevel;
  private prefix: string;
  private useTimestamp: boolean;
  private useColors: boolean;
  private sink: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level || this.detectLogLevel();
    this.prefix = options.prefix || 'warden';
    this.useTimestamp = options.timestamp !== false;
    this.useColors = options.colors !== false && this.supportsColors();
    this.sink = options.sink || ((line) => console.log(line));
  }

  private detectLogLevel(): LogLevel {
    return debugFromEnv() ? 'debug' : 'none';
  }

  private supportsColors(): boolean {
    return (
      process.stdout.isTTY === true &&
      !process.env.NO_COLOR &&
      process.env.TERM !== 'dumb'
    );
  }

  private colorize(text: string, color: keyof typeof colors): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  private formatTimestamp(): string {
    if (!this.useTimestamp) return '';
    const time = new Date().toTimeString().split(' ')[0];
    return this.colorize(`[${time}]`, 'gray') + ' ';
  }

  private shouldLog(level: LogLevel): boolean {
    return levels[level] >= levels[this.level];
  }

  /**
   * Whether messages at `level` are written
   */
  enabled(level: Exclude<LogLevel, 'none'>): boolean {
    return this.shouldLog(level);
  }

  private log(level: LogLevel, message: string) {
    if (!this.shouldLog(level)) return;

    const timestamp = this.formatTimestamp();
    const prefix = this.colorize(`[${this.prefix}]`, 'cyan');
    this.sink(`${timestamp}${prefix} ${message}`);
  }

  debug(message: string) {
    this.log('debug', message);
  }

  info(message: string) {
    this.log('info', message);
  }

  warn(message: string) {
    this.log('warn', this.colorize(message, 'yellow'));
  }

  error(message: string) {
    this.log('error', this.colorize(message, 'red'));
  }

  /**
   * Log HTTP request
   */
  logRequest(req: WardenRequest) {
    if (!this.shouldLog('debug')) return;

    const method = this.colorize(req.method, 'blue');
    const url = this.colorize(req.url, 'bright');
    this.debug(`${this.colorize('→', 'green')} ${method} ${url}`);

    req.headers.forEach((value, key) => {
      const shown = REDACTED_HEADERS.has(key) ? '[redacted]' : value;
      this.sink(`  ${this.colorize(key, 'gray')}: ${shown}`);
    });
  }

  /**
   * Log HTTP response with timings
   */
  logResponse(req: WardenRequest, res: WardenResponse, startTime: number) {
    if (!this.shouldLog('debug')) return;

    const duration = Date.now() - startTime;
    const statusColor = res.ok ? 'green' : 'red';
    const status = this.colorize(String(res.status), statusColor);
    const method = this.colorize(req.method, 'gray');

    this.debug(
      `${this.colorize('←', 'green')} ${status} ${method} ${req.url} ${this.colorize(`(${duration}ms)`, 'gray')}`
    );

    if (res.timings) {
      this.logTimings(res.timings);
    }
  }

  logTimings(timings: Timings) {
    if (!this.shouldLog('debug')) return;

    const parts: string[] = [];
    if (timings.firstByte) parts.push(`TTFB: ${timings.firstByte.toFixed(0)}ms`);
    if (timings.total) parts.push(`Total: ${timings.total.toFixed(0)}ms`);

    if (parts.length > 0) {
      this.sink(`  ${this.colorize('├─', 'gray')} ${parts.join(', ')}`);
    }
  }

  /**
   * Log error
   */
  logError(req: WardenRequest, error: Error) {
    if (!this.shouldLog('error')) return;

    const method = this.colorize(req.method, 'gray');
    this.error(`${this.colorize('✖', 'red')} ${method} ${req.url}`);
    this.sink(`  ${this.colorize('Error:', 'red')} ${error.message}`);
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger) {
  globalLogger = logger;
}
