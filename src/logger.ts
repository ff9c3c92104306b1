/**
 * Logger Module
 *
 * Levelled console logging per module. Loggers created without their own
 * level follow the global configuration, including later changes to it.
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggerConfig {
  level: LogLevel;
  timestamps: boolean;
  colors: boolean;
}

// =============================================================================
// Constants
// =============================================================================

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const LABELS: Record<LogLevel, string> = {
  debug: 'DBG',
  info: 'INF',
  warn: 'WRN',
  error: 'ERR',
  silent: '',
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.gray,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
  silent: '',
};

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  timestamps: true,
  colors: true,
};

let globalConfig: LoggerConfig = { ...DEFAULT_CONFIG };

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private overrides: Partial<LoggerConfig>;
  private module: string;

  constructor(module: string, overrides: Partial<LoggerConfig> = {}) {
    this.module = module;
    this.overrides = { ...overrides };
  }

  private get config(): LoggerConfig {
    return { ...globalConfig, ...this.overrides };
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.level];
  }

  /**
   * Render one log line. Exposed for tests and for sinks that bypass the console.
   */
  format(level: LogLevel, message: string, data?: unknown): string {
    const { timestamps, colors } = this.config;
    const paint = (color: string, text: string): string =>
      colors ? `${color}${text}${COLORS.reset}` : text;

    const parts = [
      timestamps ? paint(COLORS.dim, `[${new Date().toISOString()}]`) : '',
      paint(LEVEL_COLORS[level], `[${LABELS[level]}]`),
      paint(COLORS.cyan, `[${this.module}]`),
      message,
    ].filter(Boolean);

    let output = parts.join(' ');

    if (data !== undefined) {
      if (typeof data === 'object' && data !== null) {
        output += '\n' + JSON.stringify(data, null, 2);
      } else {
        output += ` ${String(data)}`;
      }
    }

    return output;
  }

  debug(message: string, data?: unknown): void {
    if (this.shouldLog('debug')) {
      console.log(this.format('debug', message, data));
    }
  }

  info(message: string, data?: unknown): void {
    if (this.shouldLog('info')) {
      console.log(this.format('info', message, data));
    }
  }

  // Diagnostics go to stderr so `run` can keep stdout for step records.
  warn(message: string, data?: unknown): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, data));
    }
  }

  error(message: string, data?: unknown): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, data));
    }
  }

  /**
   * Create a child logger with a sub-module name
   */
  child(subModule: string): Logger {
    return new Logger(`${this.module}:${subModule}`, this.overrides);
  }

  getModule(): string {
    return this.module;
  }

  getLevel(): LogLevel {
    return this.config.level;
  }

  /**
   * Pin the level of this logger, detaching it from the global level
   */
  setLevel(level: LogLevel): void {
    this.overrides.level = level;
  }
}

// =============================================================================
// Global Functions
// =============================================================================

export function configureLogger(config: Partial<LoggerConfig>): void {
  globalConfig = { ...globalConfig, ...config };
}

export function getLoggerConfig(): LoggerConfig {
  return { ...globalConfig };
}

export function setLogLevel(level: LogLevel): void {
  globalConfig.level = level;
}

export function getLogLevel(): LogLevel {
  return globalConfig.level;
}

export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger(module, config);
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Parse log level from string (for CLI)
 */
export function parseLogLevel(value: string): LogLevel | null {
  const normalized = value.toLowerCase();
  return isLogLevel(normalized) ? normalized : null;
}

export function getAvailableLevels(): LogLevel[] {
  return ['debug', 'info', 'warn', 'error', 'silent'];
}

// =============================================================================
// Pre-configured Loggers
// =============================================================================

export const loggers = {
  oscillator: createLogger('oscillator'),
  checkpoint: createLogger('checkpoint'),
  runner: createLogger('runner'),
  mcp: createLogger('mcp'),
};
