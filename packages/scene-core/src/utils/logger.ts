/**
 * Logger Service
 *
 * Console logger with per-context prefixes. The minimum level comes from
 * SCENE_PREP_LOG_LEVEL, falling back to `warn` when NODE_ENV is production
 * and `debug` otherwise. SCENE_PREP_LOG_TIMESTAMPS=1 prepends ISO times.
 *
 *   [WARN] [Export] File not saved.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerConfig {
  /** Minimum level to log (debug < info < warn < error) */
  minLevel: LogLevel;
  /** Enable/disable all logging */
  enabled: boolean;
  /** Include timestamp in logs */
  includeTimestamp: boolean;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const CONSOLE_METHODS: Record<LogLevel, (...data: unknown[]) => void> = {
  debug: (...data) => console.debug(...data),
  info: (...data) => console.info(...data),
  warn: (...data) => console.warn(...data),
  error: (...data) => console.error(...data),
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

/**
 * Logger settings for an environment
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const override = env.SCENE_PREP_LOG_LEVEL?.toLowerCase();
  return {
    minLevel: isLogLevel(override) ? override : env.NODE_ENV === 'production' ? 'warn' : 'debug',
    enabled: true,
    includeTimestamp: env.SCENE_PREP_LOG_TIMESTAMPS === '1',
  };
}

class Logger {
  private config: LoggerConfig;
  private readonly context: string;
  private readonly children: Logger[] = [];

  constructor(context: string = '', config: Partial<LoggerConfig> = {}) {
    this.context = context;
    this.config = { ...configFromEnv(), ...config };
  }

  private shouldLog(level: LogLevel): boolean {
    if (!this.config.enabled) return false;
    return LOG_LEVELS[level] >= LOG_LEVELS[this.config.minLevel];
  }

  /**
   * Prefix a message with its timestamp, level and context
   */
  format(level: LogLevel, message: string): string {
    const parts: string[] = [];

    if (this.config.includeTimestamp) {
      parts.push(`[${new Date().toISOString()}]`);
    }
    parts.push(`[${level.toUpperCase()}]`);
    if (this.context) {
      parts.push(`[${this.context}]`);
    }
    parts.push(message);

    return parts.join(' ');
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (this.shouldLog(level)) {
      CONSOLE_METHODS[level](this.format(level, message), ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  /**
   * Create a child logger with a nested context. Configuration changes on
   * this logger reach its children.
   */
  child(context: string): Logger {
    const childContext = this.context ? `${this.context}:${context}` : context;
    const child = new Logger(childContext, this.config);
    this.children.push(child);
    return child;
  }

  /**
   * Update logger configuration, here and in every child
   */
  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
    for (const child of this.children) {
      child.configure(config);
    }
  }

  /**
   * Temporarily suppress all logging (useful for tests)
   */
  suppress(): void {
    this.configure({ enabled: false });
  }

  /**
   * Re-enable logging after suppression
   */
  restore(): void {
    this.configure({ enabled: true });
  }
}

export const logger = new Logger();

// One logger per pipeline stage
export const sceneLogger = logger.child('Scene');
export const prepLogger = logger.child('Prep');
export const exportLogger = logger.child('Export');

export { Logger };
export type { LogLevel, LoggerConfig };
