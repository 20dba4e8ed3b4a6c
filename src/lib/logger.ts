/**
 * Levelled, module-scoped logging on top of the console.
 * Everything is written to stderr so stdout stays free for command output.
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 4,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.NONE]: 'NONE',
};

const LEVELS_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  none: LogLevel.NONE,
};

interface LoggerConfig {
  /** Minimum log level to output */
  minLevel: LogLevel;
  timestamps: boolean;
  showModule: boolean;
}

/**
 * LOG_LEVEL wins; otherwise production only shows warnings and errors.
 */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LOG_LEVEL?.trim().toLowerCase();
  if (requested && requested in LEVELS_BY_NAME) {
    return LEVELS_BY_NAME[requested];
  }
  return env.NODE_ENV === 'production' ? LogLevel.WARN : LogLevel.INFO;
}

let config: LoggerConfig = {
  minLevel: levelFromEnv(),
  timestamps: true,
  showModule: true,
};

export function configureLogger(newConfig: Partial<LoggerConfig>): void {
  config = { ...config, ...newConfig };
}

export function setLogLevel(level: LogLevel): void {
  config.minLevel = level;
}

function formatMessage(level: LogLevel, module: string | undefined, message: string): string {
  const parts: string[] = [];

  if (config.timestamps) {
    parts.push(`[${new Date().toISOString()}]`);
  }

  parts.push(`[${LOG_LEVEL_NAMES[level]}]`);

  if (config.showModule && module) {
    parts.push(`[${module}]`);
  }

  parts.push(message);

  return parts.join(' ');
}

const SENSITIVE_KEY = /token|password|secret|key|authorization/i;

/**
 * Redacts credential-looking fields and long opaque strings from logged data.
 */
export function sanitize(data: unknown): unknown {
  if (data === null || data === undefined) {
    return data;
  }

  if (data instanceof Error) {
    return data;
  }

  if (typeof data === 'string') {
    return data.replace(/[a-zA-Z0-9]{32,}/g, '[REDACTED]');
  }

  if (Array.isArray(data)) {
    return data.map(sanitize);
  }

  if (typeof data === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      sanitized[key] = SENSITIVE_KEY.test(key) ? '[REDACTED]' : sanitize(value);
    }
    return sanitized;
  }

  return data;
}

function log(level: LogLevel, module: string | undefined, message: string, ...data: unknown[]): void {
  if (level < config.minLevel || level === LogLevel.NONE) {
    return;
  }

  const formattedMessage = formatMessage(level, module, message);
  const sanitizedData = data.map(sanitize);

  if (level === LogLevel.WARN) {
    console.warn(formattedMessage, ...sanitizedData);
  } else {
    console.error(formattedMessage, ...sanitizedData);
  }
}

/**
 * Create a scoped logger for a specific module
 */
export function createLogger(module: string) {
  return {
    debug: (message: string, ...data: unknown[]) => log(LogLevel.DEBUG, module, message, ...data),
    info: (message: string, ...data: unknown[]) => log(LogLevel.INFO, module, message, ...data),
    warn: (message: string, ...data: unknown[]) => log(LogLevel.WARN, module, message, ...data),
    error: (message: string, ...data: unknown[]) => log(LogLevel.ERROR, module, message, ...data),
  };
}
