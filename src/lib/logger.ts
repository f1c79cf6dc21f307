/**
 * Structured Logging Utility - Quest Notifier
 *
 * Provides structured JSON logging for CloudWatch with proper
 * log levels, context, and error handling.
 */

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

/**
 * Log entry structure
 */
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    code?: string;
    stack?: string;
  };
}

let configuredLevel: LogLevel | null = null;

/**
 * Parse a level name, falling back to INFO for unknown values
 */
export const parseLogLevel = (value: string | undefined): LogLevel => {
  const level = value?.toUpperCase() || 'INFO';
  const match = Object.values(LogLevel).find((candidate) => candidate === level);
  return match ?? LogLevel.INFO;
};

/**
 * Pin the log level for the lifetime of the process.
 * Called once at startup with the value from AppConfig.
 */
export const setLogLevel = (level: LogLevel): void => {
  configuredLevel = level;
};

/**
 * Get the current log level (pinned level first, then LOG_LEVEL)
 */
const getLogLevel = (): LogLevel => {
  return configuredLevel ?? parseLogLevel(process.env['LOG_LEVEL']);
};

/**
 * Check if a log level should be logged based on current configuration
 */
const shouldLog = (level: LogLevel): boolean => {
  const levels = Object.values(LogLevel);

  return levels.indexOf(level) >= levels.indexOf(getLogLevel());
};

/**
 * Format and output a log entry
 */
const writeLog = (entry: LogEntry): void => {
  if (!shouldLog(entry.level)) {
    return;
  }

  const logOutput = JSON.stringify(entry);

  // Use console methods for proper CloudWatch integration
  switch (entry.level) {
    case LogLevel.ERROR:
      console.error(logOutput);
      break;
    case LogLevel.WARN:
      console.warn(logOutput);
      break;
    case LogLevel.DEBUG:
      console.debug(logOutput);
      break;
    case LogLevel.INFO:
    default:
      console.log(logOutput);
      break;
  }
};

const describeError = (error: Error): NonNullable<LogEntry['error']> => {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    code,
    stack: error.stack,
  };
};

/**
 * Logger class with context
 */
export class Logger {
  private readonly context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}) {
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger({ ...this.context, ...additionalContext });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.DEBUG,
      message,
      context: { ...this.context, ...context },
    });
  }

  info(message: string, context?: Record<string, unknown>): void {
    writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.INFO,
      message,
      context: { ...this.context, ...context },
    });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.WARN,
      message,
      context: { ...this.context, ...context },
    });
  }

  /**
   * Log an error message
   */
  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    writeLog({
      timestamp: new Date().toISOString(),
      level: LogLevel.ERROR,
      message,
      context: { ...this.context, ...context },
      error: error ? describeError(error) : undefined,
    });
  }
}

/**
 * Default logger instance
 */
export const logger = new Logger({ service: 'quest-notifier' });

/**
 * Create a logger with Lambda context
 */
export const createLambdaLogger = (awsRequestId?: string): Logger => {
  return new Logger({
    requestId: awsRequestId,
    service: 'quest-notifier',
  });
};

/**
 * Log Lambda function invocation
 */
export const logLambdaInvocation = (
  functionName: string,
  event: unknown,
  requestId?: string
): void => {
  const logger = createLambdaLogger(requestId);
  logger.info('Lambda invocation started', {
    functionName,
    eventType: typeof event,
  });
};

/**
 * Log Lambda function completion
 */
export const logLambdaCompletion = (
  functionName: string,
  duration: number,
  requestId?: string
): void => {
  const logger = createLambdaLogger(requestId);
  logger.info('Lambda invocation completed', {
    functionName,
    durationMs: duration,
  });
};

/**
 * Log Lambda function error
 */
export const logLambdaError = (
  functionName: string,
  error: Error,
  requestId?: string
): void => {
  const logger = createLambdaLogger(requestId);
  logger.error(`Lambda invocation failed: ${functionName}`, error);
};
