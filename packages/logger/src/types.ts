export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export type Environment = 'test' | 'development' | 'production';

export interface EnvironmentConfig {
  minLevel: LogLevel;
  includeStackTraces: boolean;
}

export interface LogEntry {
  id: string;
  level: LogLevel;
  event_type: string;
  metadata: Record<string, unknown>;
  timestamp: number;
}

/**
 * Destination for log entries
 */
export interface LogSink {
  write(entry: LogEntry): void;
  /** Called by Logger.flush(), when the sink buffers */
  flush?(): Promise<void>;
}

export interface Logger {
  /**
   * Create a child logger with additional metadata merged in.
   * Child loggers inherit all parent metadata.
   */
  child(metadata: Record<string, unknown>): Logger;

  debug(event_type: string, metadata?: Record<string, unknown>): void;

  info(event_type: string, metadata?: Record<string, unknown>): void;

  warn(event_type: string, metadata?: Record<string, unknown>): void;

  error(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Log at fatal level (flushes the sink immediately)
   */
  fatal(event_type: string, metadata?: Record<string, unknown>): void;

  /**
   * Flush entries buffered by the sink
   */
  flush(): Promise<void>;
}

export interface LoggerConfig {
  /** Defaults to the environment named by NODE_ENV */
  environment?: Environment;
  /** Defaults to JSON lines on the console */
  sink?: LogSink;
}
