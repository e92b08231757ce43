/** Structured logger writing JSON lines */

import type {
  Environment,
  EnvironmentConfig,
  LogEntry,
  Logger,
  LoggerConfig,
  LogLevel,
  LogSink,
} from './types.js';

/** Environment-specific configurations */
const ENVIRONMENT_CONFIGS: Record<Environment, EnvironmentConfig> = {
  test: {
    minLevel: 'debug', // Log everything in tests
    includeStackTraces: true,
  },
  development: {
    minLevel: 'info', // Skip debug logs
    includeStackTraces: true,
  },
  production: {
    minLevel: 'warn', // Only warnings and errors
    includeStackTraces: false,
  },
};

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  fatal: 4,
};

/**
 * Map NODE_ENV (or any other value) to a logger environment
 */
export function resolveEnvironment(value: string | undefined): Environment {
  switch (value) {
    case 'test':
    case 'production':
      return value;
    default:
      return 'development';
  }
}

/** Writes each entry as one JSON line to stdout */
export const consoleSink: LogSink = {
  write(entry: LogEntry): void {
    console.log(
      JSON.stringify({
        level: entry.level,
        event_type: entry.event_type,
        metadata: entry.metadata,
        timestamp: new Date(entry.timestamp).toISOString(),
      }),
    );
  },
};

class LoggerImpl implements Logger {
  protected metadata: Record<string, unknown>;
  private sink: LogSink;
  private environment: Environment;
  private envConfig: EnvironmentConfig;

  constructor(config: LoggerConfig, parentMetadata: Record<string, unknown> = {}) {
    this.metadata = parentMetadata;
    this.sink = config.sink ?? consoleSink;
    this.environment = config.environment ?? resolveEnvironment(process.env.NODE_ENV);
    this.envConfig = ENVIRONMENT_CONFIGS[this.environment];
  }

  child(metadata: Record<string, unknown>): Logger {
    return new LoggerImpl(
      {
        sink: this.sink,
        environment: this.environment,
      },
      { ...this.metadata, ...metadata },
    );
  }

  debug(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('debug', event_type, metadata);
  }

  info(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('info', event_type, metadata);
  }

  warn(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('warn', event_type, metadata);
  }

  error(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('error', event_type, metadata);
  }

  fatal(event_type: string, metadata?: Record<string, unknown>): void {
    this.log('fatal', event_type, metadata);
    // Fatal logs flush immediately
    this.flush().catch((err) => {
      console.error('Failed to flush fatal log:', err);
    });
  }

  async flush(): Promise<void> {
    await this.sink.flush?.();
  }

  private log(level: LogLevel, event_type: string, metadata?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.envConfig.minLevel]) {
      return;
    }

    this.sink.write({
      id: this.generateId(),
      level,
      event_type,
      metadata: this.serializeMetadata({ ...this.metadata, ...metadata }),
      timestamp: Date.now(),
    });
  }

  protected serializeMetadata(metadata: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
      if (value instanceof Error) {
        result[key] = {
          name: value.name,
          message: value.message,
          ...(this.envConfig.includeStackTraces ? { stack: value.stack } : {}),
        };
      } else {
        result[key] = value;
      }
    }
    return result;
  }

  protected generateId(): string {
    // Simple ID generation: timestamp + random suffix
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 9);
    return `log_${timestamp}_${random}`;
  }
}

export function createLogger(config: LoggerConfig = {}): Logger {
  return new LoggerImpl(config);
}
