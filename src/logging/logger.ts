import { LogLevel, type LogEntry, type LoggerConfig } from './types.js';
import { PinoSink } from './pino-sink.js';
import { redactSecrets } from '../config.js';

const LEVELS = Object.values(LogLevel);

function parseLevel(value: string | undefined): LogLevel {
  const match = LEVELS.find((level) => level === value);
  return match ?? LogLevel.INFO;
}

class Logger {
  private config: LoggerConfig;
  private secrets: string[] = [];
  private consoleSink: PinoSink | null = null;
  private fileSink: PinoSink | null = null;

  constructor() {
    this.config = this.loadConfig();
  }

  private loadConfig(): LoggerConfig {
    return {
      enabled: process.env.LOG_ENABLED !== 'false',
      level: parseLevel(process.env.LOG_LEVEL),
      fileEnabled: process.env.LOG_FILE_ENABLED === 'true',
      filePath: process.env.LOG_FILE_PATH || './logs/taiga-mcp-gateway.log',
      requestsEnabled: process.env.LOG_REQUESTS === 'true',
    };
  }

  private shouldLog(level: LogLevel): boolean {
    if (!this.config.enabled) return false;
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.config.level);
  }

  private redact = (text: string): string => redactSecrets(text, this.secrets);

  // Sinks are opened on first use so that importing the logger has no side effects.
  private sinks(): PinoSink[] {
    if (!this.consoleSink) {
      this.consoleSink = new PinoSink(2, this.redact);
    }
    if (this.config.fileEnabled && !this.fileSink) {
      this.fileSink = new PinoSink(this.config.filePath, this.redact);
    }
    return this.fileSink ? [this.consoleSink, this.fileSink] : [this.consoleSink];
  }

  private log(entry: LogEntry): void {
    if (!this.shouldLog(entry.level)) return;

    if (!entry.timestamp) {
      entry.timestamp = new Date().toISOString();
    }

    for (const sink of this.sinks()) {
      sink.write(entry);
    }
  }

  debug(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.DEBUG, message, data, logger });
  }

  info(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.INFO, message, data, logger });
  }

  notice(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.NOTICE, message, data, logger });
  }

  warning(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.WARNING, message, data, logger });
  }

  error(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.ERROR, message, data, logger });
  }

  critical(message: string, data?: Record<string, unknown>, logger?: string): void {
    this.log({ level: LogLevel.CRITICAL, message, data, logger });
  }

  /**
   * Registers values that must never appear in log output (passwords, shared secrets).
   * Empty values are ignored.
   */
  setSecrets(secrets: Array<string | undefined>): void {
    this.secrets = secrets.filter((secret): secret is string => Boolean(secret));
  }

  isRequestLoggingEnabled(): boolean {
    return this.config.requestsEnabled;
  }

  flush(): void {
    this.consoleSink?.flush();
    this.fileSink?.flush();
  }
}

// Singleton instance
export const logger = new Logger();
