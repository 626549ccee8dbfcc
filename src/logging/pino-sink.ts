import pino from 'pino';
import { LogLevel, type LogEntry } from './types.js';

type PinoLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export class PinoSink {
  private pino: pino.Logger;

  // dest is a file path, or a file descriptor (2 = stderr)
  constructor(dest: string | number, private readonly redact: (text: string) => string) {
    this.pino = pino({
      level: 'debug', // filtering happens in logger.ts

      formatters: {
        level: (label) => ({ level: label }),
      },

      timestamp: pino.stdTimeFunctions.isoTime,

      redact: {
        paths: ['*.token', '*.auth_token', '*.password', '*.api_key', 'Authorization'],
        censor: '***REDACTED***',
      },
    },
    pino.destination({
      dest,
      sync: false,
      mkdir: typeof dest === 'string',
    }));
  }

  write(entry: LogEntry): void {
    try {
      const safeMessage = this.redact(entry.message);
      const safeData: Record<string, unknown> | undefined = entry.data
        ? JSON.parse(this.redact(JSON.stringify(entry.data)))
        : undefined;

      this.pino[this.mapToPinoLevel(entry.level)]({
        severity: entry.level,
        logger: entry.logger,
        timestamp: entry.timestamp || new Date().toISOString(),
        ...safeData,
      }, safeMessage);
    } catch (error) {
      console.error('[PinoSink] Failed to write log:', error);
    }
  }

  flush(): void {
    this.pino.flush();
  }

  // RFC 5424 levels onto pino's standard levels
  private mapToPinoLevel(level: LogLevel): PinoLevel {
    switch (level) {
      case LogLevel.DEBUG: return 'debug';
      case LogLevel.INFO: return 'info';
      case LogLevel.NOTICE: return 'info';
      case LogLevel.WARNING: return 'warn';
      case LogLevel.ERROR: return 'error';
      case LogLevel.CRITICAL: return 'error';
      case LogLevel.ALERT: return 'fatal';
      case LogLevel.EMERGENCY: return 'fatal';
      default: return 'info';
    }
  }
}
