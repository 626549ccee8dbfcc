// RFC 5424 log levels
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  NOTICE = 'notice',
  WARNING = 'warning',
  ERROR = 'error',
  CRITICAL = 'critical',
  ALERT = 'alert',
  EMERGENCY = 'emergency'
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  logger?: string;
  timestamp?: string;
  data?: Record<string, unknown>;
}

export interface LoggerConfig {
  enabled: boolean;
  level: LogLevel;
  fileEnabled: boolean;
  filePath: string;
  requestsEnabled: boolean;
}
