export type LogLevel = 'INFO' | 'WARN' | 'ERROR' | 'ACTION';

/** One audit line; `raw` is what a log viewer searches and prints. */
export interface AuditLogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  detail: string | null;
  raw: string;
}
