/**
 * Configuration type definitions.
 * Covers project and global config with cascade resolution.
 */

/** Output format options. */
export type OutputFormat = 'json' | 'human';

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
}

/** Backup configuration. */
export interface BackupConfig {
  maxOperationalBackups: number;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the data directory (default: 'logs/backlog.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** File lock configuration. */
export interface LockConfig {
  retries: number;
  staleMs: number;
}

/** Parallel session configuration. */
export interface SessionConfig {
  /** In-progress age after which a task is flagged stale. */
  staleAfterMinutes: number;
}

/** How module-level (coarse) footprint overlap is treated. */
export type ModuleOverlapMode = 'off' | 'warn' | 'block';

/** Conflict detection policy. */
export interface ConflictConfig {
  moduleOverlap: ModuleOverlapMode;
  /** Leading path segments that identify a module. */
  moduleDepth: number;
}

/** Project configuration (config.json). */
export interface BacklogConfig {
  version: string;
  output: OutputConfig;
  backup: BackupConfig;
  logging: LoggingConfig;
  lock: LockConfig;
  session: SessionConfig;
  conflicts: ConflictConfig;
}

/** Configuration resolution priority. */
export type ConfigSource = 'env' | 'project' | 'global' | 'default';

/** A resolved config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
