/**
 * Common types and interfaces for the pkupdates application
 */

// Core application types
export interface PkUpdatesDirectories {
  config: string;
  state: string;
}

export interface PkUpdatesConfig {
  /**
   * Age (in minutes) under which a non-forced check reuses the daemon cache
   * instead of refreshing it first.
   */
  cacheMaxAgeMinutes: number;

  /** Whether automatic checks may run while on battery power. */
  checkOnBattery: boolean;

  /** Whether automatic checks may run on a metered (mobile) connection. */
  checkOnMobile: boolean;

  /**
   * Re-run an install that the daemon refused with "needs untrusted"
   * without the only-trusted restriction.
   */
  retryUntrusted: boolean;
}

export interface PersistedState {
  lastRefreshTimestamp?: number;
}

// Command option types

export interface CheckOptions {
  force?: boolean;
}

export interface InstallCommandOptions {
  all?: boolean;
  simulate?: boolean;
  allowUntrusted?: boolean;
  acceptEulas?: boolean;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Error types
export class PkUpdatesError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PkUpdatesError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  DAEMON_ERROR = 'DAEMON_ERROR',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
