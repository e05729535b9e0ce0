/**
 * Logging configuration defaults.
 *
 * These values can be overridden through {@link configureConnectLogging}.
 */

import { homedir } from 'node:os'
import { join } from 'node:path'

/** Root LogTape category for everything this library logs */
export const LOG_CATEGORY = 'garmin-connect'

/** Default log directory, beside the default token directory */
export const DEFAULT_LOG_DIR = join(homedir(), '.garminconnect', 'logs')

/** Maximum log file size before rotation (1 MiB) */
export const DEFAULT_MAX_SIZE: number = 0x400 * 0x400

/** Number of rotated files to keep */
export const DEFAULT_MAX_FILES = 5

/** Default log file extension */
export const DEFAULT_LOG_EXTENSION = '.jsonl'

/**
 * Logging level conventions.
 *
 * Note: LogTape uses "warning" not "warn" for consistency with its API.
 *
 * - DEBUG: Request/response detail (status, duration, retry attempts)
 * - INFO: Login, resume, refresh and persistence events
 * - WARNING: Degraded operation (profile lookup failed, retries exhausted)
 * - ERROR: Operation failures surfaced to the caller
 */
export type LogLevel = 'debug' | 'info' | 'warning' | 'error'

/** Default lowest log level to capture */
export const DEFAULT_LOG_LEVEL: LogLevel = 'info'

/** Subsystems, each logged under `[LOG_CATEGORY, subsystem]` */
export type LogSubsystem = 'sso' | 'session' | 'transport' | 'store' | 'client'
