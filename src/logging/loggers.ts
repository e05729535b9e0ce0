/**
 * Library loggers.
 *
 * The library only *emits* through LogTape; nothing is written until the
 * host application (or {@link configureConnectLogging}) configures sinks.
 */

import { getLogger, type Logger } from '@logtape/logtape'
import { LOG_CATEGORY, type LogSubsystem } from './config.ts'

/**
 * Get the logger for a subsystem, under the `["garmin-connect", subsystem]`
 * category.
 *
 * @example
 * ```typescript
 * const logger = getConnectLogger('sso')
 * logger.info('Login succeeded', { domain })
 * ```
 */
export function getConnectLogger(subsystem: LogSubsystem): Logger {
	return getLogger([LOG_CATEGORY, subsystem])
}

/** Root logger for the library category */
export const rootLogger: Logger = getLogger([LOG_CATEGORY])
