/**
 * Opt-in logging setup.
 *
 * Configures LogTape for the library's category with:
 * - JSONL file output with rotation
 * - Hierarchical categories for subsystem filtering (sso, session, ...)
 * - A log location beside the default token directory
 *   (~/.garminconnect/logs/garmin-connect.jsonl)
 *
 * Applications that already configure LogTape do not need this; they only
 * have to route the `["garmin-connect"]` category to their own sinks.
 */

import { mkdirSync } from 'node:fs'
import { join } from 'node:path'
import { getRotatingFileSink } from '@logtape/file'
import { configure, jsonLinesFormatter } from '@logtape/logtape'
import {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	LOG_CATEGORY,
	type LogLevel,
} from './config.ts'
import { rootLogger } from './loggers.ts'

/**
 * Options for {@link configureConnectLogging}.
 */
export interface ConnectLoggingOptions {
	/** Log directory. Defaults to ~/.garminconnect/logs/ */
	logDir?: string

	/**
	 * Log file name (without extension). Defaults to "garmin-connect".
	 * Results in: <logDir>/<logFileName>.jsonl
	 */
	logFileName?: string

	/** Maximum log file size before rotation. Defaults to 1 MiB. */
	maxSize?: number

	/** Number of rotated files to keep. Defaults to 5. */
	maxFiles?: number

	/** Lowest log level to capture. Defaults to "info". */
	lowestLevel?: LogLevel
}

/**
 * Where logs are written once configured.
 */
export interface ConnectLoggingTarget {
	logDir: string
	logFile: string
	/** False when LogTape was already configured elsewhere and was left alone */
	configured: boolean
}

/**
 * Route the library's log category to a rotating JSONL file.
 *
 * Safe to call when LogTape is already configured (by the host application
 * or a test setup): the existing configuration is kept.
 *
 * @example
 * ```typescript
 * import { configureConnectLogging } from 'garmin-connect-kit/logging'
 *
 * const { logFile } = await configureConnectLogging({ lowestLevel: 'debug' })
 * ```
 */
export async function configureConnectLogging(
	options: ConnectLoggingOptions = {},
): Promise<ConnectLoggingTarget> {
	const {
		logDir = DEFAULT_LOG_DIR,
		logFileName = LOG_CATEGORY,
		maxSize = DEFAULT_MAX_SIZE,
		maxFiles = DEFAULT_MAX_FILES,
		lowestLevel = DEFAULT_LOG_LEVEL,
	} = options

	const logFile = join(logDir, `${logFileName}${DEFAULT_LOG_EXTENSION}`)
	mkdirSync(logDir, { recursive: true })

	const sinkName = `file_${LOG_CATEGORY}`

	try {
		await configure({
			sinks: {
				[sinkName]: getRotatingFileSink(logFile, {
					formatter: jsonLinesFormatter,
					maxSize,
					maxFiles,
				}),
			},
			loggers: [
				{
					category: [LOG_CATEGORY],
					sinks: [sinkName],
					lowestLevel,
				},
				{
					category: ['logtape', 'meta'],
					sinks: [sinkName],
					lowestLevel: 'error',
				},
			],
		})
	} catch (error: unknown) {
		// LogTape refuses a second configure() without reset; keep the host's setup
		if (
			error instanceof Error &&
			error.message.includes('Already configured')
		) {
			return { logDir, logFile, configured: false }
		}
		throw error
	}

	rootLogger.info('Logging initialized', {
		logDir,
		logFile,
		maxSize,
		maxFiles,
	})

	return { logDir, logFile, configured: true }
}
