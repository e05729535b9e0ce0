/**
 * Logging for the Garmin Connect client.
 *
 * Built on LogTape:
 * - Library code emits under the `["garmin-connect", <subsystem>]` categories
 * - Optional JSONL file output with rotation (1MB default, 5 files)
 * - Correlation IDs for request tracing
 *
 * @example
 * ```typescript
 * import { configureConnectLogging } from 'garmin-connect-kit/logging'
 *
 * // At the application entry point, if it doesn't configure LogTape itself
 * await configureConnectLogging({ lowestLevel: 'debug' })
 * ```
 *
 * @packageDocumentation
 */

export {
	DEFAULT_LOG_DIR,
	DEFAULT_LOG_EXTENSION,
	DEFAULT_LOG_LEVEL,
	DEFAULT_MAX_FILES,
	DEFAULT_MAX_SIZE,
	LOG_CATEGORY,
	type LogLevel,
	type LogSubsystem,
} from './config.ts'
export { createCorrelationId } from './correlation.ts'
export {
	type ConnectLoggingOptions,
	type ConnectLoggingTarget,
	configureConnectLogging,
} from './factory.ts'
export { getConnectLogger } from './loggers.ts'
export { describeUrl } from './redact.ts'
