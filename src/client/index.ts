/**
 * Client and its options.
 *
 * ## Usage
 *
 * ```typescript
 * import { ConnectClient, optionsFromEnv } from 'garmin-connect-kit/client'
 *
 * const client = new ConnectClient(optionsFromEnv())
 * await client.login()
 * console.log(client.profile.displayName)
 * ```
 *
 * @module client
 */

export { ConnectClient, type CredentialSource, login } from './client.ts'
export {
	type ClientOptions,
	ClientOptionsSchema,
	DEFAULT_TOKEN_DIR,
	expandHome,
	optionsFromEnv,
	type ResolvedOptions,
	resolveOptions,
} from './options.ts'
