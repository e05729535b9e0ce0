/**
 * Credential persistence.
 *
 * Two interchangeable forms, both readable by the peer implementation (garth):
 *
 * - **Directory form**: `oauth1_token.json` and `oauth2_token.json`,
 *   pretty-printed, one credential map per file.
 * - **String form**: base64 (standard alphabet, padded, no line wrapping) of
 *   the JSON array `[oauth1_map, oauth2_map]`.
 *
 * Files are written atomically (temp file → rename) with owner-only
 * permissions.
 *
 * @module auth/credential-store
 */

import * as fs from 'node:fs'
import * as path from 'node:path'
import { CredentialFormatError, CredentialNotFoundError } from '../errors/index.ts'
import { getConnectLogger } from '../logging/index.ts'
import { getErrorMessage } from '../utils/string.ts'
import { type CredentialPair, OAuth1Credential, OAuth2Credential } from './credentials.ts'

export const OAUTH1_FILENAME = 'oauth1_token.json'
export const OAUTH2_FILENAME = 'oauth2_token.json'

const STRICT_BASE64 = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/

const logger = getConnectLogger('store')

function writeJsonFile(filePath: string, data: unknown): void {
	// Atomic write: temp file → rename
	const tempPath = `${filePath}.tmp`
	fs.writeFileSync(tempPath, `${JSON.stringify(data, null, 2)}\n`, { mode: 0o600 })
	fs.renameSync(tempPath, filePath)
}

function readJsonFile(filePath: string): unknown {
	const content = fs.readFileSync(filePath, 'utf8')
	try {
		return JSON.parse(content)
	} catch (error) {
		throw new CredentialFormatError(
			`Credential file is not valid JSON: ${filePath}`,
			{ path: filePath },
			error instanceof Error ? error : undefined,
		)
	}
}

function ensureDirectory(directory: string): void {
	if (!fs.existsSync(directory)) {
		fs.mkdirSync(directory, { recursive: true, mode: 0o700 })
	}
}

/**
 * Write both credentials to a directory, creating it (and parents) if absent.
 * Overwrites existing files.
 *
 * @returns The directory written to
 */
export function saveCredentials(directory: string, pair: CredentialPair): string {
	ensureDirectory(directory)
	writeJsonFile(path.join(directory, OAUTH1_FILENAME), pair.oauth1.toMap())
	writeJsonFile(path.join(directory, OAUTH2_FILENAME), pair.oauth2.toMap())
	logger.debug('Saved credentials to {directory}', { directory })
	return directory
}

/**
 * Write only the OAuth2 credential. Used after a refresh; the OAuth1 file is
 * left untouched.
 *
 * @returns The directory written to
 */
export function saveOAuth2Credential(directory: string, oauth2: OAuth2Credential): string {
	ensureDirectory(directory)
	writeJsonFile(path.join(directory, OAUTH2_FILENAME), oauth2.toMap())
	logger.debug('Saved refreshed OAuth2 credential to {directory}', { directory })
	return directory
}

/**
 * Load the credential pair from a directory.
 *
 * @throws {CredentialNotFoundError} If the directory or either file is missing;
 * the error names the missing path
 * @throws {CredentialFormatError} If a file is not a valid credential map
 */
export function loadCredentials(directory: string): CredentialPair {
	const oauth1Path = path.join(directory, OAUTH1_FILENAME)
	const oauth2Path = path.join(directory, OAUTH2_FILENAME)

	if (!fs.existsSync(directory)) {
		throw new CredentialNotFoundError(`Token directory not found: ${directory}`, directory)
	}
	if (!fs.existsSync(oauth1Path)) {
		throw new CredentialNotFoundError(`OAuth1 token file not found: ${oauth1Path}`, oauth1Path)
	}
	if (!fs.existsSync(oauth2Path)) {
		throw new CredentialNotFoundError(`OAuth2 token file not found: ${oauth2Path}`, oauth2Path)
	}

	const pair = {
		oauth1: OAuth1Credential.fromMap(readJsonFile(oauth1Path)),
		oauth2: OAuth2Credential.fromMap(readJsonFile(oauth2Path)),
	}
	logger.debug('Loaded credentials from {directory}', { directory })
	return pair
}

/**
 * Remove both credential files from a directory. Missing files are ignored;
 * the directory itself is kept.
 */
export function clearCredentials(directory: string): void {
	for (const name of [OAUTH1_FILENAME, OAUTH2_FILENAME]) {
		fs.rmSync(path.join(directory, name), { force: true })
	}
	logger.debug('Cleared credentials in {directory}', { directory })
}

/**
 * Encode the pair as a single portable string.
 *
 * @example
 * ```typescript
 * const encoded = dumpCredentials(client.session.credentials)
 * process.env.GARMIN_TOKENS = encoded
 * ```
 */
export function dumpCredentials(pair: CredentialPair): string {
	const payload = [pair.oauth1.toMap(), pair.oauth2.toMap()]
	return Buffer.from(JSON.stringify(payload), 'utf8').toString('base64')
}

/**
 * Decode a string produced by {@link dumpCredentials} (or the peer's
 * equivalent).
 *
 * @throws {CredentialFormatError} If the input is not strict base64, not JSON,
 * or not a two-element array of credential maps
 */
export function parseCredentials(encoded: string): CredentialPair {
	const trimmed = encoded.trim()
	if (trimmed.length === 0 || !STRICT_BASE64.test(trimmed)) {
		throw new CredentialFormatError('Credential string is not valid base64', { length: encoded.length })
	}

	let decoded: unknown
	try {
		decoded = JSON.parse(Buffer.from(trimmed, 'base64').toString('utf8'))
	} catch (error) {
		throw new CredentialFormatError(
			`Credential string does not decode to JSON: ${getErrorMessage(error)}`,
			{},
			error instanceof Error ? error : undefined,
		)
	}

	if (!Array.isArray(decoded) || decoded.length < 2) {
		throw new CredentialFormatError('Credential string must decode to [oauth1, oauth2]', {
			shape: Array.isArray(decoded) ? `array(${decoded.length})` : typeof decoded,
		})
	}

	return {
		oauth1: OAuth1Credential.fromMap(decoded[0]),
		oauth2: OAuth2Credential.fromMap(decoded[1]),
	}
}
