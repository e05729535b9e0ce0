import * as fs from 'node:fs'
import * as path from 'node:path'
import { afterEach, describe, expect, test } from 'vitest'
import { CredentialFormatError, CredentialNotFoundError } from '../errors/index.ts'
import { cleanupTestDir, createTempDir } from '../testing/index.ts'
import {
	clearCredentials,
	dumpCredentials,
	loadCredentials,
	OAUTH1_FILENAME,
	OAUTH2_FILENAME,
	parseCredentials,
	saveCredentials,
	saveOAuth2Credential,
} from './credential-store.ts'
import { type CredentialPair, OAuth1Credential, OAuth2Credential } from './credentials.ts'

function makePair(accessToken = 'test-access'): CredentialPair {
	return {
		oauth1: new OAuth1Credential({
			token: 'test-oauth1-token',
			secret: 'test-oauth1-secret',
			mfaToken: 'test-mfa-token',
			domain: 'garmin.com',
		}),
		oauth2: new OAuth2Credential({
			accessToken,
			refreshToken: 'test-refresh',
			scope: 'CONNECT_READ',
			jti: 'test-jti',
			expiresIn: 3600,
			expiresAt: 1_800_000_000,
			refreshTokenExpiresIn: 7200,
			refreshTokenExpiresAt: 1_800_003_600,
		}),
	}
}

describe('directory form', () => {
	let tmpDir: string

	afterEach(() => {
		if (tmpDir) cleanupTestDir(tmpDir)
	})

	test('load(save(dir, pair)) returns the same pair', () => {
		tmpDir = createTempDir('garmin-store-')
		const pair = makePair()

		saveCredentials(tmpDir, pair)

		expect(loadCredentials(tmpDir)).toEqual(pair)
	})

	test('creates missing parent directories', () => {
		tmpDir = createTempDir('garmin-store-')
		const nested = path.join(tmpDir, 'a', 'b')

		expect(saveCredentials(nested, makePair())).toBe(nested)
		expect(fs.existsSync(path.join(nested, OAUTH1_FILENAME))).toBe(true)
	})

	test('writes pretty-printed JSON with owner-only permissions and no temp files', () => {
		tmpDir = createTempDir('garmin-store-')
		saveCredentials(tmpDir, makePair())

		const content = fs.readFileSync(path.join(tmpDir, OAUTH1_FILENAME), 'utf8')
		expect(content.split('\n')[1]).toBe('  "oauth_token": "test-oauth1-token",')
		expect(fs.statSync(path.join(tmpDir, OAUTH2_FILENAME)).mode & 0o777).toBe(0o600)
		expect(fs.readdirSync(tmpDir).sort()).toEqual([OAUTH1_FILENAME, OAUTH2_FILENAME])
	})

	test('saveOAuth2Credential leaves the OAuth1 file untouched', () => {
		tmpDir = createTempDir('garmin-store-')
		saveCredentials(tmpDir, makePair('first-access'))
		const oauth1Before = fs.readFileSync(path.join(tmpDir, OAUTH1_FILENAME), 'utf8')

		saveOAuth2Credential(tmpDir, new OAuth2Credential({ accessToken: 'second-access', expiresAt: 1_900_000_000 }))

		expect(fs.readFileSync(path.join(tmpDir, OAUTH1_FILENAME), 'utf8')).toBe(oauth1Before)
		const loaded = loadCredentials(tmpDir)
		expect(loaded.oauth2.accessToken).toBe('second-access')
		expect(loaded.oauth1.token).toBe('test-oauth1-token')
	})

	test('load on a missing directory raises CredentialNotFoundError', () => {
		tmpDir = createTempDir('garmin-store-')
		const missing = path.join(tmpDir, 'nope')

		expect(() => loadCredentials(missing)).toThrow(CredentialNotFoundError)
		expect(() => loadCredentials(missing)).toThrow(`Token directory not found: ${missing}`)
	})

	test('load names the specific missing file', () => {
		tmpDir = createTempDir('garmin-store-')
		saveCredentials(tmpDir, makePair())
		const oauth2Path = path.join(tmpDir, OAUTH2_FILENAME)
		fs.rmSync(oauth2Path)

		try {
			loadCredentials(tmpDir)
			expect.unreachable('load should fail')
		} catch (error) {
			expect(error).toBeInstanceOf(CredentialNotFoundError)
			if (error instanceof CredentialNotFoundError) {
				expect(error.path).toBe(oauth2Path)
				expect(error.message).toBe(`OAuth2 token file not found: ${oauth2Path}`)
			}
		}
	})

	test('load rejects a corrupt file', () => {
		tmpDir = createTempDir('garmin-store-')
		saveCredentials(tmpDir, makePair())
		fs.writeFileSync(path.join(tmpDir, OAUTH1_FILENAME), '{ not json')

		expect(() => loadCredentials(tmpDir)).toThrow(CredentialFormatError)
	})

	test('clearCredentials removes both files and tolerates missing ones', () => {
		tmpDir = createTempDir('garmin-store-')
		saveCredentials(tmpDir, makePair())

		clearCredentials(tmpDir)
		clearCredentials(tmpDir)

		expect(fs.readdirSync(tmpDir)).toEqual([])
	})
})

describe('string form', () => {
	test('parse(dump(pair)) returns the same pair', () => {
		const pair = makePair()
		expect(parseCredentials(dumpCredentials(pair))).toEqual(pair)
	})

	test('dump is base64 of the [oauth1, oauth2] JSON array', () => {
		const pair = makePair()
		const decoded = JSON.parse(Buffer.from(dumpCredentials(pair), 'base64').toString('utf8'))

		expect(decoded).toEqual([pair.oauth1.toMap(), pair.oauth2.toMap()])
		expect(dumpCredentials(pair)).not.toContain('\n')
	})

	test('reads a string encoded elsewhere with null optionals', () => {
		const encoded = Buffer.from(
			JSON.stringify([
				{ oauth_token: 't', oauth_token_secret: 's', mfa_token: null, mfa_expiration_timestamp: null, domain: 'garmin.com' },
				{ access_token: 'a', token_type: 'Bearer', expires_in: 3600, expires_at: 1_800_000_000 },
			]),
		).toString('base64')

		const pair = parseCredentials(encoded)
		expect(pair.oauth1.token).toBe('t')
		expect(pair.oauth2.authorizationValue()).toBe('Bearer a')
	})

	test.each([
		['not base64', 'not base64!'],
		['empty', ''],
		['unpadded', 'YWJj' + 'ZA'],
	])('rejects malformed base64 (%s)', (_label, input) => {
		expect(() => parseCredentials(input)).toThrow('Credential string is not valid base64')
	})

	test('rejects base64 that is not JSON', () => {
		const encoded = Buffer.from('hello world').toString('base64')
		expect(() => parseCredentials(encoded)).toThrow(CredentialFormatError)
	})

	test('rejects JSON that is not a pair', () => {
		const encoded = Buffer.from(JSON.stringify({ oauth1: {} })).toString('base64')
		expect(() => parseCredentials(encoded)).toThrow('Credential string must decode to [oauth1, oauth2]')
	})
})
