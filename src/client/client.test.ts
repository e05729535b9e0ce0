import * as fs from 'node:fs'
import * as path from 'node:path'
import { afterEach, beforeEach, describe, expect, test } from 'vitest'
import { requireDisplayName } from '../api/context.ts'
import { dumpCredentials, loadCredentials, OAUTH1_FILENAME, saveCredentials } from '../auth/credential-store.ts'
import { type CredentialPair, OAuth1Credential, OAuth2Credential } from '../auth/credentials.ts'
import { AuthenticationError, ConnectError, ParseError } from '../errors/index.ts'
import { cleanupTestDir, createFetchScript, createTempDir, type FetchScript } from '../testing/index.ts'
import { ConnectClient, login } from './client.ts'

const SETTINGS = { id: 9001, userData: { measurementSystem: 'metric' } }
const PROFILE = { displayName: 'trail-runner', fullName: 'Test Runner', profileId: 4242 }

function makePair(domain = 'garmin.com', accessToken = 'stored-access'): CredentialPair {
	return {
		oauth1: new OAuth1Credential({ token: 'test-oauth1-token', secret: 'test-oauth1-secret', domain }),
		oauth2: new OAuth2Credential({ accessToken, refreshToken: 'test-refresh', expiresIn: 3600 }),
	}
}

function profileScript(profile: unknown = PROFILE): FetchScript {
	return createFetchScript()
		.on('GET', '/userprofile-service/userprofile/user-settings', { json: SETTINGS })
		.on('GET', '/userprofile-service/userprofile/profile', { json: profile })
}

/** Answers every step of a successful SSO login without MFA */
function withSsoLogin(script: FetchScript): FetchScript {
	return script
		.on('GET', '/sso/embed', { body: '<html>embed</html>' })
		.on('GET', '/sso/signin', { body: '<input type="hidden" name="_csrf" value="csrf-signin" />' })
		.on('POST', '/sso/signin', {
			body: '<title>Success</title><script>var url = "embed?ticket=ST-0002-test";</script>',
		})
		.on('GET', 'thegarth.s3.amazonaws.com', {
			json: { consumer_key: 'test-consumer-key', consumer_secret: 'test-consumer-secret' },
		})
		.on('GET', '/oauth-service/oauth/preauthorized', {
			body: 'oauth_token=fresh-oauth1-token&oauth_token_secret=fresh-oauth1-secret',
		})
		.on('POST', '/oauth-service/oauth/exchange/user/2.0', {
			json: { access_token: 'fresh-access', refresh_token: 'fresh-refresh', expires_in: 3600 },
		})
}

function paths(script: FetchScript): string[] {
	return script.calls.map((call) => `${call.method} ${new URL(call.url).host}${new URL(call.url).pathname}`)
}

describe('ConnectClient.login', () => {
	let tmpDir: string

	beforeEach(() => {
		tmpDir = createTempDir('garmin-client-')
	})

	afterEach(() => {
		cleanupTestDir(tmpDir)
	})

	test('resumes from a token string and loads the profile', async () => {
		const script = profileScript()
		const client = new ConnectClient({ tokenString: dumpCredentials(makePair()), tokenDir: null, fetch: script.fetch })

		await client.login()

		expect(client.authenticated).toBe(true)
		expect(client.credentialSource).toBe('token-string')
		expect(client.profile).toEqual({
			unitSystem: 'metric',
			displayName: 'trail-runner',
			fullName: 'Test Runner',
			userProfilePk: 4242,
		})
		expect(paths(script)).toEqual([
			'GET connectapi.garmin.com/userprofile-service/userprofile/user-settings',
			'GET connectapi.garmin.com/userprofile-service/userprofile/profile',
		])
		expect(script.calls[0]?.headers.get('authorization')).toBe('Bearer stored-access')
	})

	test('resumes from the token directory, using the stored domain', async () => {
		saveCredentials(tmpDir, makePair('garmin.cn'))
		const script = profileScript()
		const client = new ConnectClient({ tokenDir: tmpDir, fetch: script.fetch })

		await client.login()

		expect(client.credentialSource).toBe('token-dir')
		expect(client.session.domain).toBe('garmin.cn')
		expect(script.calls[0]?.url).toBe('https://connectapi.garmin.cn/userprofile-service/userprofile/user-settings')
	})

	test.each([
		['socialProfile.displayName', { socialProfile: { displayName: 'nested-name' }, userName: 'user-name' }, 'nested-name'],
		['userName', { userName: 'user-name' }, 'user-name'],
		['displayName first', { displayName: 'top', socialProfile: { displayName: 'nested' }, userName: 'user' }, 'top'],
	])('display name falls back to %s', async (_label, profile, expected) => {
		const client = new ConnectClient({
			tokenString: dumpCredentials(makePair()),
			tokenDir: null,
			fetch: profileScript(profile).fetch,
		})

		await client.login()

		expect(client.profile.displayName).toBe(expected)
	})

	test('reads each profile field on its own when one has an unexpected type', async () => {
		const client = new ConnectClient({
			tokenString: dumpCredentials(makePair()),
			tokenDir: null,
			fetch: profileScript({ displayName: 'runner', fullName: 42, profileId: '4242' }).fetch,
		})

		await client.login()

		expect(client.profile).toEqual({ unitSystem: 'metric', displayName: 'runner', userProfilePk: 4242 })
		expect(client.profile.fullName).toBeUndefined()
	})

	test('uses the settings id when the profile has no profileId', async () => {
		const client = new ConnectClient({
			tokenString: dumpCredentials(makePair()),
			tokenDir: null,
			fetch: profileScript({ displayName: 'trail-runner' }).fetch,
		})

		await client.login()

		expect(client.profile.userProfilePk).toBe(9001)
	})

	test('an HTTP error during the profile lookup is not fatal', async () => {
		const script = createFetchScript()
			.on('GET', 'user-settings', { json: SETTINGS })
			.on('GET', 'userprofile/profile', { status: 404, body: 'missing' })
		const client = new ConnectClient({ tokenString: dumpCredentials(makePair()), tokenDir: null, fetch: script.fetch })

		await client.login()

		expect(client.authenticated).toBe(true)
		expect(client.profile.unitSystem).toBe('metric')
		expect(client.profile.displayName).toBeUndefined()
		expect(() => requireDisplayName(client)).toThrow(AuthenticationError)
	})

	test('other errors during the profile lookup propagate', async () => {
		const script = createFetchScript()
			.on('GET', 'user-settings', { json: SETTINGS })
			.on('GET', 'userprofile/profile', { body: '<html>', headers: { 'content-type': 'application/json' } })
		const client = new ConnectClient({ tokenString: dumpCredentials(makePair()), tokenDir: null, fetch: script.fetch })

		await expect(client.login()).rejects.toThrow(ParseError)
	})

	test('without stored tokens or a password it raises AuthenticationError', async () => {
		const client = new ConnectClient({ tokenDir: path.join(tmpDir, 'absent'), fetch: createFetchScript().fetch })

		await expect(client.login()).rejects.toThrow(new AuthenticationError('No credentials or saved tokens available'))
		expect(client.authenticated).toBe(false)
	})

	test('logs in with email and password and persists the new pair', async () => {
		const tokenDir = path.join(tmpDir, 'tokens')
		const script = withSsoLogin(profileScript())
		const client = new ConnectClient({
			email: 'athlete@example.com',
			password: 'test-password',
			tokenDir,
			fetch: script.fetch,
		})

		await client.login()

		expect(client.credentialSource).toBe('login')
		expect(client.profile.displayName).toBe('trail-runner')
		const saved = loadCredentials(tokenDir)
		expect(saved.oauth1.token).toBe('fresh-oauth1-token')
		expect(saved.oauth2.accessToken).toBe('fresh-access')
		expect(paths(script).slice(-2)).toEqual([
			'GET connectapi.garmin.com/userprofile-service/userprofile/user-settings',
			'GET connectapi.garmin.com/userprofile-service/userprofile/profile',
		])
	})

	test('a corrupt token string falls through to the password login', async () => {
		const script = withSsoLogin(profileScript())
		const client = new ConnectClient({
			email: 'athlete@example.com',
			password: 'test-password',
			tokenString: 'not base64!',
			tokenDir: null,
			fetch: script.fetch,
		})

		await client.login()

		expect(client.credentialSource).toBe('login')
		expect(client.session.credentials.oauth2.accessToken).toBe('fresh-access')
	})

	test('a token directory missing a file falls through to the password login', async () => {
		saveCredentials(tmpDir, makePair())
		fs.rmSync(path.join(tmpDir, OAUTH1_FILENAME))
		const script = withSsoLogin(profileScript())
		const client = new ConnectClient({
			email: 'athlete@example.com',
			password: 'test-password',
			tokenDir: tmpDir,
			fetch: script.fetch,
		})

		await client.login()

		expect(client.credentialSource).toBe('login')
		expect(fs.existsSync(path.join(tmpDir, OAUTH1_FILENAME))).toBe(true)
	})

	test('the login() helper returns a logged-in client', async () => {
		const client = await login({
			tokenString: dumpCredentials(makePair()),
			tokenDir: null,
			fetch: profileScript().fetch,
		})

		expect(client.authenticated).toBe(true)
	})
})

describe('ConnectClient credential handling', () => {
	let tmpDir: string

	beforeEach(() => {
		tmpDir = createTempDir('garmin-client-')
	})

	afterEach(() => {
		cleanupTestDir(tmpDir)
	})

	async function loggedIn(): Promise<ConnectClient> {
		const client = new ConnectClient({
			tokenString: dumpCredentials(makePair()),
			tokenDir: null,
			fetch: profileScript().fetch,
		})
		return client.login()
	}

	test('dumpCredentials returns a string that resumes the same pair', async () => {
		const client = await loggedIn()

		const resumed = new ConnectClient({ tokenString: client.dumpCredentials(), tokenDir: null, fetch: profileScript().fetch })
		await resumed.login()

		expect(resumed.session.credentials).toEqual(client.session.credentials)
	})

	test('saveCredentials writes to the given directory', async () => {
		const client = await loggedIn()

		expect(client.saveCredentials(tmpDir)).toBe(tmpDir)
		expect(loadCredentials(tmpDir)).toEqual(client.session.credentials)
	})

	test('logout clears the session and profile only', async () => {
		const client = await loggedIn()
		client.saveCredentials(tmpDir)

		client.logout()

		expect(client.authenticated).toBe(false)
		expect(client.profile).toEqual({})
		expect(client.credentialSource).toBeUndefined()
		expect(() => client.session).toThrow('Not logged in; call login() first')
		expect(fs.existsSync(path.join(tmpDir, OAUTH1_FILENAME))).toBe(true)
	})

	test('logout with forget removes the stored token files', async () => {
		saveCredentials(tmpDir, makePair())
		const client = new ConnectClient({ tokenDir: tmpDir, fetch: profileScript().fetch })
		await client.login()

		client.logout({ forget: true })

		expect(client.authenticated).toBe(false)
		expect(fs.readdirSync(tmpDir)).toEqual([])
		await expect(new ConnectClient({ tokenDir: tmpDir }).login()).rejects.toThrow(
			'No credentials or saved tokens available',
		)
	})

	test('saving or dumping without a session raises', () => {
		const client = new ConnectClient({ tokenDir: null })

		expect(() => client.saveCredentials(tmpDir)).toThrow(new ConnectError('No tokens to save', {
			category: 'AUTHENTICATION',
			code: 'NO_TOKENS',
		}))
		expect(() => client.dumpCredentials()).toThrow('No tokens to dump')
	})
})
