import type { SettingsRepository } from '@domain/repositories.ts'
import { ConfigurationError, NotFoundError, TaskApiError, ValidationError } from '@domain/errors.ts'
import { decrypt, encrypt } from '../crypto.ts'
import { createLogger } from '../log.ts'

export const GOOGLE_AUTH_URL = 'https://accounts.google.com/o/oauth2/auth'
export const GOOGLE_TOKEN_URL = 'https://oauth2.googleapis.com/token'
export const GOOGLE_REVOKE_URL = 'https://oauth2.googleapis.com/revoke'
export const TASKS_SCOPE = 'https://www.googleapis.com/auth/tasks'

const CLIENT_ID_KEY = 'google_client_id'
const CLIENT_SECRET_KEY = 'google_client_secret'
const TOKEN_KEY = 'google_token'

const log = createLogger('oauth')

export interface OAuthCredentials {
  clientId: string
  clientSecret: string
}

export interface StoredToken {
  accessToken: string
  refreshToken: string | null
  tokenType: string
  expiresAt: number | null   // epoch ms
}

/** The slice of `fetch` the Google clients use */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface GoogleOAuthOptions {
  /** Encrypts the client secret and tokens before they reach the settings table */
  secret: string
  redirectUri: string | null
  fetch?: FetchLike
  now?: () => number
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStoredToken(value: unknown): value is StoredToken {
  return (
    isRecord(value) &&
    typeof value.accessToken === 'string' &&
    (value.refreshToken === null || typeof value.refreshToken === 'string') &&
    typeof value.tokenType === 'string' &&
    (value.expiresAt === null || typeof value.expiresAt === 'number')
  )
}

/**
 * OAuth 2.0 credential manager for Google Tasks. Client credentials and
 * tokens live in the settings table; every provider call is a plain
 * request with no retry of its own.
 */
export class GoogleOAuth {
  private readonly settings: SettingsRepository
  private readonly options: GoogleOAuthOptions
  private readonly fetchImpl: FetchLike

  constructor(settings: SettingsRepository, options: GoogleOAuthOptions) {
    this.settings = settings
    this.options = options
    this.fetchImpl = options.fetch ?? ((input: string, init?: RequestInit) => globalThis.fetch(input, init))
  }

  private now(): number {
    return this.options.now ? this.options.now() : Date.now()
  }

  async getCredentials(): Promise<OAuthCredentials | null> {
    const clientId = await this.settings.get(CLIENT_ID_KEY)
    const sealedSecret = await this.settings.get(CLIENT_SECRET_KEY)
    if (!clientId || !sealedSecret) return null
    try {
      return { clientId, clientSecret: decrypt(sealedSecret, this.options.secret) }
    } catch (err) {
      log.warn('Stored client secret could not be decrypted; was SETTINGS_SECRET changed?', err)
      return null
    }
  }

  async isConfigured(): Promise<boolean> {
    return (await this.getCredentials()) !== null
  }

  async saveCredentials(clientId: string, clientSecret: string): Promise<void> {
    const id = clientId.trim()
    const secret = clientSecret.trim()
    if (!id || !secret) {
      throw new ValidationError('Client id and client secret are both required')
    }
    await this.settings.set(CLIENT_ID_KEY, id)
    await this.settings.set(CLIENT_SECRET_KEY, encrypt(secret, this.options.secret))
  }

  /** Forget the client credentials and any token obtained with them */
  async removeCredentials(): Promise<void> {
    await this.settings.set(CLIENT_ID_KEY, null)
    await this.settings.set(CLIENT_SECRET_KEY, null)
    await this.settings.set(TOKEN_KEY, null)
  }

  private async requireCredentials(): Promise<OAuthCredentials> {
    const credentials = await this.getCredentials()
    if (!credentials) throw new ConfigurationError('Google OAuth client is not configured')
    return credentials
  }

  private requireRedirectUri(): string {
    if (!this.options.redirectUri) throw new ConfigurationError('OAUTH_REDIRECT_URI is not configured')
    return this.options.redirectUri
  }

  async getAuthorizationUrl(state: string): Promise<string> {
    const { clientId } = await this.requireCredentials()
    const url = new URL(GOOGLE_AUTH_URL)
    url.searchParams.set('response_type', 'code')
    url.searchParams.set('client_id', clientId)
    url.searchParams.set('redirect_uri', this.requireRedirectUri())
    url.searchParams.set('scope', TASKS_SCOPE)
    url.searchParams.set('access_type', 'offline')
    url.searchParams.set('prompt', 'consent')
    url.searchParams.set('state', state)
    return url.toString()
  }

  private async postTokenRequest(params: Record<string, string>, action: string): Promise<Record<string, unknown>> {
    const { clientId, clientSecret } = await this.requireCredentials()
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64')

    const response = await this.fetchImpl(GOOGLE_TOKEN_URL, {
      method: 'POST',
      headers: {
        Authorization: `Basic ${basic}`,
        'Content-Type': 'application/x-www-form-urlencoded',
      },
      body: new URLSearchParams(params).toString(),
    })

    if (!response.ok) {
      const text = await response.text()
      throw new TaskApiError(`Google ${action} failed (${response.status}): ${text.slice(0, 200)}`, response.status)
    }

    const data: unknown = await response.json()
    if (!isRecord(data) || typeof data.access_token !== 'string' || data.access_token.length === 0) {
      throw new TaskApiError(`Google ${action} returned no access token`)
    }
    return data
  }

  private toStoredToken(data: Record<string, unknown>, previousRefreshToken: string | null): StoredToken {
    const expiresIn = Number(data.expires_in)
    return {
      accessToken: String(data.access_token),
      refreshToken: typeof data.refresh_token === 'string' ? data.refresh_token : previousRefreshToken,
      tokenType: typeof data.token_type === 'string' ? data.token_type : 'Bearer',
      expiresAt: Number.isFinite(expiresIn) && expiresIn > 0 ? this.now() + expiresIn * 1000 : null,
    }
  }

  private async saveToken(token: StoredToken): Promise<void> {
    await this.settings.set(TOKEN_KEY, encrypt(JSON.stringify(token), this.options.secret))
  }

  async exchangeCode(code: string): Promise<StoredToken> {
    const data = await this.postTokenRequest(
      { grant_type: 'authorization_code', code, redirect_uri: this.requireRedirectUri() },
      'code exchange',
    )
    const token = this.toStoredToken(data, null)
    await this.saveToken(token)
    log.info('Stored new Google Tasks token')
    return token
  }

  async getToken(): Promise<StoredToken | null> {
    const sealed = await this.settings.get(TOKEN_KEY)
    if (!sealed) return null
    try {
      const parsed: unknown = JSON.parse(decrypt(sealed, this.options.secret))
      return isStoredToken(parsed) ? parsed : null
    } catch (err) {
      log.warn('Stored token could not be read; reconnect Google Tasks', err)
      return null
    }
  }

  /** New access token from the refresh token; null when there is no refresh token to use */
  async refreshToken(): Promise<StoredToken | null> {
    const current = await this.getToken()
    if (!current?.refreshToken) {
      log.warn('No refresh token available')
      return null
    }

    const data = await this.postTokenRequest(
      { grant_type: 'refresh_token', refresh_token: current.refreshToken },
      'token refresh',
    )
    // Google usually leaves the refresh token out of a refresh response
    const token = this.toStoredToken(data, current.refreshToken)
    await this.saveToken(token)
    return token
  }

  /** Revoke at the provider and forget the token. An already-invalid token (400) is forgotten too. */
  async revokeToken(): Promise<void> {
    const token = await this.getToken()
    if (!token) throw new NotFoundError('No token to revoke')

    const response = await this.fetchImpl(GOOGLE_REVOKE_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ token: token.refreshToken ?? token.accessToken }).toString(),
    })

    if (!response.ok && response.status !== 400) {
      const text = await response.text()
      throw new TaskApiError(`Google token revocation failed (${response.status}): ${text.slice(0, 200)}`, response.status)
    }
    await this.settings.set(TOKEN_KEY, null)
  }
}
