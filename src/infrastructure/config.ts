import { ConfigurationError } from '@domain/errors.ts'
import { DEFAULT_PAGE_SIZE } from '@application/inventory/groupItemsByCategory.ts'
import { DEFAULT_STALE_AFTER_DAYS } from '@application/inventory/findStaleItems.ts'

export interface AppConfig {
  databasePath: string
  /** Key material for secrets stored in the settings table; at least 32 characters */
  settingsSecret: string | null
  oauthRedirectUri: string | null
  /** Where the OAuth callback sends the browser back to */
  appBaseUrl: string
  pageSize: number
  staleAfterDays: number
  allowedOrigins: string[]
  cronSecret: string | null
}

export type Env = Record<string, string | undefined>

export const DEFAULT_DATABASE_PATH = 'data/stockroom.sqlite3'

function positiveInt(raw: string | undefined, fallback: number, name: string): number {
  if (raw === undefined || raw.trim() === '') return fallback
  const value = Number(raw)
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`)
  }
  return value
}

function optional(raw: string | undefined): string | null {
  const trimmed = raw?.trim()
  return trimmed ? trimmed : null
}

export function loadConfig(env: Env = process.env): AppConfig {
  const settingsSecret = optional(env.SETTINGS_SECRET)
  if (settingsSecret !== null && settingsSecret.length < 32) {
    throw new ConfigurationError('SETTINGS_SECRET must be at least 32 characters')
  }

  return Object.freeze({
    databasePath: optional(env.DATABASE_PATH) ?? DEFAULT_DATABASE_PATH,
    settingsSecret,
    oauthRedirectUri: optional(env.OAUTH_REDIRECT_URI),
    appBaseUrl: (optional(env.APP_BASE_URL) ?? '').replace(/\/+$/, ''),
    pageSize: positiveInt(env.PAGE_SIZE, DEFAULT_PAGE_SIZE, 'PAGE_SIZE'),
    staleAfterDays: positiveInt(env.STALE_AFTER_DAYS, DEFAULT_STALE_AFTER_DAYS, 'STALE_AFTER_DAYS'),
    allowedOrigins: (env.ALLOWED_ORIGINS ?? '').split(',').map((o) => o.trim()).filter(Boolean),
    cronSecret: optional(env.CRON_SECRET),
  })
}
