import { describe, expect, it } from 'vitest'
import { DEFAULT_DATABASE_PATH, loadConfig } from '@infrastructure/config.ts'
import { TEST_SECRET } from '../../helpers/testDb.ts'

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      databasePath: DEFAULT_DATABASE_PATH,
      settingsSecret: null,
      oauthRedirectUri: null,
      appBaseUrl: '',
      pageSize: 50,
      staleAfterDays: 7,
      allowedOrigins: [],
      cronSecret: null,
    })
  })

  it('reads every variable', () => {
    const config = loadConfig({
      DATABASE_PATH: '/var/lib/stockroom/db.sqlite3',
      SETTINGS_SECRET: TEST_SECRET,
      OAUTH_REDIRECT_URI: 'http://localhost:5173/api/oauth/callback',
      APP_BASE_URL: 'http://localhost:5173/',
      PAGE_SIZE: '20',
      STALE_AFTER_DAYS: '14',
      ALLOWED_ORIGINS: 'http://localhost:5173, https://stock.example.com',
      CRON_SECRET: 'test-cron-secret',
    })

    expect(config).toEqual({
      databasePath: '/var/lib/stockroom/db.sqlite3',
      settingsSecret: TEST_SECRET,
      oauthRedirectUri: 'http://localhost:5173/api/oauth/callback',
      appBaseUrl: 'http://localhost:5173',
      pageSize: 20,
      staleAfterDays: 14,
      allowedOrigins: ['http://localhost:5173', 'https://stock.example.com'],
      cronSecret: 'test-cron-secret',
    })
  })

  it('is frozen', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true)
  })

  it('rejects a short settings secret', () => {
    expect(() => loadConfig({ SETTINGS_SECRET: 'short' })).toThrow('SETTINGS_SECRET must be at least 32 characters')
  })

  it('rejects a bad page size', () => {
    expect(() => loadConfig({ PAGE_SIZE: '0' })).toThrow('PAGE_SIZE must be a positive integer, got "0"')
    expect(() => loadConfig({ STALE_AFTER_DAYS: 'week' })).toThrow(
      'STALE_AFTER_DAYS must be a positive integer, got "week"',
    )
  })
})
