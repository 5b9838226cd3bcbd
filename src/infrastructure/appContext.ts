import type { ItemRepository, MappingRepository, SettingsRepository } from '@domain/repositories.ts'
import { ConfigurationError } from '@domain/errors.ts'
import type { TaskGateway } from '@application/sync/taskGateway.ts'
import type { AppConfig } from './config.ts'
import {
  createItemRepository,
  createMappingRepository,
  createSettingsRepository,
  openDatabase,
  type StockroomDB,
} from './db/index.ts'
import { GoogleOAuth, type FetchLike } from './google/googleOAuth.ts'
import { GoogleTasksClient } from './google/googleTasksClient.ts'

/** Everything a request handler or the scheduled job works with, built once per process */
export interface AppContext {
  config: AppConfig
  db: StockroomDB
  items: ItemRepository
  settings: SettingsRepository
  mappings: MappingRepository
  /** null until SETTINGS_SECRET is configured */
  oauth: GoogleOAuth | null
  tasks: GoogleTasksClient | null
}

const NOT_CONNECTED: TaskGateway = {
  async isAuthenticated() {
    return false
  },
  async createTask() {
    throw new ConfigurationError('Task list integration is not configured')
  },
  async updateTask() {
    throw new ConfigurationError('Task list integration is not configured')
  },
}

export function createAppContext(
  config: AppConfig,
  options: { db?: StockroomDB; fetch?: FetchLike } = {},
): AppContext {
  const db = options.db ?? openDatabase(config.databasePath)
  const settings = createSettingsRepository(db)
  const oauth = config.settingsSecret
    ? new GoogleOAuth(settings, {
        secret: config.settingsSecret,
        redirectUri: config.oauthRedirectUri,
        fetch: options.fetch,
      })
    : null

  return {
    config,
    db,
    items: createItemRepository(db),
    settings,
    mappings: createMappingRepository(db),
    oauth,
    tasks: oauth ? new GoogleTasksClient(oauth, options.fetch) : null,
  }
}

export function requireOAuth(ctx: AppContext): GoogleOAuth {
  if (!ctx.oauth) throw new ConfigurationError('SETTINGS_SECRET must be set and at least 32 characters')
  return ctx.oauth
}

export function taskGateway(ctx: AppContext): TaskGateway {
  return ctx.tasks ?? NOT_CONNECTED
}
