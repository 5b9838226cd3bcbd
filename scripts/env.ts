import { loadEnv } from 'vite'
import { loadConfig, type AppConfig } from '@infrastructure/config.ts'

/** Config for command-line runs: .env files first, then the real environment on top */
export function loadScriptConfig(mode = process.env.NODE_ENV ?? 'development'): AppConfig {
  const fromFiles = loadEnv(mode, process.cwd(), '')
  return loadConfig({ ...fromFiles, ...process.env })
}
