import { loadConfig } from '@infrastructure/config.ts'
import { createAppContext, type AppContext } from '@infrastructure/appContext.ts'

// One database handle per process; serverless instances reuse it between invocations
let cached: AppContext | null = null

export function getContext(): AppContext {
  if (!cached) {
    cached = createAppContext(loadConfig(process.env))
  }
  return cached
}
