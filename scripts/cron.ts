/**
 * Daily job: push low-stock items to Google Tasks, then list items nobody
 * has checked lately. Schedule it with cron, e.g.
 *
 *   0 7 * * * cd /srv/stockroom && npm run cron >> cron.log 2>&1
 */
import { runScheduledTasks } from '@application/jobs/runScheduledTasks.ts'
import { createAppContext, taskGateway } from '@infrastructure/appContext.ts'
import { errorMessage } from '@domain/errors.ts'
import { createLogger } from '@infrastructure/log.ts'
import { loadScriptConfig } from './env.ts'

const log = createLogger('cron')

async function main(): Promise<void> {
  const ctx = createAppContext(loadScriptConfig())
  try {
    await runScheduledTasks({
      items: ctx.items,
      mappings: ctx.mappings,
      settings: ctx.settings,
      tasks: taskGateway(ctx),
      staleAfterDays: ctx.config.staleAfterDays,
      logger: log,
    })
  } finally {
    ctx.db.close()
  }
}

main().catch((err: unknown) => {
  log.error('Scheduled tasks failed:', errorMessage(err))
  process.exitCode = 1
})
