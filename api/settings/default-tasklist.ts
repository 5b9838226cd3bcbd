import type { VercelRequest, VercelResponse } from '@vercel/node'
import { setDefaultTaskList } from '@application/settings/taskListSettings.ts'
import { getContext } from '../_lib/context.ts'
import { readBody } from '../_lib/request.ts'
import { allowMethods, sendError, sendResult } from '../_lib/respond.ts'

export default async function handler(req: VercelRequest, res: VercelResponse) {
  if (!allowMethods(req, res, ['POST'])) return

  try {
    const defaultTasklist = await setDefaultTaskList(getContext().settings, readBody(req))
    sendResult(req, res, {
      status: 'success',
      message: `Default task list set to ${defaultTasklist.tasklistName}`,
      data: { defaultTasklist },
      redirectTo: '/settings',
    })
  } catch (err) {
    sendError(req, res, err, '/settings')
  }
}
