import type { TaskDraft } from '@domain/models/TaskList.ts'

/** What the sync engine needs from a remote task list service */
export interface TaskGateway {
  isAuthenticated(): Promise<boolean>
  /** Returns the id of the created task */
  createTask(tasklistId: string, draft: TaskDraft): Promise<string>
  updateTask(tasklistId: string, taskId: string, draft: TaskDraft): Promise<void>
}
