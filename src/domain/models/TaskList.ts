export interface TaskList {
  id: string
  title: string
}

export type TaskStatus = 'needsAction' | 'completed'

export interface TaskDraft {
  title: string
  notes: string
}

export interface RemoteTask extends TaskDraft {
  id: string
  status: TaskStatus
  [field: string]: unknown
}
