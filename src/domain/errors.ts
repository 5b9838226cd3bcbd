/**
 * Error hierarchy shared by handlers, services and the scheduled job.
 * `status` is the HTTP status a route answers with when the error reaches it.
 */
export class AppError extends Error {
  public code: string
  public status: number

  constructor(message: string, code: string, status = 500) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
  }
}

export class ValidationError extends AppError {
  public field?: string

  constructor(message: string, field?: string) {
    super(message, 'validation-error', 400)
    this.name = 'ValidationError'
    this.field = field
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 'not-found', 404)
    this.name = 'NotFoundError'
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'conflict', 409)
    this.name = 'ConflictError'
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 'not-configured', 500)
    this.name = 'ConfigurationError'
  }
}

/**
 * Failure reported by the remote task API (or the OAuth endpoints).
 * `status` carries the upstream HTTP status, 502 when the call never got one.
 */
export class TaskApiError extends AppError {
  constructor(message: string, status = 502) {
    super(message, 'task-api-error', status)
    this.name = 'TaskApiError'
  }
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) return error
  if (error instanceof Error) return new AppError(error.message, 'unknown-error')
  return new AppError(String(error), 'unknown-error')
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error'
}
