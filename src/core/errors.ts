export type TaskErrorCode =
  | 'E_SUBMISSION_REJECTED'
  | 'E_TRANSIENT'
  | 'E_REMOTE_FAILED'
  | 'E_STORE'
  | 'E_TASK_NOT_FOUND'
  | 'E_INVARIANT'
  | 'E_SEGMENTATION_INPUT'
  | 'E_PRECONDITION'
  | 'E_SETTINGS_INVALID'

export class TaskLifecycleError extends Error {
  readonly code: TaskErrorCode
  readonly context?: Record<string, unknown>

  constructor(
    code: TaskErrorCode,
    message: string,
    options?: { context?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'TaskLifecycleError'
    this.code = code
    this.context = options?.context
  }
}

/** The remote service rejected a job at creation time. */
export class SubmissionError extends TaskLifecycleError {
  constructor(message: string, options?: { context?: Record<string, unknown>; cause?: unknown }) {
    super('E_SUBMISSION_REJECTED', message, options)
    this.name = 'SubmissionError'
  }
}

/** Network fault, timeout or unreadable payload while polling or fetching. Retried on the next tick. */
export class TransientPollError extends TaskLifecycleError {
  constructor(message: string, options?: { context?: Record<string, unknown>; cause?: unknown }) {
    super('E_TRANSIENT', message, options)
    this.name = 'TransientPollError'
  }
}

export class RemoteFailure extends TaskLifecycleError {
  constructor(message: string, options?: { context?: Record<string, unknown>; cause?: unknown }) {
    super('E_REMOTE_FAILED', message, options)
    this.name = 'RemoteFailure'
  }
}

export class StoreError extends TaskLifecycleError {
  constructor(
    message: string,
    options?: {
      code?: Extract<TaskErrorCode, 'E_STORE' | 'E_TASK_NOT_FOUND' | 'E_INVARIANT'>
      context?: Record<string, unknown>
      cause?: unknown
    },
  ) {
    super(options?.code ?? 'E_STORE', message, options)
    this.name = 'StoreError'
  }
}

export class SegmentationInputError extends TaskLifecycleError {
  constructor(message: string, options?: { context?: Record<string, unknown> }) {
    super('E_SEGMENTATION_INPUT', message, options)
    this.name = 'SegmentationInputError'
  }
}

export function isTaskLifecycleError(error: unknown): error is TaskLifecycleError {
  return error instanceof TaskLifecycleError
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
