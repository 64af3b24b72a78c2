import { TransientPollError } from '../errors'

/**
 * Reject with `TransientPollError` when `promise` does not settle within `timeoutMs`.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new TransientPollError(`${label} timed out after ${timeoutMs}ms`))
    }, Math.max(1, Math.floor(timeoutMs)))
    promise.then(
      (value) => {
        clearTimeout(timer)
        resolve(value)
      },
      (error: unknown) => {
        clearTimeout(timer)
        reject(error)
      },
    )
  })
}

/** File-system safe name for a remote task id. */
export function toSafeFileName(value: string): string {
  const normalized = value.trim().replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '')
  return normalized || 'task'
}

export function nowIso(): string {
  return new Date().toISOString()
}
