interface PollEntry {
  taskId: string
  timer: ReturnType<typeof setTimeout> | null
}

/** Returns false to stop polling the task. `isCurrent` turns false once the task is untracked. */
export type PollTick = (taskId: string, isCurrent: () => boolean) => Promise<boolean>

/**
 * Owns the set of tasks under watch. Each tracked task has its own timer chain; the
 * next tick is armed only after the previous one settles, so polls for one task
 * never overlap.
 */
export class TaskPoller {
  private readonly entries = new Map<string, PollEntry>()
  private stopped = false

  constructor(
    private readonly deps: {
      intervalMs: () => number
      tick: PollTick
      onTickError: (taskId: string, error: unknown) => void
    },
  ) {}

  track(taskId: string, initialDelayMs = 0): boolean {
    if (this.entries.has(taskId)) return false
    this.stopped = false
    const entry: PollEntry = { taskId, timer: null }
    this.entries.set(taskId, entry)
    this.schedule(entry, initialDelayMs)
    return true
  }

  untrack(taskId: string): boolean {
    const entry = this.entries.get(taskId)
    if (!entry) return false
    if (entry.timer) {
      clearTimeout(entry.timer)
      entry.timer = null
    }
    this.entries.delete(taskId)
    return true
  }

  isTracked(taskId: string): boolean {
    return this.entries.has(taskId)
  }

  trackedTaskIds(): string[] {
    return Array.from(this.entries.keys())
  }

  stop(): void {
    this.stopped = true
    for (const taskId of this.trackedTaskIds()) {
      this.untrack(taskId)
    }
  }

  private isCurrent(entry: PollEntry): boolean {
    return !this.stopped && this.entries.get(entry.taskId) === entry
  }

  private schedule(entry: PollEntry, delayMs: number): void {
    entry.timer = setTimeout(() => {
      entry.timer = null
      void this.runTick(entry)
    }, Math.max(0, Math.floor(delayMs)))
  }

  private async runTick(entry: PollEntry): Promise<void> {
    if (!this.isCurrent(entry)) return

    let keepPolling = true
    try {
      keepPolling = await this.deps.tick(entry.taskId, () => this.isCurrent(entry))
    } catch (error) {
      this.deps.onTickError(entry.taskId, error)
    }

    if (!this.isCurrent(entry)) return
    if (!keepPolling) {
      this.entries.delete(entry.taskId)
      return
    }
    this.schedule(entry, this.deps.intervalMs())
  }
}
