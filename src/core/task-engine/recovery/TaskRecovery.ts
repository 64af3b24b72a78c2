import type { TaskDao } from '../../db/dao'
import { awaitsAudioFetch } from '../../db/types'
import { INTERRUPTED_BEFORE_SUBMISSION, PROGRESS_SUBMISSION_FAILED } from '../constants'
import { nowIso } from '../utils'

export interface RecoveryOutcome {
  /** Tasks cut off before submission, now persisted as failed. */
  failedTaskIds: string[]
  /** Tasks still running remotely that must rejoin the polling pool. */
  resumedTaskIds: string[]
  /** Completed tasks whose kept audio was never downloaded. */
  pendingAudioTaskIds: string[]
}

export class TaskRecovery {
  constructor(private readonly deps: { taskDao: TaskDao }) {}

  recoverInterruptedTasks(): RecoveryOutcome {
    const failedTaskIds: string[] = []
    for (const task of this.deps.taskDao.listByStatus(['created'])) {
      const now = nowIso()
      this.deps.taskDao.upsert({
        ...task,
        status: 'failed',
        progress: PROGRESS_SUBMISSION_FAILED,
        errorMessage: INTERRUPTED_BEFORE_SUBMISSION,
        completedAt: now,
      })
      failedTaskIds.push(task.id)
    }

    const resumedTaskIds = this.deps.taskDao
      .listByStatus(['submitted', 'processing'])
      .map((task) => task.id)

    const pendingAudioTaskIds = this.deps.taskDao
      .listByStatus(['completed'])
      .filter(awaitsAudioFetch)
      .map((task) => task.id)

    return { failedTaskIds, resumedTaskIds, pendingAudioTaskIds }
  }
}
