export const AUDIO_FILE_EXTENSION = '.mp3'

export const PROGRESS_SUBMITTED = 'Task submitted'
export const PROGRESS_SUBMISSION_FAILED = 'Submission failed'
export const PROGRESS_COMPLETED = 'Completed'
export const PROGRESS_FAILED = 'Failed'

export const INTERRUPTED_BEFORE_SUBMISSION =
  'Interrupted before the task reached the remote service'
