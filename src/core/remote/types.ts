import type { TimestampPair } from '../db/types'

export type RemotePollResult =
  | { status: 'processing'; progress: string }
  | {
      status: 'completed'
      transcript: string
      timestamps: TimestampPair[]
      audioRef?: string
      title?: string
      uploader?: string
    }
  | { status: 'failed'; errorMessage: string }

export interface SubmitTaskInput {
  url: string
  keepAudio: boolean
  encryptedSecret?: string
}

/**
 * Logical contract of the remote transcription service. Implementations throw
 * `SubmissionError` from `submit` and `TransientPollError` for transport faults.
 */
export interface RemoteTaskClient {
  /** Resolves to the remote-assigned task id. */
  submit(input: SubmitTaskInput): Promise<string>
  poll(taskId: string): Promise<RemotePollResult>
  fetchAudio(taskId: string, audioRef: string): Promise<Uint8Array>
  /** Idempotent. */
  deleteAudio(taskId: string): Promise<void>
  /** Purge remote audio older than `maxAgeHours`; resolves to the number of deleted entries. */
  cleanup(maxAgeHours: number): Promise<number>
}

export interface SecretProvider {
  encrypt(plaintext: string): Promise<string> | string
}
