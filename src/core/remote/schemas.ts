import { z } from 'zod'
import type { RemotePollResult } from './types'

const timestampPairSchema = z.tuple([z.number().finite(), z.number().finite()])

export const submitResponseSchema = z.object({
  task_id: z.string().trim().min(1),
  message: z.string().optional(),
})

const completedResultSchema = z.object({
  transcription: z.string(),
  timestamp: z.array(timestampPairSchema),
  audio_url: z.string().trim().min(1).nullable().optional(),
  title: z.string().nullable().optional(),
  uploader: z.string().nullable().optional(),
})

export const statusResponseSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('processing'),
    progress: z.string().optional(),
    message: z.string().optional(),
  }),
  // Queued jobs report the same shape as running ones.
  z.object({
    status: z.literal('submitted'),
    progress: z.string().optional(),
    message: z.string().optional(),
  }),
  z.object({
    status: z.literal('completed'),
    progress: z.string().optional(),
    result: completedResultSchema,
  }),
  z.object({
    status: z.literal('failed'),
    progress: z.string().optional(),
    error: z.string().optional(),
    message: z.string().optional(),
  }),
])

export const cleanupResponseSchema = z.object({
  deleted_count: z.number().int().nonnegative(),
})

export type StatusResponse = z.infer<typeof statusResponseSchema>

export function toPollResult(response: StatusResponse): RemotePollResult {
  switch (response.status) {
    case 'processing':
    case 'submitted':
      return {
        status: 'processing',
        progress: response.progress ?? response.message ?? response.status,
      }
    case 'completed':
      return {
        status: 'completed',
        transcript: response.result.transcription,
        timestamps: response.result.timestamp,
        audioRef: response.result.audio_url ?? undefined,
        title: response.result.title ?? undefined,
        uploader: response.result.uploader ?? undefined,
      }
    case 'failed':
      return {
        status: 'failed',
        errorMessage: response.error ?? response.message ?? response.progress ?? 'Remote task failed',
      }
  }
}
