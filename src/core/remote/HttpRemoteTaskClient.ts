import type { ZodType, ZodTypeDef } from 'zod'
import { SubmissionError, TransientPollError, errorMessage } from '../errors'
import {
  cleanupResponseSchema,
  statusResponseSchema,
  submitResponseSchema,
  toPollResult,
} from './schemas'
import type { RemotePollResult, RemoteTaskClient, SubmitTaskInput } from './types'

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>

export interface HttpRemoteTaskClientOptions {
  baseUrl: string
  timeoutMs?: number
  /** Defaults to `timeoutMs`. */
  audioTimeoutMs?: number
  fetchImpl?: FetchLike
}

const DEFAULT_TIMEOUT_MS = 30_000

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '')
}

/**
 * `RemoteTaskClient` over the transcription service's JSON HTTP API.
 */
export class HttpRemoteTaskClient implements RemoteTaskClient {
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly audioTimeoutMs: number
  private readonly fetchImpl: FetchLike

  constructor(options: HttpRemoteTaskClientOptions) {
    this.baseUrl = trimTrailingSlash(options.baseUrl)
    this.timeoutMs = Math.max(1, Math.floor(options.timeoutMs ?? DEFAULT_TIMEOUT_MS))
    this.audioTimeoutMs = Math.max(1, Math.floor(options.audioTimeoutMs ?? this.timeoutMs))
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init))
  }

  async submit(input: SubmitTaskInput): Promise<string> {
    const payload: Record<string, unknown> = {
      url: input.url,
      keep_audio: input.keepAudio,
    }
    if (input.encryptedSecret) {
      payload.encrypted_cookie_data = input.encryptedSecret
    }

    let response: Response
    try {
      response = await this.request(`${this.baseUrl}/api/process`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
      })
    } catch (error) {
      throw new SubmissionError(`Submission request failed: ${errorMessage(error)}`, { cause: error })
    }

    if (response.status !== 200 && response.status !== 202) {
      const detail = await response.text().catch(() => '')
      throw new SubmissionError(`HTTP ${response.status}${detail ? `: ${detail}` : ''}`, {
        context: { status: response.status },
      })
    }

    const parsed = submitResponseSchema.safeParse(await this.readJson(response, 'submit'))
    if (!parsed.success) {
      throw new SubmissionError('Response is missing task_id')
    }
    return parsed.data.task_id
  }

  async poll(taskId: string): Promise<RemotePollResult> {
    const response = await this.requestOrTransient(
      `${this.baseUrl}/api/status/${encodeURIComponent(taskId)}`,
      { method: 'GET' },
    )
    if (!response.ok) {
      throw new TransientPollError(`Status query failed: HTTP ${response.status}`, {
        context: { taskId, status: response.status },
      })
    }
    return toPollResult(this.decode(statusResponseSchema, await this.readJson(response, 'poll'), 'poll'))
  }

  async fetchAudio(taskId: string, audioRef: string): Promise<Uint8Array> {
    const url = audioRef.startsWith('/') ? `${this.baseUrl}${audioRef}` : audioRef
    const response = await this.requestOrTransient(url, { method: 'GET' }, this.audioTimeoutMs)
    if (!response.ok) {
      throw new TransientPollError(`Audio download failed: HTTP ${response.status}`, {
        context: { taskId, status: response.status },
      })
    }
    return new Uint8Array(await response.arrayBuffer())
  }

  async deleteAudio(taskId: string): Promise<void> {
    const response = await this.requestOrTransient(
      `${this.baseUrl}/api/audio/${encodeURIComponent(taskId)}`,
      { method: 'DELETE' },
    )
    // Already gone counts as deleted.
    if (!response.ok && response.status !== 404) {
      throw new TransientPollError(`Remote audio cleanup failed: HTTP ${response.status}`, {
        context: { taskId, status: response.status },
      })
    }
  }

  async cleanup(maxAgeHours: number): Promise<number> {
    const response = await this.requestOrTransient(`${this.baseUrl}/api/cleanup`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ max_age_hours: maxAgeHours }),
    })
    if (!response.ok) {
      throw new TransientPollError(`Remote cleanup failed: HTTP ${response.status}`, {
        context: { status: response.status },
      })
    }
    return this.decode(cleanupResponseSchema, await this.readJson(response, 'cleanup'), 'cleanup')
      .deleted_count
  }

  private async request(url: string, init: RequestInit, timeoutMs = this.timeoutMs): Promise<Response> {
    const controller = new AbortController()
    const timer = setTimeout(() => controller.abort(), timeoutMs)
    try {
      return await this.fetchImpl(url, { ...init, signal: controller.signal })
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new Error(`Request timeout after ${timeoutMs}ms`)
      }
      throw error
    } finally {
      clearTimeout(timer)
    }
  }

  private async requestOrTransient(
    url: string,
    init: RequestInit,
    timeoutMs = this.timeoutMs,
  ): Promise<Response> {
    try {
      return await this.request(url, init, timeoutMs)
    } catch (error) {
      throw new TransientPollError(errorMessage(error), { context: { url }, cause: error })
    }
  }

  private async readJson(response: Response, operation: string): Promise<unknown> {
    try {
      return (await response.json()) as unknown
    } catch (error) {
      const message = `Malformed ${operation} response: ${errorMessage(error)}`
      if (operation === 'submit') {
        throw new SubmissionError(message, { cause: error })
      }
      throw new TransientPollError(message, { cause: error })
    }
  }

  private decode<T>(schema: ZodType<T, ZodTypeDef, unknown>, payload: unknown, operation: string): T {
    const parsed = schema.safeParse(payload)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      throw new TransientPollError(
        `Unexpected ${operation} response${issue ? `: ${issue.path.join('.')} ${issue.message}` : ''}`,
      )
    }
    return parsed.data
  }
}
