import { SegmentationInputError } from '../../errors'
import type { TimestampPair } from '../../db/types'

export interface SubtitleCue {
  /** 1-based position in scan order. */
  index: number
  text: string
  startMs: number
  endMs: number
}

const HARD_BREAK_CHARS = new Set(['。', '？', '！', '；', '：', '?', '!', ';', ':', '\n'])
// ASCII full stop is soft so decimals and abbreviations do not force a cue.
const SOFT_BREAK_CHARS = new Set(['.', '，', '、', ',', ' '])

function isWhitespace(char: string): boolean {
  return /\s/u.test(char)
}

export function isHardBreak(char: string): boolean {
  return HARD_BREAK_CHARS.has(char)
}

export function isSoftBreak(char: string): boolean {
  return SOFT_BREAK_CHARS.has(char)
}

/** Characters that carry a timestamp entry. */
export function isContentChar(char: string): boolean {
  return !isHardBreak(char) && !isSoftBreak(char) && !isWhitespace(char)
}

function assertValidInput(timestamps: readonly TimestampPair[], minLength: number): void {
  if (!Number.isInteger(minLength) || minLength < 1) {
    throw new SegmentationInputError(`minLength must be a positive integer, got ${minLength}`)
  }

  let previousStart = Number.NEGATIVE_INFINITY
  timestamps.forEach(([start, end], position) => {
    if (!Number.isFinite(start) || !Number.isFinite(end) || start > end) {
      throw new SegmentationInputError(`Invalid timestamp pair at ${position}: [${start}, ${end}]`, {
        context: { position },
      })
    }
    if (start < previousStart) {
      throw new SegmentationInputError(`Timestamps are out of order at ${position}`, {
        context: { position },
      })
    }
    previousStart = start
  })
}

/**
 * Turn a transcript and its per-character timestamps into subtitle cues.
 *
 * Punctuation and whitespace consume no timestamp entry. Hard breaks always end a
 * cue; soft breaks end one only once the buffered text (break included) reaches
 * `minLength` characters. A cue that never consumed a timestamp starts at the last
 * known end time. Surplus content characters beyond the timestamp list consume nothing.
 */
export function synthesize(
  text: string,
  timestamps: readonly TimestampPair[],
  minLength: number,
): SubtitleCue[] {
  assertValidInput(timestamps, minLength)

  const cues: SubtitleCue[] = []
  let cursor = 0
  let buffer = ''
  let bufferLength = 0
  let cueStart: number | null = null
  let lastEnd = 0

  const flush = (): void => {
    const trimmed = buffer.trim()
    if (!trimmed) return
    cues.push({
      index: cues.length + 1,
      text: trimmed,
      startMs: cueStart ?? lastEnd,
      endMs: lastEnd,
    })
    buffer = ''
    bufferLength = 0
    cueStart = null
  }

  for (const char of text) {
    if (isContentChar(char) && cursor < timestamps.length) {
      const [start, end] = timestamps[cursor]
      if (cueStart === null) {
        cueStart = start
      }
      lastEnd = end
      cursor += 1
    }

    buffer += char
    bufferLength += 1

    if (isHardBreak(char) || (isSoftBreak(char) && bufferLength >= minLength)) {
      flush()
    }
  }

  flush()
  return cues
}
