import type { SubtitleCue } from './synthesizer'

export type SubtitleFormat = 'srt' | 'txt'

/** `HH:MM:SS,mmm`; hours are not capped at 99. */
export function formatTimestamp(milliseconds: number): string {
  const safe = Number.isFinite(milliseconds) ? Math.max(0, Math.floor(milliseconds)) : 0
  const ms = safe % 1000
  const totalSeconds = Math.floor(safe / 1000)
  const hours = Math.floor(totalSeconds / 3600)
  const minutes = Math.floor((totalSeconds % 3600) / 60)
  const seconds = totalSeconds % 60
  const pad = (value: number, width: number) => String(value).padStart(width, '0')
  return `${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)},${pad(ms, 3)}`
}

export function renderSrt(cues: SubtitleCue[]): string {
  return cues
    .map(
      (cue) =>
        `${cue.index}\n${formatTimestamp(cue.startMs)} --> ${formatTimestamp(cue.endMs)}\n${cue.text}\n\n`,
    )
    .join('')
}

export function renderPlainText(cues: SubtitleCue[]): string {
  return cues.map((cue) => `${cue.text}\n`).join('')
}

export function renderSubtitles(cues: SubtitleCue[], format: SubtitleFormat): string {
  return format === 'srt' ? renderSrt(cues) : renderPlainText(cues)
}
