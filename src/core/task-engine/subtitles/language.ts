const CJK_PATTERN = /[\u4e00-\u9fff\u3040-\u309f\u30a0-\u30ff\uac00-\ud7af]/g
const SAMPLE_SIZE = 500
const CJK_RATIO_THRESHOLD = 0.15

export const CJK_MIN_LENGTH = 10
export const LATIN_MIN_LENGTH = 30

/** True when more than 15% of the first 500 characters are Chinese, Japanese kana or Hangul. */
export function isMainlyCjk(text: string): boolean {
  if (!text) return false
  const sample = text.slice(0, SAMPLE_SIZE)
  const matches = sample.match(CJK_PATTERN)
  return (matches?.length ?? 0) / sample.length > CJK_RATIO_THRESHOLD
}

export function suggestMinLength(text: string): number {
  return isMainlyCjk(text) ? CJK_MIN_LENGTH : LATIN_MIN_LENGTH
}
