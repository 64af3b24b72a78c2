export { synthesize, isContentChar, isHardBreak, isSoftBreak, type SubtitleCue } from './synthesizer'
export {
  formatTimestamp,
  renderPlainText,
  renderSrt,
  renderSubtitles,
  type SubtitleFormat,
} from './srt'
export { isMainlyCjk, suggestMinLength } from './language'
