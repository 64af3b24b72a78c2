import { describe, expect, it } from 'vitest'
import type { TimestampPair } from '../../db/types'
import { SegmentationInputError } from '../../errors'
import { isContentChar, synthesize } from './synthesizer'

function sequentialTimestamps(count: number): TimestampPair[] {
  return Array.from({ length: count }, (_, index): TimestampPair => [index * 100, index * 100 + 80])
}

function contentOnly(text: string): string {
  return Array.from(text).filter(isContentChar).join('')
}

const SIX_PAIRS: TimestampPair[] = [
  [0, 100],
  [100, 200],
  [300, 400],
  [400, 500],
  [500, 600],
  [600, 700],
]

describe('synthesize', () => {
  it('absorbs a soft break below the minimum length and flushes on the hard break', () => {
    expect(synthesize('你好，世界。', SIX_PAIRS, 10)).toEqual([
      { index: 1, text: '你好，世界。', startMs: 0, endMs: 500 },
    ])
  })

  it('flushes on a soft break once the buffer reaches the minimum length', () => {
    expect(synthesize('你好，世界。', SIX_PAIRS, 2)).toEqual([
      { index: 1, text: '你好，', startMs: 0, endMs: 200 },
      { index: 2, text: '世界。', startMs: 300, endMs: 500 },
    ])
  })

  it('treats spaces and ASCII full stops as soft breaks', () => {
    const text = 'Hello, world. How are you? Fine'
    const timestamps = sequentialTimestamps(23)

    expect(synthesize(text, timestamps, 5)).toEqual([
      { index: 1, text: 'Hello,', startMs: 0, endMs: 480 },
      { index: 2, text: 'world.', startMs: 500, endMs: 980 },
      { index: 3, text: 'How', startMs: 1000, endMs: 1280 },
      { index: 4, text: 'are you?', startMs: 1300, endMs: 1880 },
      { index: 5, text: 'Fine', startMs: 1900, endMs: 2280 },
    ])
    expect(synthesize(text, timestamps, 8)).toEqual([
      { index: 1, text: 'Hello, world.', startMs: 0, endMs: 980 },
      { index: 2, text: 'How are', startMs: 1000, endMs: 1580 },
      { index: 3, text: 'you?', startMs: 1600, endMs: 1880 },
      { index: 4, text: 'Fine', startMs: 1900, endMs: 2280 },
    ])
  })

  it('breaks on newlines and flushes the trailing remainder', () => {
    expect(synthesize('第一句。\n第二句', sequentialTimestamps(6), 10)).toEqual([
      { index: 1, text: '第一句。', startMs: 0, endMs: 280 },
      { index: 2, text: '第二句', startMs: 300, endMs: 580 },
    ])
  })

  it('gives punctuation-only cues the last known end time', () => {
    expect(synthesize('？！你好', sequentialTimestamps(2), 10)).toEqual([
      { index: 1, text: '？', startMs: 0, endMs: 0 },
      { index: 2, text: '！', startMs: 0, endMs: 0 },
      { index: 3, text: '你好', startMs: 0, endMs: 180 },
    ])
    expect(synthesize('好。！', [[200, 350]], 10)).toEqual([
      { index: 1, text: '好。', startMs: 200, endMs: 350 },
      { index: 2, text: '！', startMs: 350, endMs: 350 },
    ])
  })

  it('never reads past the end of a short timestamp list', () => {
    expect(synthesize('一二三', [[0, 80]], 10)).toEqual([
      { index: 1, text: '一二三', startMs: 0, endMs: 80 },
    ])
    expect(synthesize('你好。世界。', [], 10)).toEqual([
      { index: 1, text: '你好。', startMs: 0, endMs: 0 },
      { index: 2, text: '世界。', startMs: 0, endMs: 0 },
    ])
  })

  it('drops cues that are empty after trimming', () => {
    expect(synthesize('  你好  ', sequentialTimestamps(2), 10)).toEqual([
      { index: 1, text: '你好', startMs: 0, endMs: 180 },
    ])
    expect(synthesize('   ', [], 1)).toEqual([])
    expect(synthesize('', [], 10)).toEqual([])
  })

  it('keeps cue order, timing bounds and content across break settings', () => {
    const text = '今天天气很好，我们去公园散步吧！你觉得怎么样？好的, 没问题。'
    const timestamps = sequentialTimestamps(Array.from(text).filter(isContentChar).length)

    for (const minLength of [1, 3, 8, 40]) {
      const cues = synthesize(text, timestamps, minLength)
      expect(cues.map((cue) => cue.index)).toEqual(cues.map((_, position) => position + 1))
      for (const cue of cues) {
        expect(cue.startMs).toBeLessThanOrEqual(cue.endMs)
      }
      expect(contentOnly(cues.map((cue) => cue.text).join(''))).toBe(contentOnly(text))
      expect(synthesize(text, timestamps, minLength)).toEqual(cues)
    }
  })

  it('rejects invalid input', () => {
    expect(() => synthesize('你好', [[0, 100]], 0)).toThrow(SegmentationInputError)
    expect(() => synthesize('你好', [[0, 100]], 2.5)).toThrow('minLength must be a positive integer, got 2.5')
    expect(() => synthesize('你好', [[200, 100]], 5)).toThrow('Invalid timestamp pair at 0: [200, 100]')
    expect(() =>
      synthesize(
        '你好',
        [
          [300, 400],
          [100, 200],
        ],
        5,
      ),
    ).toThrow('Timestamps are out of order at 1')
  })
})
