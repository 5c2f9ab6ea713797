import { describe, expect, it } from 'vitest'

import { parseSeriesTag } from '../../core/series/parse-series-tag'

describe('parseSeriesTag', () => {
  it('splits topic and version', () => {
    expect(parseSeriesTag('fix-leak-v3')).toEqual({
      topic: 'fix-leak',
      version: 3,
    })
  })

  it('keeps slashes and dashes in the topic', () => {
    expect(parseSeriesTag('user/net-v-next-v12')).toEqual({
      topic: 'user/net-v-next',
      version: 12,
    })
  })

  it('returns null for release tags', () => {
    expect(parseSeriesTag('v1.2.3')).toBeNull()
  })

  it('returns null for version zero', () => {
    expect(parseSeriesTag('topic-v0')).toBeNull()
  })

  it('returns null for versions beyond the safe integer range', () => {
    expect(parseSeriesTag('topic-v9007199254740993')).toBeNull()
  })

  it('accepts the largest safe version', () => {
    expect(parseSeriesTag('topic-v9007199254740991')).toEqual({
      version: 9_007_199_254_740_991,
      topic: 'topic',
    })
  })

  it('returns null without a topic', () => {
    expect(parseSeriesTag('-v2')).toBeNull()
  })
})
