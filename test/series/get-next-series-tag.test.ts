import { describe, expect, it } from 'vitest'

import { getNextSeriesTag } from '../../core/series/get-next-series-tag'

describe('getNextSeriesTag', () => {
  it('starts at v1', () => {
    expect(getNextSeriesTag('fix-leak', [])).toBe('fix-leak-v1')
  })

  it('goes one past the highest revision', () => {
    expect(
      getNextSeriesTag('fix-leak', ['fix-leak-v2', 'fix-leak-v10', 'fix-leak-v9']),
    ).toBe('fix-leak-v11')
  })

  it('ignores other topics and unrelated tags', () => {
    expect(
      getNextSeriesTag('fix', ['fix-leak-v4', 'v1.0', 'fix-v1', 'prefix-v7']),
    ).toBe('fix-v2')
  })

  it('skips revisions too large to increment', () => {
    expect(
      getNextSeriesTag('fix', ['fix-v3', 'fix-v12345678901234567890']),
    ).toBe('fix-v4')
  })
})
