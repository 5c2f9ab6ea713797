import { describe, expect, it } from 'vitest'

import { readToggleOption } from '../../cli/read-toggle-option'

describe('readToggleOption', () => {
  it('returns undefined when the flag is absent', () => {
    expect(
      readToggleOption(['format-patch', 'HEAD~2..HEAD'], 'numbered'),
    ).toBeUndefined()
  })

  it('returns true for the positive flag', () => {
    expect(
      readToggleOption(['format-patch', '--numbered', 'HEAD~2..HEAD'], 'numbered'),
    ).toBeTruthy()
  })

  it('returns false for the negated flag', () => {
    expect(
      readToggleOption(
        ['format-patch', '--no-cover-letter', 'HEAD~2..HEAD'],
        'cover-letter',
      ),
    ).toBe(false)
  })

  it('lets the last occurrence win', () => {
    expect(readToggleOption(['--notes', '--no-notes'], 'notes')).toBe(false)
    expect(readToggleOption(['--no-notes', '--notes'], 'notes')).toBe(true)
  })

  it('ignores other flags with a shared prefix', () => {
    expect(readToggleOption(['--numbered-files'], 'numbered')).toBeUndefined()
  })

  it('stops at the end-of-options marker', () => {
    expect(readToggleOption(['--', '--no-notes'], 'notes')).toBeUndefined()
  })
})
