import { beforeEach, describe, expect, it, vi } from 'vitest'
import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { readProfile } from '../../core/config/read-profile'

vi.mock(import('node:fs/promises'), () => ({
  readFile: vi.fn(),
}))

describe('readProfile', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it('reads the default profile from the repository root', async () => {
    vi.mocked(readFile).mockResolvedValue(
      'default:\n  to:\n    - devel@lists.example.org\n  coverLetter: true\n',
    )

    await expect(readProfile('/repo')).resolves.toEqual({
      to: ['devel@lists.example.org'],
      coverLetter: true,
    })
    expect(readFile).toHaveBeenCalledWith(join('/repo', '.patchset.yml'), 'utf8')
  })

  it('reads a named profile', async () => {
    vi.mocked(readFile).mockResolvedValue(
      'default:\n  numbered: true\nrfc:\n  subjectPrefix: RFC\n',
    )

    await expect(readProfile('/repo', 'rfc')).resolves.toEqual({
      subjectPrefix: 'RFC',
    })
  })

  it('returns null when the profile does not exist', async () => {
    vi.mocked(readFile).mockResolvedValue('default:\n  numbered: true\n')
    await expect(readProfile('/repo', 'stable')).resolves.toBeNull()
  })

  it('returns null when the file does not exist', async () => {
    vi.mocked(readFile).mockRejectedValue(
      Object.assign(new Error('no such file'), { code: 'ENOENT' }),
    )
    await expect(readProfile('/repo')).resolves.toBeNull()
  })

  it('returns null for an empty file', async () => {
    vi.mocked(readFile).mockResolvedValue('')
    await expect(readProfile('/repo')).resolves.toBeNull()
  })

  it('propagates other read errors', async () => {
    vi.mocked(readFile).mockRejectedValue(
      Object.assign(new Error('permission denied'), { code: 'EACCES' }),
    )
    await expect(readProfile('/repo')).rejects.toThrowError('permission denied')
  })

  it('rejects invalid YAML', async () => {
    vi.mocked(readFile).mockResolvedValue('default: [\n')
    await expect(readProfile('/repo')).rejects.toThrowError(
      /^Invalid YAML in \.patchset\.yml/u,
    )
  })

  it('rejects a file that is not a mapping', async () => {
    vi.mocked(readFile).mockResolvedValue('- a@x.com\n')
    await expect(readProfile('/repo')).rejects.toThrowError(
      '.patchset.yml must map profile names to settings',
    )
  })

  it('rejects a malformed profile', async () => {
    vi.mocked(readFile).mockResolvedValue('default:\n  numbered: often\n')
    await expect(readProfile('/repo')).rejects.toThrowError(
      'Invalid profile "default" in .patchset.yml',
    )
  })
})
