import { describe, expect, it, vi } from 'vitest'

import type { CommandRunner } from '../../types/command-runner'

import { getLog } from '../../core/git/get-log'

describe('getLog', () => {
  it('returns one line per commit for the range', async () => {
    let lines = ['1a2b3c4 Second commit', '5d6e7f8 Initial commit']
    let runner: CommandRunner = {
      run: vi.fn<CommandRunner['run']>().mockResolvedValue(lines),
      call: vi.fn<CommandRunner['call']>(),
    }

    await expect(getLog(runner, 'main..topic')).resolves.toEqual(lines)
    expect(runner.run).toHaveBeenCalledWith([
      'log',
      '--no-color',
      '--oneline',
      'main..topic',
    ])
  })
})
