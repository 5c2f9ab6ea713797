import type { MockInstance } from 'vitest'

import { beforeEach, afterEach, describe, expect, it, vi } from 'vitest'
import pc from 'picocolors'

import { MessageExtractionError } from '../../core/errors/message-extraction-error'
import { NoCurrentBranchError } from '../../core/errors/no-current-branch-error'
import { ExternalToolError } from '../../core/errors/external-tool-error'
import { printCliError } from '../../cli/print-cli-error'

describe('printCliError', () => {
  let consoleErrorSpy: MockInstance

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    consoleErrorSpy.mockRestore()
  })

  it('explains a missing current branch', () => {
    printCliError(new NoCurrentBranchError())

    expect(consoleErrorSpy).toHaveBeenNthCalledWith(
      1,
      pc.yellow(
        '\n⚠️  Not on any branch (detached HEAD or empty repository)\n',
      ),
    )
    expect(consoleErrorSpy).toHaveBeenNthCalledWith(
      2,
      pc.gray('Check out a branch or pass --topic <name>\n'),
    )
  })

  it('explains a tag without a message', () => {
    printCliError(new MessageExtractionError('v1'))

    expect(consoleErrorSpy).toHaveBeenNthCalledWith(
      1,
      pc.yellow('\n⚠️  Failed to get tag message for "v1"\n'),
    )
  })

  it('prints the command and git stderr for tool failures', () => {
    printCliError(
      new ExternalToolError({
        stderr: 'fatal: bad revision\n',
        args: ['log', 'nope'],
        executable: 'git',
        exitCode: 128,
        signal: null,
      }),
    )

    expect(consoleErrorSpy).toHaveBeenNthCalledWith(
      1,
      pc.redBright('\nError:'),
      'Command "git log nope" exited with code 128',
    )
    expect(consoleErrorSpy).toHaveBeenNthCalledWith(
      2,
      pc.gray('fatal: bad revision'),
    )
  })

  it('skips empty stderr', () => {
    printCliError(
      new ExternalToolError({
        args: ['tag'],
        executable: 'git',
        exitCode: 1,
        signal: null,
      }),
    )

    expect(consoleErrorSpy).toHaveBeenCalledTimes(1)
  })

  it('prints other errors and thrown values', () => {
    printCliError(new Error('Invalid profile "default" in .patchset.yml'))
    printCliError('boom')

    expect(consoleErrorSpy).toHaveBeenNthCalledWith(
      1,
      pc.redBright('\nError:'),
      'Invalid profile "default" in .patchset.yml',
    )
    expect(consoleErrorSpy).toHaveBeenNthCalledWith(
      2,
      pc.redBright('\nError:'),
      'boom',
    )
  })
})
