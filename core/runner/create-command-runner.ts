import type { StdioOptions } from 'node:child_process'

import { spawn } from 'node:child_process'

import type { CommandRunnerOptions } from '../../types/command-runner-options'
import type { CommandRunner } from '../../types/command-runner'

import { ExternalToolError } from '../errors/external-tool-error'
import { GIT_EXECUTABLE } from '../constants'
import { splitLines } from './split-lines'

/**
 * Create the process-backed command runner.
 *
 * Each call spawns exactly one process and settles once it exits. Exit codes
 * are always checked: a non-zero code, a terminating signal or a spawn failure
 * rejects with `ExternalToolError`.
 *
 * @example
 *   const runner = createCommandRunner({ cwd: '/path/to/repo' })
 *   const tags = await runner.run(['tag'])
 *
 * @param options - Executable, working directory, environment and hooks.
 * @returns Runner bound to the given options.
 */
export function createCommandRunner(
  options: CommandRunnerOptions = {},
): CommandRunner {
  let { executable = GIT_EXECUTABLE, onCommand, cwd, env } = options

  function execute(args: string[], stdio: StdioOptions): Promise<string> {
    onCommand?.(args)

    return new Promise((resolve, reject) => {
      let stdoutChunks: Buffer[] = []
      let stderrChunks: Buffer[] = []
      let settled = false

      let child = spawn(executable, args, {
        env: env ? { ...process.env, ...env } : process.env,
        stdio,
        cwd,
      })

      child.stdout?.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk)
      })
      child.stderr?.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk)
      })

      child.on('error', error => {
        if (settled) {
          return
        }
        settled = true
        reject(
          new ExternalToolError({
            signal: null,
            exitCode: null,
            cause: error,
            executable,
            args,
          }),
        )
      })

      child.on('close', (code, signal) => {
        if (settled) {
          return
        }
        settled = true

        let stderr = Buffer.concat(stderrChunks).toString('utf8')
        if (code !== 0) {
          reject(
            new ExternalToolError({
              exitCode: code,
              executable,
              signal,
              stderr,
              args,
            }),
          )
          return
        }

        resolve(Buffer.concat(stdoutChunks).toString('utf8'))
      })
    })
  }

  return {
    run: async args => {
      let output = await execute(args, ['inherit', 'pipe', 'pipe'])
      return splitLines(output)
    },
    call: async args => {
      await execute(args, 'inherit')
    },
  }
}
