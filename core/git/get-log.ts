import type { CommandRunner } from '../../types/command-runner'

/**
 * One-line log (`<abbreviated hash> <subject>`) of a revision range.
 *
 * @param runner - Command runner.
 * @param revisions - Revision or range, e.g. `origin/main..HEAD`.
 * @returns One line per commit, newest first.
 */
export function getLog(
  runner: CommandRunner,
  revisions: string,
): Promise<string[]> {
  return runner.run(['log', '--no-color', '--oneline', revisions])
}
