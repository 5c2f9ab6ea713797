import type { CommandRunner } from '../../types/command-runner'

/**
 * List tags in git's own order.
 *
 * @param runner - Command runner.
 * @param pattern - Optional glob passed to `git tag -l` unchanged.
 * @returns Tag names.
 */
export function getTags(
  runner: CommandRunner,
  pattern?: string,
): Promise<string[]> {
  if (pattern) {
    return runner.run(['tag', '-l', pattern])
  }
  return runner.run(['tag'])
}
