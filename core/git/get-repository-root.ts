import type { CommandRunner } from '../../types/command-runner'

/**
 * Get the top-level directory of the working tree.
 *
 * @param runner - Command runner.
 * @returns Absolute path of the repository root.
 * @throws {ExternalToolError} Outside a git working tree.
 */
export async function getRepositoryRoot(
  runner: CommandRunner,
): Promise<string> {
  let [root] = await runner.run(['rev-parse', '--show-toplevel'])
  if (!root) {
    throw new Error('git rev-parse --show-toplevel printed no directory')
  }
  return root
}
