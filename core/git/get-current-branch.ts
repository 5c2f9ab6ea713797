import type { CommandRunner } from '../../types/command-runner'

import { parseCurrentBranch } from '../parsing/parse-current-branch'

/**
 * Get the name of the checked-out branch.
 *
 * @param runner - Command runner.
 * @returns Branch name.
 * @throws {NoCurrentBranchError} On a detached HEAD or an empty repository.
 */
export async function getCurrentBranch(runner: CommandRunner): Promise<string> {
  let lines = await runner.run(['branch', '--no-color'])
  return parseCurrentBranch(lines)
}
