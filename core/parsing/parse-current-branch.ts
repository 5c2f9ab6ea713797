import { NoCurrentBranchError } from '../errors/no-current-branch-error'
import { CURRENT_BRANCH_MARKER } from '../constants'

/**
 * Finds the checked-out branch in `git branch --no-color` output.
 *
 * Lines look like `* main` or `  feature`; the second whitespace-separated
 * token of the marked line is the branch name. A detached HEAD is printed as
 * `* (HEAD detached at 1a2b3c4)` and has no branch name.
 *
 * @param lines - Output lines of `git branch --no-color`.
 * @returns Current branch name.
 * @throws {NoCurrentBranchError} When no branch is checked out.
 */
export function parseCurrentBranch(lines: string[]): string {
  for (let line of lines) {
    if (!line.includes(CURRENT_BRANCH_MARKER)) {
      continue
    }
    let name = line.trim().split(/\s+/u)[1]
    if (!name || name.startsWith('(')) {
      break
    }
    return name
  }
  throw new NoCurrentBranchError()
}
