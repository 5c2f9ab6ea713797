/** Thrown when `git branch` shows no checked-out branch. */
export class NoCurrentBranchError extends Error {
  /** Creates a new NoCurrentBranchError. */
  public constructor() {
    super('Not on any branch (detached HEAD or empty repository)')
    this.name = 'NoCurrentBranchError'
  }
}
