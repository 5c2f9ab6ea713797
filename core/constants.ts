/** Executable invoked when no other is configured. */
export const GIT_EXECUTABLE = 'git'

/** Character `git branch` prints in front of the checked-out branch. */
export const CURRENT_BRANCH_MARKER = '*'

/**
 * Header lines `git show --raw` prints for an annotated tag before the
 * message: `tag <name>`, `Tagger:`, `Date:` and a blank line.
 */
export const TAG_HEADER_LINE_COUNT = 4

/** Prefix of the line where the tagged commit starts in `git show` output. */
export const COMMIT_BOUNDARY_PREFIX = 'commit '

/** Profile file looked up in the repository root. */
export const PROFILE_FILE = '.patchset.yml'

/** Profile used when none is named. */
export const DEFAULT_PROFILE = 'default'
