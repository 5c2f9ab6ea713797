import type { CommandRunner } from '../../types/command-runner'
import type { GitClient } from '../../types/git-client'

import { getRepositoryRoot } from './get-repository-root'
import { getCurrentBranch } from './get-current-branch'
import { getTagMessage } from './get-tag-message'
import { formatPatch } from './format-patch'
import { createTag } from './create-tag'
import { sendEmail } from './send-email'
import { getTags } from './get-tags'
import { getLog } from './get-log'

/**
 * Bind every git operation to one command runner.
 *
 * @param runner - Command runner used by all methods.
 * @returns Client with bound methods.
 */
export function createGitClient(runner: CommandRunner): GitClient {
  return {
    formatPatch: (revisions, options) =>
      formatPatch(runner, revisions, options),
    createTag: (name, annotationFile) =>
      createTag(runner, name, annotationFile),
    getRepositoryRoot: () => getRepositoryRoot(runner),
    getCurrentBranch: () => getCurrentBranch(runner),
    getTagMessage: tag => getTagMessage(runner, tag),
    sendEmail: options => sendEmail(runner, options),
    getLog: revisions => getLog(runner, revisions),
    getTags: pattern => getTags(runner, pattern),
  }
}
