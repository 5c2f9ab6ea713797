export type { CommandRunnerOptions } from '../types/command-runner-options'
export type { FormatPatchOptions } from '../types/format-patch-options'
export type { SendEmailOptions } from '../types/send-email-options'
export type { PublishProfile } from '../types/publish-profile'
export type { CommandRunner } from '../types/command-runner'
export type { SeriesTag } from '../types/series-tag'
export type { GitClient } from '../types/git-client'

export { MessageExtractionError } from './errors/message-extraction-error'
export { NoCurrentBranchError } from './errors/no-current-branch-error'
export { createCommandRunner } from './runner/create-command-runner'
export { ExternalToolError } from './errors/external-tool-error'
export { parseCurrentBranch } from './parsing/parse-current-branch'
export { getNextSeriesTag } from './series/get-next-series-tag'
export { formatPatch, buildFormatPatchArgs } from './git/format-patch'
export { sendEmail, buildSendEmailArgs } from './git/send-email'
export { parseTagMessage } from './parsing/parse-tag-message'
export { getRepositoryRoot } from './git/get-repository-root'
export { getCurrentBranch } from './git/get-current-branch'
export { isPublishProfile } from './config/is-publish-profile'
export { createGitClient } from './git/create-git-client'
export { parseSeriesTag } from './series/parse-series-tag'
export { getTagMessage } from './git/get-tag-message'
export { mergeProfile } from './config/merge-profile'
export { readProfile } from './config/read-profile'
export { splitLines } from './runner/split-lines'
export { createTag } from './git/create-tag'
export { getTags } from './git/get-tags'
export { getLog } from './git/get-log'
