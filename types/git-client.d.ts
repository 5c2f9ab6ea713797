import type { FormatPatchOptions } from './format-patch-options'
import type { SendEmailOptions } from './send-email-options'

/**
 * Patch-series operations bound to a single command runner.
 *
 * Every query re-reads the repository; nothing is cached between calls.
 */
export interface GitClient {
  /** Export patches for a revision range and list the files written. */
  formatPatch(revisions: string, options?: FormatPatchOptions): Promise<string[]>

  /** Create a lightweight tag, or an annotated one from a message file. */
  createTag(name: string, annotationFile?: string): Promise<void>

  /** List tags, optionally filtered by a glob pattern. */
  getTags(pattern?: string): Promise<string[]>

  /** Send patches with `git send-email`. */
  sendEmail(options: SendEmailOptions): Promise<void>

  /** Read the annotation message of a tag. */
  getTagMessage(tag: string): Promise<string[]>

  /** One-line log for a revision range, newest first. */
  getLog(revisions: string): Promise<string[]>

  /** Top-level directory of the working tree. */
  getRepositoryRoot(): Promise<string>

  /** Name of the checked-out branch. */
  getCurrentBranch(): Promise<string>
}
