import type { FormatPatchOptions } from '../../types/format-patch-options'
import type { CommandRunner } from '../../types/command-runner'

/**
 * Build the argument list for `git format-patch`.
 *
 * Flags appear in a fixed order and only when their option is set; the
 * revision range always comes last.
 *
 * @param revisions - Revision range to export.
 * @param options - Optional flags.
 * @returns Arguments for the runner.
 */
export function buildFormatPatchArgs(
  revisions: string,
  options: FormatPatchOptions = {},
): string[] {
  let args = ['format-patch']
  if (options.subjectPrefix) {
    args.push('--subject-prefix', options.subjectPrefix)
  }
  if (options.outputDirectory) {
    args.push('--output-directory', options.outputDirectory)
  }
  if (options.numbered) {
    args.push('--numbered')
  }
  if (options.coverLetter) {
    args.push('--cover-letter')
  }
  if (options.notes) {
    args.push('--notes')
  }
  args.push(revisions)
  return args
}

/**
 * Export a revision range as patch files.
 *
 * @param runner - Command runner.
 * @param revisions - Revision range to export.
 * @param options - Optional flags.
 * @returns Paths of the patch files git wrote.
 */
export function formatPatch(
  runner: CommandRunner,
  revisions: string,
  options: FormatPatchOptions = {},
): Promise<string[]> {
  return runner.run(buildFormatPatchArgs(revisions, options))
}
