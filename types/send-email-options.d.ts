/** Arguments for `git send-email`. */
export interface SendEmailOptions {
  /** Revision range, patch file or directory of patches. */
  target: string

  /** Adds `--dry-run`: everything except actually sending. */
  dryRun?: boolean

  /** One `--cc` flag per address, in order. */
  cc: string[]

  /** One `--to` flag per address, in order. */
  to: string[]
}
