/**
 * Named settings read from `.patchset.yml`.
 *
 * Projects with mailing-list conventions keep their recipients and
 * format-patch flags here so they do not need to be typed on every run.
 */
export interface PublishProfile {
  /** Default `--output-directory` for format-patch. */
  outputDirectory?: string

  /** Default `--subject-prefix` for format-patch. */
  subjectPrefix?: string

  /** Default for `--cover-letter`. */
  coverLetter?: boolean

  /** Default for `--numbered`. */
  numbered?: boolean

  /** Default for `--notes`. */
  notes?: boolean

  /** Carbon-copy recipients. */
  cc?: string[]

  /** Primary recipients. */
  to?: string[]
}
