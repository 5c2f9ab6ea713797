/** Optional flags for `git format-patch`; unset options add no flag. */
export interface FormatPatchOptions {
  /** Value for `--output-directory`. */
  outputDirectory?: string

  /** Value for `--subject-prefix` (e.g. `RFC`, `PATCH v2`). */
  subjectPrefix?: string

  /** Adds `--cover-letter`. */
  coverLetter?: boolean

  /** Adds `--numbered`. */
  numbered?: boolean

  /** Adds `--notes`, appending git-notes to each patch. */
  notes?: boolean
}
