/** A patch series revision stored as a `<topic>-v<N>` tag. */
export interface SeriesTag {
  /** Series name, usually the topic branch. */
  topic: string

  /** Revision number, starting from 1. */
  version: number
}
