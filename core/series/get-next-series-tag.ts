import { parseSeriesTag } from './parse-series-tag'

/**
 * Computes the tag for the next revision of a series.
 *
 * @example
 *   getNextSeriesTag('fix-leak', ['fix-leak-v1', 'fix-leak-v2'])
 *   // => 'fix-leak-v3'
 *
 * @param topic - Series name.
 * @param tags - Existing tags.
 * @returns `<topic>-v<N>` one past the highest existing revision.
 */
export function getNextSeriesTag(topic: string, tags: string[]): string {
  let latest = 0
  for (let tag of tags) {
    let parsed = parseSeriesTag(tag)
    if (parsed?.topic === topic && parsed.version > latest) {
      latest = parsed.version
    }
  }
  return `${topic}-v${latest + 1}`
}
