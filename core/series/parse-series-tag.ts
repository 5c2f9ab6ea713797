import type { SeriesTag } from '../../types/series-tag'

/**
 * Parses a `<topic>-v<N>` series tag.
 *
 * @param tag - Tag name.
 * @returns Topic and version, or null for any other tag and for versions
 *   too large to count past exactly.
 */
export function parseSeriesTag(tag: string): SeriesTag | null {
  let match = tag.match(/^(?<topic>.+)-v(?<version>[1-9]\d*)$/u)
  let topic = match?.groups?.['topic']
  let version = match?.groups?.['version']
  if (!topic || !version) {
    return null
  }
  let parsed = Number.parseInt(version, 10)
  if (!Number.isSafeInteger(parsed)) {
    return null
  }
  return { version: parsed, topic }
}
