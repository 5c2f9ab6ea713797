import { MessageExtractionError } from '../errors/message-extraction-error'
import { COMMIT_BOUNDARY_PREFIX, TAG_HEADER_LINE_COUNT } from '../constants'

/**
 * Reads the annotation message from `git show --raw --no-color <tag>` output.
 *
 * Assumed layout for an annotated tag:
 *
 * ```text
 * tag v1
 * Tagger: A U Thor <author@example.com>
 * Date:   Mon Jan 1 00:00:00 2024 +0000
 *
 * Subject line
 *
 * Body line
 *
 * commit 1a2b3c4d...
 * ```
 *
 * The first four lines are skipped, the message runs up to the first line
 * starting with `commit `, and the blank separator git prints right before
 * that line is dropped. A lightweight tag shows the commit header first, so
 * the boundary is never found after the header.
 *
 * This layout is tied to git's output format; the fixture in
 * `test/fixtures/show-raw-annotated-tag.txt` pins it.
 *
 * @param lines - Output lines of `git show --raw --no-color <tag>`.
 * @param tag - Tag name, used in the error message.
 * @returns Message lines.
 * @throws {MessageExtractionError} When the commit boundary is missing.
 */
export function parseTagMessage(lines: string[], tag?: string): string[] {
  let message: string[] = []
  for (let line of lines.slice(TAG_HEADER_LINE_COUNT)) {
    if (line.startsWith(COMMIT_BOUNDARY_PREFIX)) {
      if (message.at(-1) === '') {
        message.pop()
      }
      return message
    }
    message.push(line)
  }
  throw new MessageExtractionError(tag)
}
