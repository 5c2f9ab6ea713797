import type { CommandRunner } from '../../types/command-runner'

import { parseTagMessage } from '../parsing/parse-tag-message'

/**
 * Read the annotation message of a tag.
 *
 * @param runner - Command runner.
 * @param tag - Annotated tag name.
 * @returns Message lines, subject first.
 * @throws {MessageExtractionError} When the tag is not annotated.
 */
export async function getTagMessage(
  runner: CommandRunner,
  tag: string,
): Promise<string[]> {
  let lines = await runner.run(['show', '--raw', '--no-color', tag])
  return parseTagMessage(lines, tag)
}
