/**
 * Splits command output into lines.
 *
 * Output normally ends with a terminator, which would leave an empty last
 * segment; trailing empty segments are dropped. Empty lines in the middle are
 * kept.
 *
 * @param output - Decoded standard output.
 * @returns Lines without terminators.
 */
export function splitLines(output: string): string[] {
  let lines = output.split(/\r?\n/u)
  while (lines.length > 0 && lines.at(-1) === '') {
    lines.pop()
  }
  return lines
}
