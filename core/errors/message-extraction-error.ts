/**
 * Thrown when `git show` output for a tag does not have the layout of an
 * annotated tag, so no message can be read from it.
 */
export class MessageExtractionError extends Error {
  public readonly tag: string | undefined

  /**
   * Creates a new MessageExtractionError.
   *
   * @param tag - Tag whose message was requested, when known.
   */
  public constructor(tag?: string) {
    super(
      tag
        ? `Failed to get tag message for "${tag}"`
        : 'Failed to get tag message',
    )
    this.name = 'MessageExtractionError'
    this.tag = tag
  }
}
