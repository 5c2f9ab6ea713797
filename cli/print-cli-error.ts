import pc from 'picocolors'

import { MessageExtractionError } from '../core/errors/message-extraction-error'
import { NoCurrentBranchError } from '../core/errors/no-current-branch-error'
import { ExternalToolError } from '../core/errors/external-tool-error'

/**
 * Prints an error raised by a command in a user-facing form.
 *
 * @param error - Caught value.
 */
export function printCliError(error: unknown): void {
  if (error instanceof NoCurrentBranchError) {
    console.error(pc.yellow(`\n⚠️  ${error.message}\n`))
    console.error(pc.gray('Check out a branch or pass --topic <name>\n'))
    return
  }

  if (error instanceof MessageExtractionError) {
    console.error(pc.yellow(`\n⚠️  ${error.message}\n`))
    console.error(pc.gray('Only annotated tags carry a message\n'))
    return
  }

  if (error instanceof ExternalToolError) {
    console.error(pc.redBright('\nError:'), error.message)
    let stderr = error.stderr.trimEnd()
    if (stderr) {
      console.error(pc.gray(stderr))
    }
    return
  }

  console.error(
    pc.redBright('\nError:'),
    error instanceof Error ? error.message : String(error),
  )
}
