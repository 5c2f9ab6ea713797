import pc from 'picocolors'

/**
 * Echoes a git invocation to stderr, used by `--verbose`.
 *
 * @param args - Arguments passed to git.
 */
export function printCommand(args: string[]): void {
  console.error(pc.gray(`$ git ${args.join(' ')}`))
}
