/**
 * Reads an on/off flag as typed on the command line.
 *
 * `cac` gives a negatable flag a default of `true`, which hides whether the
 * user typed it at all. Settings from a profile may only be overridden by a
 * flag that was actually given, so the raw arguments are scanned instead. The
 * last occurrence wins; nothing after `--` is considered.
 *
 * @param rawArgs - Raw command line arguments.
 * @param name - Flag name without dashes, e.g. `cover-letter`.
 * @returns True for `--<name>`, false for `--no-<name>`, undefined if absent.
 */
export function readToggleOption(
  rawArgs: string[],
  name: string,
): undefined | boolean {
  let value: undefined | boolean
  for (let argument of rawArgs) {
    if (argument === '--') {
      break
    }
    if (argument === `--${name}`) {
      value = true
    } else if (argument === `--no-${name}`) {
      value = false
    }
  }
  return value
}
