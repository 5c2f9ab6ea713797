/**
 * Normalizes a repeatable CLI option into a flat list.
 *
 * `cac` yields a string for a single flag and an array for repeated ones;
 * values may also be comma-separated inside one flag.
 *
 * @param value - Raw option value.
 * @returns Trimmed, non-empty items in the order given.
 */
export function normalizeListOption(
  value: undefined | string[] | string,
): string[] {
  let raw: string[] = []
  if (Array.isArray(value)) {
    raw.push(...value)
  } else if (typeof value === 'string') {
    raw.push(value)
  }

  return raw
    .flatMap(item => item.split(','))
    .map(item => item.trim())
    .filter(Boolean)
}
