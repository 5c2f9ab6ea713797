import pc from 'picocolors'

/**
 * Formats recipient lists for display before sending.
 *
 * @param to - Primary recipients.
 * @param cc - Carbon-copy recipients.
 * @returns Lines to print, one per address, grouped under `To:` and `Cc:`.
 */
export function formatRecipients(to: string[], cc: string[]): string[] {
  let lines: string[] = []
  for (let [label, addresses] of [
    ['To', to],
    ['Cc', cc],
  ] as const) {
    if (addresses.length === 0) {
      continue
    }
    lines.push(pc.bold(`${label}:`))
    for (let address of addresses) {
      lines.push(`   • ${address}`)
    }
  }
  return lines
}
