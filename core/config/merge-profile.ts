import type { PublishProfile } from '../../types/publish-profile'

/**
 * Concatenates address lists, keeping the first occurrence of each address.
 *
 * @param lists - Lists to combine, in priority order.
 * @returns Combined list without duplicates.
 */
function mergeAddresses(...lists: (string[] | undefined)[]): string[] {
  return [...new Set(lists.flatMap(list => list ?? []))]
}

/**
 * Combines a stored profile with values given on the command line.
 *
 * Scalar settings given on the command line win. Recipient lists are merged
 * so addresses remembered in the profile are kept next to new ones.
 *
 * @param profile - Stored profile, or null.
 * @param overrides - Values from the command line.
 * @returns Effective settings.
 */
export function mergeProfile(
  profile: PublishProfile | null,
  overrides: PublishProfile,
): PublishProfile & { cc: string[]; to: string[] } {
  return {
    outputDirectory: overrides.outputDirectory ?? profile?.outputDirectory,
    subjectPrefix: overrides.subjectPrefix ?? profile?.subjectPrefix,
    coverLetter: overrides.coverLetter ?? profile?.coverLetter,
    numbered: overrides.numbered ?? profile?.numbered,
    to: mergeAddresses(profile?.to, overrides.to),
    notes: overrides.notes ?? profile?.notes,
    cc: mergeAddresses(profile?.cc, overrides.cc),
  }
}
