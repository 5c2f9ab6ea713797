import { readFile } from 'node:fs/promises'
import { parseDocument } from 'yaml'
import { join } from 'node:path'

import type { PublishProfile } from '../../types/publish-profile'

import { DEFAULT_PROFILE, PROFILE_FILE } from '../constants'
import { isPublishProfile } from './is-publish-profile'

/**
 * Checks if an error is a missing-file error from `node:fs`.
 *
 * @param error - Caught value.
 * @returns True for ENOENT.
 */
function isNotFoundError(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  )
}

/**
 * Reads a named profile from `.patchset.yml`.
 *
 * The file maps profile names to settings:
 *
 * ```yaml
 * default:
 *   to: [devel@lists.example.org]
 *   subjectPrefix: PATCH
 *   coverLetter: true
 * ```
 *
 * @param cwd - Repository root.
 * @param name - Profile name.
 * @returns The profile, or null when the file or the profile does not exist.
 * @throws {Error} When the file is not valid YAML or the profile is malformed.
 */
export async function readProfile(
  cwd: string,
  name: string = DEFAULT_PROFILE,
): Promise<PublishProfile | null> {
  let filePath = join(cwd, PROFILE_FILE)

  let content: string
  try {
    content = await readFile(filePath, 'utf8')
  } catch (error) {
    if (isNotFoundError(error)) {
      return null
    }
    throw error
  }

  let document = parseDocument(content)
  let [firstError] = document.errors
  if (firstError) {
    throw new Error(`Invalid YAML in ${PROFILE_FILE}: ${firstError.message}`)
  }

  let data: unknown = document.toJSON()
  if (data === null || data === undefined) {
    return null
  }
  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error(`${PROFILE_FILE} must map profile names to settings`)
  }

  let profile: unknown = Object.entries(data).find(([key]) => key === name)?.[1]
  if (profile === undefined) {
    return null
  }
  if (!isPublishProfile(profile)) {
    throw new Error(`Invalid profile "${name}" in ${PROFILE_FILE}`)
  }
  return profile
}
