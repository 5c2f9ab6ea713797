import type { PublishProfile } from '../../types/publish-profile'

/** Keys holding string values. */
const STRING_KEYS = new Set(['outputDirectory', 'subjectPrefix'])

/** Keys holding boolean values. */
const BOOLEAN_KEYS = new Set(['coverLetter', 'numbered', 'notes'])

/** Keys holding lists of email addresses. */
const LIST_KEYS = new Set(['to', 'cc'])

/**
 * Checks if a value is a list of strings.
 *
 * @param value - Value to check.
 * @returns True for an array whose items are all strings.
 */
function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

/**
 * Type guard to check if a value conforms to the PublishProfile interface.
 *
 * Unknown keys are rejected so typos in `.patchset.yml` do not go unnoticed.
 *
 * @param value - The value to check.
 * @returns True if the value is a valid profile.
 */
export function isPublishProfile(value: unknown): value is PublishProfile {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false
  }

  for (let [key, entry] of Object.entries(value)) {
    if (STRING_KEYS.has(key)) {
      if (typeof entry !== 'string') {
        return false
      }
    } else if (BOOLEAN_KEYS.has(key)) {
      if (typeof entry !== 'boolean') {
        return false
      }
    } else if (LIST_KEYS.has(key)) {
      if (!isStringList(entry)) {
        return false
      }
    } else {
      return false
    }
  }

  return true
}
