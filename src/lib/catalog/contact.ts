import { InvalidArgsError } from '@/lib/scheduling/errors'

function splitName(name: string) {
  const parts = name.trim().split(/\s+/).filter(Boolean)

  if (parts.length === 0) {
    throw new InvalidArgsError('Name is required', 'name')
  }

  return parts
}

/** `first.last@domain`, lower case. */
export function generateLecturerEmail(name: string, domain: string) {
  const parts = splitName(name)
  const first = parts[0].toLowerCase()
  const last = parts[parts.length - 1].toLowerCase()
  return `${first}.${last}@${domain}`
}

/**
 * First initial, middle initial (the first initial again without a middle
 * name), last name and the two-digit enrollment year: "Ada Lovelace", 2021
 * becomes `aalovelace21@domain`.
 */
export function generateStudentEmail(name: string, enrollmentYear: number, domain: string) {
  const parts = splitName(name)
  const firstInitial = parts[0].charAt(0).toLowerCase()
  const middleInitial = parts.length > 2 ? parts[1].charAt(0).toLowerCase() : firstInitial
  const last = parts[parts.length - 1].toLowerCase()
  const yearSuffix = String(enrollmentYear).slice(2)
  return `${firstInitial}${middleInitial}${last}${yearSuffix}@${domain}`
}
