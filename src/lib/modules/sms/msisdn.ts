/**
 * Indonesian MSISDN normalisation.
 * The gateway takes numbers in international format without '+': 62XXXXXXXXX.
 */

import type { Destinations } from './types'

/** 62 followed by 9 to 13 subscriber digits */
export const MSISDN_PATTERN = /^62\d{9,13}$/

/**
 * Normalise a phone number to 62XXXXXXXX.
 * Handles: 0812..., +62 812..., 62812..., 812...
 * Does not check length; see {@link normaliseDestinations}.
 */
export function normaliseMsisdn(raw: string): string {
  const digits = raw.replace(/\D/g, '')

  // National trunk prefix: 0812... → 62812...
  if (digits.startsWith('0')) {
    return `62${digits.slice(1)}`
  }

  if (!digits.startsWith('62')) {
    return `62${digits}`
  }

  return digits
}

/**
 * Normalise a destination set. Accepts a comma-separated string or a list.
 * Returns null if any entry is not a valid MSISDN after normalisation;
 * the set is accepted or rejected as a whole.
 */
export function normaliseDestinations(to: Destinations): string[] | null {
  const entries = Array.isArray(to) ? to : to.split(',')
  const out: string[] = []

  for (const entry of entries) {
    const msisdn = normaliseMsisdn(entry.trim())
    if (!MSISDN_PATTERN.test(msisdn)) return null
    out.push(msisdn)
  }

  return out
}

/** True for an empty string, an empty list, or undefined */
export function isEmptyDestinations(to: Destinations | undefined): boolean {
  if (to === undefined) return true
  return to.length === 0
}
