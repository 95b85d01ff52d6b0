/**
 * GSM 03.38 character checks and segment accounting.
 * The gateway only accepts the 7-bit default alphabet (basic set, extension
 * table, LF and CR) on this channel.
 */

import alphabet from './gsm7-alphabet.json'

const GSM7_CHARSET: ReadonlySet<string> = new Set([
  ...alphabet.basic,
  ...alphabet.extension,
  ...alphabet.control,
])

export const SINGLE_SEGMENT_LENGTH = 160
export const CONCAT_SEGMENT_LENGTH = 153

/** Message length in characters (code points, not UTF-16 units) */
export function messageLength(text: string): number {
  return [...text].length
}

/** True if every character of `text` belongs to the GSM 7-bit alphabet */
export function isGsm7Bit(text: string): boolean {
  for (const char of text) {
    if (!GSM7_CHARSET.has(char)) return false
  }
  return true
}

/** 160 characters fit one SMS; longer messages are split into 153-character parts */
export function calcSegments(text: string): number {
  const length = messageLength(text)
  if (length <= SINGLE_SEGMENT_LENGTH) return 1
  return Math.ceil((length - SINGLE_SEGMENT_LENGTH) / CONCAT_SEGMENT_LENGTH) + 1
}
