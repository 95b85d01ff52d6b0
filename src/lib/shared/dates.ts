/**
 * Date utilities for the AYOSMS client.
 * The gateway schedules in GMT+7 (Asia/Jakarta). Every conversion names its
 * zone explicitly; the process time zone is never consulted.
 */

import { isValid, parse } from 'date-fns'
import { formatInTimeZone, fromZonedTime } from 'date-fns-tz'

export const GATEWAY_TIMEZONE = 'Asia/Jakarta'

/** Input format for caller-supplied times: 2026-03-01 09:30:00 */
export const LOCAL_DATETIME_FORMAT = 'yyyy-MM-dd HH:mm:ss'

/** send SMS: yyyymmddHHii */
export const DELIVERY_FORMAT_MINUTE = 'yyyyMMddHHmm'

/** HLR lookup: yyyymmddHH */
export const DELIVERY_FORMAT_HOUR = 'yyyyMMddHH'

const LOCAL_DATETIME_PATTERN = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/

/** True when `timeZone` is an IANA zone the runtime knows */
export function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone })
    return true
  } catch {
    return false
  }
}

/**
 * Read a `yyyy-MM-dd HH:mm:ss` wall-clock time in `timeZone` as an instant.
 * Returns null for anything that is not a real calendar time in that format.
 */
export function parseZonedDateTime(input: string, timeZone: string): Date | null {
  const trimmed = input.trim()
  if (!LOCAL_DATETIME_PATTERN.test(trimmed)) return null

  // Calendar check only (rejects 2026-02-30, 24:00:00); the instant comes from fromZonedTime
  if (!isValid(parse(trimmed, LOCAL_DATETIME_FORMAT, new Date(0)))) return null

  const instant = fromZonedTime(trimmed.replace(' ', 'T'), timeZone)
  return isValid(instant) ? instant : null
}

/** Render an instant in gateway time (GMT+7) */
export function formatGatewayTime(instant: Date, pattern: string): string {
  return formatInTimeZone(instant, GATEWAY_TIMEZONE, pattern)
}

/** Format an instant as `yyyy-MM-dd HH:mm:ss` in the given zone */
export function formatLocalTimestamp(instant: Date, timeZone: string): string {
  return formatInTimeZone(instant, timeZone, LOCAL_DATETIME_FORMAT)
}
