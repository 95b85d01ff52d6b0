/**
 * Scheduled delivery times.
 * Callers pass local wall-clock time; the gateway wants GMT+7 digits.
 */

import { err, ok, type Result } from '../../../types'
import {
  DELIVERY_FORMAT_HOUR,
  DELIVERY_FORMAT_MINUTE,
  formatGatewayTime,
  parseZonedDateTime,
} from '../../shared/dates'
import { ERROR_CODES } from './errors'

export type DeliveryPrecision = 'minute' | 'hour'

const PATTERNS: Record<DeliveryPrecision, string> = {
  minute: DELIVERY_FORMAT_MINUTE,
  hour: DELIVERY_FORMAT_HOUR,
}

/**
 * Convert `yyyy-MM-dd HH:mm:ss` in `timeZone` to the gateway's
 * yyyyMMddHHmm (minute) or yyyyMMddHH (hour) format.
 */
export function toDeliveryTime(
  input: string,
  precision: DeliveryPrecision,
  timeZone: string,
  now: Date = new Date()
): Result<string> {
  const instant = parseZonedDateTime(input, timeZone)
  if (!instant) return err(ERROR_CODES.DATETIME_FORMAT, 'invalid datetime format')
  if (instant.getTime() < now.getTime()) {
    return err(ERROR_CODES.DATETIME_PAST, 'delivery time is in the past')
  }
  return ok(formatGatewayTime(instant, PATTERNS[precision]))
}
