import {
  DELIVERY_FORMAT_HOUR,
  DELIVERY_FORMAT_MINUTE,
  formatGatewayTime,
  formatLocalTimestamp,
  isKnownTimeZone,
  parseZonedDateTime,
} from './dates'

describe('parseZonedDateTime', () => {
  test('reads wall-clock time in Asia/Jakarta (UTC+7)', () => {
    const instant = parseZonedDateTime('2026-03-01 09:30:00', 'Asia/Jakarta')
    expect(instant?.toISOString()).toBe('2026-03-01T02:30:00.000Z')
  })

  test('reads wall-clock time in UTC', () => {
    const instant = parseZonedDateTime('2026-03-01 09:30:00', 'UTC')
    expect(instant?.toISOString()).toBe('2026-03-01T09:30:00.000Z')
  })

  test('applies daylight saving of the source zone', () => {
    // Sydney is on AEDT (UTC+11) in January
    const instant = parseZonedDateTime('2026-01-15 10:00:00', 'Australia/Sydney')
    expect(instant?.toISOString()).toBe('2026-01-14T23:00:00.000Z')
  })

  test('trims surrounding whitespace', () => {
    const instant = parseZonedDateTime('  2026-03-01 09:30:00 ', 'UTC')
    expect(instant?.toISOString()).toBe('2026-03-01T09:30:00.000Z')
  })

  test('returns null for other formats', () => {
    expect(parseZonedDateTime('01/03/2026 09:30', 'UTC')).toBeNull()
    expect(parseZonedDateTime('2026-03-01T09:30:00', 'UTC')).toBeNull()
    expect(parseZonedDateTime('tomorrow', 'UTC')).toBeNull()
    expect(parseZonedDateTime('', 'UTC')).toBeNull()
  })

  test('returns null for impossible calendar values', () => {
    expect(parseZonedDateTime('2026-02-30 10:00:00', 'UTC')).toBeNull()
    expect(parseZonedDateTime('2026-13-01 10:00:00', 'UTC')).toBeNull()
    expect(parseZonedDateTime('2026-03-01 24:00:00', 'UTC')).toBeNull()
  })
})

describe('formatGatewayTime', () => {
  const instant = new Date('2026-03-01T02:30:00.000Z')

  test('renders minute precision in GMT+7', () => {
    expect(formatGatewayTime(instant, DELIVERY_FORMAT_MINUTE)).toBe('202603010930')
  })

  test('renders hour precision in GMT+7', () => {
    expect(formatGatewayTime(instant, DELIVERY_FORMAT_HOUR)).toBe('2026030109')
  })

  test('rolls over the date when the offset crosses midnight', () => {
    expect(formatGatewayTime(new Date('2026-12-31T20:15:00.000Z'), DELIVERY_FORMAT_MINUTE)).toBe(
      '202701010315'
    )
  })
})

describe('formatLocalTimestamp', () => {
  test('formats in the requested zone', () => {
    const instant = new Date('2026-03-01T02:30:05.000Z')
    expect(formatLocalTimestamp(instant, 'Asia/Jakarta')).toBe('2026-03-01 09:30:05')
    expect(formatLocalTimestamp(instant, 'UTC')).toBe('2026-03-01 02:30:05')
  })
})

describe('isKnownTimeZone', () => {
  test('accepts IANA zones', () => {
    expect(isKnownTimeZone('Asia/Jakarta')).toBe(true)
    expect(isKnownTimeZone('UTC')).toBe(true)
  })

  test('rejects unknown zones', () => {
    expect(isKnownTimeZone('Mars/Olympus_Mons')).toBe(false)
  })
})
