import { calcSegments, isGsm7Bit, messageLength } from './gsm7'

describe('isGsm7Bit', () => {
  test('accepts plain text with spaces and punctuation', () => {
    expect(isGsm7Bit('Hello world')).toBe(true)
    expect(isGsm7Bit('Kode OTP anda: 123456. Jangan berikan ke siapapun!')).toBe(true)
  })

  test('accepts accented letters and Greek capitals from the basic set', () => {
    expect(isGsm7Bit('Café Ñoño ÆØÅ ΔΦΓΛΩΠΨΣΘΞ £5 ¥10 §2 ¿¡')).toBe(true)
  })

  test('accepts the extension table', () => {
    expect(isGsm7Bit('^{}\\[~]|€')).toBe(true)
  })

  test('accepts newline and carriage return', () => {
    expect(isGsm7Bit('line one\r\nline two\n')).toBe(true)
  })

  test('rejects emoji', () => {
    expect(isGsm7Bit('Hello 😀')).toBe(false)
  })

  test('rejects characters outside the alphabet', () => {
    expect(isGsm7Bit('tab\there')).toBe(false)
    expect(isGsm7Bit('`backtick`')).toBe(false)
    expect(isGsm7Bit('ç')).toBe(false)
    expect(isGsm7Bit('Terima kasih – tim')).toBe(false)
  })

  test('accepts the empty string', () => {
    expect(isGsm7Bit('')).toBe(true)
  })

  test('returns the same answer on repeated calls', () => {
    const text = 'Promo 50% hari ini!'
    expect(isGsm7Bit(text)).toBe(isGsm7Bit(text))
    expect(isGsm7Bit('😀')).toBe(isGsm7Bit('😀'))
  })
})

describe('messageLength', () => {
  test('counts characters, not UTF-16 code units', () => {
    expect(messageLength('abc')).toBe(3)
    expect(messageLength('€')).toBe(1)
    expect(messageLength('😀')).toBe(1)
  })
})

describe('calcSegments', () => {
  test('fits up to 160 characters in one segment', () => {
    expect(calcSegments('a')).toBe(1)
    expect(calcSegments('a'.repeat(160))).toBe(1)
  })

  test('splits longer messages into 153-character parts', () => {
    expect(calcSegments('a'.repeat(161))).toBe(2)
    expect(calcSegments('a'.repeat(313))).toBe(2)
    expect(calcSegments('a'.repeat(314))).toBe(3)
    expect(calcSegments('a'.repeat(320))).toBe(3)
    expect(calcSegments('a'.repeat(400))).toBe(3)
  })
})
