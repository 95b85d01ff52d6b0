/**
 * Gateway error codes and the uniform failure envelope.
 *
 * Every failure an operation can produce, whether from validation, transport,
 * decoding, the provider or an unexpected fault, leaves the client as
 * `{ status: 0, "error-text": "<CODE>: <message>", timestamp }`.
 */

import { formatLocalTimestamp } from '../../shared/dates'
import type { ErrorEnvelope } from './types'

// ─── Codes emitted by this client ─────────────────────────────────────────────

export const ERROR_CODES = {
  FROM_INVALID: 'ERR005',
  TO_INVALID: 'ERR006',
  MSG_INVALID: 'ERR007',
  MSG_CHARSET: 'ERR008',
  DATETIME_FORMAT: 'ERR010',
  DATETIME_PAST: 'ERR011',
  SECRET_INVALID: 'ERR012',
  PIN_INVALID: 'ERR014',
  API_KEY_EMPTY: 'ERR999',
  TRANSPORT: 'HTTP001',
  EMPTY_RESPONSE: 'HTTP002',
  UPSTREAM: 'AYOERR',
} as const

/**
 * Decode and fault codes are numbered per operation so a log line shows which
 * call failed: JSON001 is sendSms, JSON002 checkBalance and so on.
 */
export const OPERATION_CODES = {
  sendSms: { json: 'JSON001', status: 'API001', fault: 'EXC001' },
  checkBalance: { json: 'JSON002', status: 'API002', fault: 'EXC002' },
  sendHlr: { json: 'JSON003', status: 'API003', fault: 'EXC003' },
  otpRequest: { json: 'JSON004', status: 'API004', fault: 'EXC004' },
  otpCheck: { json: 'JSON005', status: 'API005', fault: 'EXC005' },
} as const

export type OperationCodes = (typeof OPERATION_CODES)[keyof typeof OPERATION_CODES]

// ─── Codes the provider reports inside AYOERR text ────────────────────────────

export const PROVIDER_ERROR_CODES: Readonly<Record<string, string>> = {
  ERR001: 'account suspended',
  ERR002: 'insufficient balance',
  ERR005: 'from error or empty',
  ERR006: 'to error or empty',
  ERR007: 'msg error or empty',
  ERR008: 'invalid char',
  ERR009: 'invalid sender ID',
  ERR010: 'invalid datetime format',
  ERR011: 'delivery time past',
  ERR012: 'secret error or empty',
  ERR013: 'trx_id too long',
  ERR999: 'api_key empty',
}

// ─── Envelope ─────────────────────────────────────────────────────────────────

export function buildErrorEnvelope(
  code: string,
  message: string,
  timeZone: string,
  now: Date = new Date()
): ErrorEnvelope {
  return {
    status: 0,
    'error-text': `${code}: ${message}`,
    timestamp: formatLocalTimestamp(now, timeZone),
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** True for a decoded failure envelope (status 0 with error text) */
export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  return (
    isRecord(value) &&
    Number(value['status']) === 0 &&
    typeof value['error-text'] === 'string'
  )
}

/**
 * Decode an operation result. Returns null if the text is not a JSON object,
 * which an operation never produces.
 */
export function parseEnvelope(text: string): Record<string, unknown> | null {
  try {
    const decoded: unknown = JSON.parse(text)
    return isRecord(decoded) ? decoded : null
  } catch {
    return null
  }
}

/** Split `"ERR005: from error or empty"` into its code and message */
export function splitErrorText(errorText: string): { code: string | null; message: string } {
  const match = /^([A-Z]+\d{3}|AYOERR): (.*)$/s.exec(errorText)
  if (!match) return { code: null, message: errorText }
  return { code: match[1] ?? null, message: match[2] ?? '' }
}

/** Thrown for invalid client configuration; operations themselves never throw. */
export class AyosmsConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'AyosmsConfigError'
  }
}
