/**
 * Response standardisation.
 * Turns a transport result into either the provider body (possibly augmented)
 * or a gateway error, before anything is serialised.
 */

import { err, ok, type Result } from '../../../types'
import { ERROR_CODES, isRecord, type OperationCodes } from './errors'
import type { BalanceEnvelope, ProviderBody, TransportResult } from './types'

/** Provider status is 1/0, sometimes sent as a string. Anything non-numeric counts as 0. */
export function statusCode(status: unknown): number {
  if (typeof status === 'number') return Math.trunc(status)
  if (typeof status === 'boolean') return status ? 1 : 0
  const parsed = Number.parseInt(String(status), 10)
  return Number.isNaN(parsed) ? 0 : parsed
}

/**
 * Decode a gateway response.
 * Order: transport failure → empty body → not JSON (or a scalar) → no status →
 * provider-reported failure (status 0) → success.
 */
export function standardiseResponse(
  result: TransportResult,
  codes: OperationCodes,
  fallbackError = 'unknown api error'
): Result<ProviderBody> {
  if (!result.ok) return err(result.code, result.message)

  if (result.body === '') {
    return err(ERROR_CODES.EMPTY_RESPONSE, 'Empty response from API')
  }

  let decoded: unknown
  try {
    decoded = JSON.parse(result.body)
  } catch {
    return err(codes.json, 'invalid JSON response')
  }

  // a JSON list decodes but can never carry a status key
  if (Array.isArray(decoded)) return err(codes.status, 'response missing status')
  if (!isRecord(decoded)) return err(codes.json, 'invalid JSON response')
  if (!('status' in decoded)) return err(codes.status, 'response missing status')

  const body: ProviderBody = { ...decoded, status: decoded['status'] }

  if (statusCode(body.status) === 0) {
    const providerText = body['error-text']
    return err(
      ERROR_CODES.UPSTREAM,
      providerText === undefined || providerText === null ? fallbackError : String(providerText)
    )
  }

  return ok(body)
}

/** Reduce a balance response to the documented fields */
export function toBalanceEnvelope(body: ProviderBody): BalanceEnvelope {
  return {
    status: 1,
    balance: body['balance'] ?? '',
    currency: body['currency'] ?? '',
    balance_expired: body['balance_expired'] ?? '',
  }
}
