/**
 * Default transport — one form-encoded POST with plain fetch.
 * No retries. Connectivity failures come back as a failed result, never a rejection.
 */

import { ERROR_CODES } from './errors'
import type { FormParams, Transport, TransportResult } from './types'

export const REQUEST_TIMEOUT_MS = 10_000

/**
 * Encode a flat parameter map as application/x-www-form-urlencoded.
 * Values the client has already percent-encoded (from, msg) are encoded again
 * here, which is what the gateway expects.
 */
export function encodeForm(params: FormParams): string {
  const body = new URLSearchParams()
  for (const [key, value] of Object.entries(params)) {
    body.append(key, String(value))
  }
  return body.toString()
}

/**
 * RFC 3986 percent-encoding (encodeURIComponent leaves !'()* alone).
 * Used for sender IDs and message bodies before they go into the form.
 */
export function rawUrlEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
  )
}

export function createFetchTransport(timeoutMs: number = REQUEST_TIMEOUT_MS): Transport {
  return async (endpoint: string, params: FormParams): Promise<TransportResult> => {
    let response: Response
    try {
      response = await fetch(endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded; charset=UTF-8',
          Accept: 'application/json',
        },
        body: encodeForm(params),
        signal: AbortSignal.timeout(timeoutMs),
      })
    } catch (error) {
      const msg = error instanceof Error ? error.message : 'Network error'
      return { ok: false, code: ERROR_CODES.TRANSPORT, message: `Request failed: ${msg}` }
    }

    // Business errors arrive as JSON on any HTTP status; the body is checked downstream
    let body: string
    try {
      body = await response.text()
    } catch (error) {
      const msg = error instanceof Error ? error.message : 'unreadable body'
      return { ok: false, code: ERROR_CODES.TRANSPORT, message: `Request failed: ${msg}` }
    }

    return { ok: true, body }
  }
}
