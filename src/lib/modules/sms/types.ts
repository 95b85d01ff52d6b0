/**
 * SMS Module — shared TypeScript types.
 * Covers the five AYOSMS! gateway operations and delivery-report callbacks.
 */

import type { Logger } from '../../shared/logger'

// ─── Envelopes ────────────────────────────────────────────────────────────────

/** Uniform failure envelope, serialised as the operation result */
export interface ErrorEnvelope {
  status: 0
  'error-text': string
  /** Local time of the failure: yyyy-MM-dd HH:mm:ss */
  timestamp: string
}

/** Decoded provider body. `status` is present on every body we accept. */
export type ProviderBody = Record<string, unknown> & { status: unknown }

export interface BalanceEnvelope {
  status: 1
  balance: unknown
  currency: unknown
  balance_expired: unknown
}

// ─── Transport ───────────────────────────────────────────────────────────────

/** Flat key/value map sent as application/x-www-form-urlencoded */
export type FormParams = Record<string, string | number>

export type TransportResult =
  | { ok: true; body: string }
  | { ok: false; code: string; message: string }

/** Performs one form-encoded POST. Must not reject. */
export type Transport = (endpoint: string, params: FormParams) => Promise<TransportResult>

// ─── Client configuration ─────────────────────────────────────────────────────

export type Operation = 'sendSms' | 'checkBalance' | 'sendHlr' | 'otpRequest' | 'otpCheck'

export type EndpointTable = Readonly<Record<Operation, string>>

export interface AyosmsClientOptions {
  api_key?: string
  /** IANA zone used to read delivery times and stamp errors. Defaults to Asia/Jakarta (UTC+7). */
  timeZone?: string
  /** Overrides https://api.ayosms.com/mconnect/gw */
  baseUrl?: string
  transport?: Transport
  logger?: Logger
}

// ─── Operation inputs ─────────────────────────────────────────────────────────

/** A single MSISDN, a comma-joined list, or an explicit list */
export type Destinations = string | string[]

export interface SendSmsOptions {
  /** Client reference, truncated to 36 characters */
  trxId?: string
  /** 1 to request a delivery report */
  dlr?: number
  /** Local time yyyy-MM-dd HH:mm:ss */
  deliveryTime?: string
  /** e.g. 'high' for OTP traffic */
  priority?: string
}

export interface SendHlrOptions {
  trxId?: string
  /** Local time yyyy-MM-dd HH:mm:ss (sent with hour precision) */
  deliveryTime?: string
}

export interface OtpRequestParams {
  from?: string
  to?: Destinations
  secret?: string
  msisdncheck?: number | string
  pin_length?: number | string
  template?: string
}

export interface OtpCheckParams {
  from?: string
  secret?: string
  pin?: string
  msisdncheck?: number | string
}

// ─── Delivery reports ─────────────────────────────────────────────────────────

export interface DlrValidationResult {
  valid: boolean
  errors: string[]
}

/** Delivery-report callback body posted by the gateway */
export interface DlrReport {
  msg_id: string
  to: string
  /** 1 delivered, 0 failed */
  status: number
  trx_id?: string
  from?: string
  /** UNIX timestamp (GMT+7) of delivery */
  delivered?: number
  'error-text'?: string
  'meta-data'?: string
}
