/**
 * AYOSMS! client — send SMS, balance, HLR lookup and OTP verify.
 *
 * Every operation resolves to JSON text and never rejects: either the
 * provider body (plus derived fields) or the uniform failure envelope
 * `{ status: 0, "error-text": "<CODE>: <message>", timestamp }`.
 * At most one POST per call, no retries.
 */

import { err, type Result } from '../../../types'
import { createLogger, type Logger } from '../../shared/logger'
import { validateDlrPayload } from './dlr'
import { toDeliveryTime } from './delivery-time'
import { AyosmsConfigError, buildErrorEnvelope, ERROR_CODES, OPERATION_CODES } from './errors'
import { calcSegments } from './gsm7'
import { isEmptyDestinations, normaliseDestinations } from './msisdn'
import { standardiseResponse, toBalanceEnvelope } from './response'
import { createFetchTransport, rawUrlEncode } from './transport'
import type {
  AyosmsClientOptions,
  Destinations,
  DlrValidationResult,
  EndpointTable,
  FormParams,
  Operation,
  OtpCheckParams,
  OtpRequestParams,
  ProviderBody,
  SendHlrOptions,
  SendSmsOptions,
  Transport,
} from './types'
import {
  clientConfigSchema,
  formatIssues,
  gsm7MessageSchema,
  messageBodySchema,
  requiredFieldSchema,
  senderIdSchema,
  trxIdSchema,
} from './validation'

const ENDPOINT_PATHS: Readonly<Record<Operation, string>> = {
  sendSms: '/sendsms.php',
  checkBalance: '/balance.php',
  sendHlr: '/sendhlr.php',
  otpRequest: '/verifyrequest.php',
  otpCheck: '/verifycheck.php',
}

/** Passed through to verifyrequest.php when supplied */
const OTP_REQUEST_PASSTHROUGH = ['msisdncheck', 'pin_length', 'template'] as const

const SENDER_ID_MAX = 11

export function buildEndpoints(baseUrl: string): EndpointTable {
  return Object.freeze({
    sendSms: `${baseUrl}${ENDPOINT_PATHS.sendSms}`,
    checkBalance: `${baseUrl}${ENDPOINT_PATHS.checkBalance}`,
    sendHlr: `${baseUrl}${ENDPOINT_PATHS.sendHlr}`,
    otpRequest: `${baseUrl}${ENDPOINT_PATHS.otpRequest}`,
    otpCheck: `${baseUrl}${ENDPOINT_PATHS.otpCheck}`,
  })
}

/** Integer cast for numeric flags; anything unparseable becomes 0 */
function toInt(value: number | string): number {
  const parsed = typeof value === 'number' ? Math.trunc(value) : Number.parseInt(value, 10)
  return Number.isNaN(parsed) ? 0 : parsed
}

/** Sender ID as sent on the wire: at most 11 characters, percent-encoded */
function encodeSender(from: string): string {
  return rawUrlEncode([...from].slice(0, SENDER_ID_MAX).join(''))
}

export class AyosmsClient {
  private readonly apiKey: string
  private readonly timeZone: string
  private readonly endpoints: EndpointTable
  private readonly transport: Transport
  private readonly logger: Logger

  constructor(options: AyosmsClientOptions = {}) {
    const parsed = clientConfigSchema.safeParse({
      api_key: options.api_key,
      timeZone: options.timeZone,
      baseUrl: options.baseUrl,
    })
    if (!parsed.success) {
      throw new AyosmsConfigError(`Invalid AYOSMS client options — ${formatIssues(parsed.error)}`)
    }

    this.apiKey = parsed.data.api_key
    this.timeZone = parsed.data.timeZone
    this.endpoints = buildEndpoints(parsed.data.baseUrl)
    this.transport = options.transport ?? createFetchTransport()
    this.logger = options.logger ?? createLogger('ayosms')
  }

  /** Endpoint table resolved at construction */
  get endpointTable(): EndpointTable {
    return this.endpoints
  }

  // ─── Operations ─────────────────────────────────────────────────────────────

  /**
   * Send an SMS to one or more recipients.
   * Success adds `segment`, the number of SMS parts the message uses.
   */
  async sendSms(
    from: string,
    to: Destinations,
    msg: string,
    options: SendSmsOptions = {}
  ): Promise<string> {
    return this.run('sendSms', async () => {
      if (!senderIdSchema.safeParse(from).success) {
        return err(ERROR_CODES.FROM_INVALID, 'from error or empty')
      }
      if (isEmptyDestinations(to)) return err(ERROR_CODES.TO_INVALID, 'to error or empty')
      if (!messageBodySchema.safeParse(msg).success) {
        return err(ERROR_CODES.MSG_INVALID, 'msg error or empty')
      }
      if (!gsm7MessageSchema.safeParse(msg).success) {
        return err(ERROR_CODES.MSG_CHARSET, 'msg contains non-GSM 7-bit characters')
      }

      const toList = normaliseDestinations(to)
      if (!toList) return err(ERROR_CODES.TO_INVALID, 'to format invalid')

      const deliveryInput = options.deliveryTime?.trim() ?? ''
      let deliveryTime = ''
      if (deliveryInput !== '') {
        const converted = toDeliveryTime(deliveryInput, 'minute', this.timeZone)
        if (!converted.ok) return converted
        deliveryTime = converted.value
      }

      const params: FormParams = {
        api_key: this.apiKey,
        from: encodeSender(from),
        to: toList.join(','),
        msg: rawUrlEncode(msg),
        trx_id: trxIdSchema.parse(options.trxId ?? ''),
        dlr: options.dlr !== undefined ? toInt(options.dlr) : 0,
      }
      if (deliveryTime !== '') params['delivery_time'] = deliveryTime
      if (options.priority) params['priority'] = options.priority

      const result = await this.call('sendSms', params)
      if (!result.ok) return result
      return { ok: true, value: { ...result.value, segment: calcSegments(msg) } }
    })
  }

  /** Remaining credit: `{ status: 1, balance, currency, balance_expired }` */
  async checkBalance(): Promise<string> {
    return this.run('checkBalance', async () => {
      const result = await this.call('checkBalance', { api_key: this.apiKey }, 'unknown balance error')
      if (!result.ok) return result
      return { ok: true, value: toBalanceEnvelope(result.value) }
    })
  }

  /** HLR lookup. Delivery time is sent with hour precision. */
  async sendHlr(to: Destinations, options: SendHlrOptions = {}): Promise<string> {
    return this.run('sendHlr', async () => {
      if (isEmptyDestinations(to)) return err(ERROR_CODES.TO_INVALID, 'to error or empty')

      const toList = normaliseDestinations(to)
      if (!toList) return err(ERROR_CODES.TO_INVALID, 'to format invalid')

      const trxId = trxIdSchema.parse(options.trxId ?? '')
      const deliveryInput = options.deliveryTime?.trim() ?? ''
      let deliveryTime = ''
      if (deliveryInput !== '') {
        const converted = toDeliveryTime(deliveryInput, 'hour', this.timeZone)
        if (!converted.ok) return converted
        deliveryTime = converted.value
      }

      const params: FormParams = { api_key: this.apiKey, to: toList.join(',') }
      if (trxId !== '') params['trx_id'] = trxId
      if (deliveryTime !== '') params['delivery_time'] = deliveryTime

      return this.call('sendHlr', params)
    })
  }

  /** OTP verify: ask the gateway to generate a PIN and SMS it to `to` */
  async otpRequest(params: OtpRequestParams): Promise<string> {
    return this.run('otpRequest', async () => {
      if (!requiredFieldSchema.safeParse(params.from).success) {
        return err(ERROR_CODES.FROM_INVALID, 'from error or empty')
      }
      if (isEmptyDestinations(params.to)) return err(ERROR_CODES.TO_INVALID, 'to error or empty')
      if (!requiredFieldSchema.safeParse(params.secret).success) {
        return err(ERROR_CODES.SECRET_INVALID, 'secret error or empty')
      }

      const toList = params.to !== undefined ? normaliseDestinations(params.to) : null
      if (!toList) return err(ERROR_CODES.TO_INVALID, 'to format invalid')

      const payload: FormParams = {
        api_key: this.apiKey,
        from: encodeSender(params.from ?? ''),
        to: toList.join(','),
        secret: params.secret ?? '',
      }
      for (const key of OTP_REQUEST_PASSTHROUGH) {
        const value = params[key]
        if (value !== undefined) payload[key] = typeof value === 'string' ? value.trim() : value
      }

      return this.call('otpRequest', payload)
    })
  }

  /** OTP verify: check the PIN the user entered */
  async otpCheck(params: OtpCheckParams): Promise<string> {
    return this.run('otpCheck', async () => {
      if (!requiredFieldSchema.safeParse(params.from).success) {
        return err(ERROR_CODES.FROM_INVALID, 'from error or empty')
      }
      if (!requiredFieldSchema.safeParse(params.secret).success) {
        return err(ERROR_CODES.SECRET_INVALID, 'secret error or empty')
      }
      if (!requiredFieldSchema.safeParse(params.pin).success) {
        return err(ERROR_CODES.PIN_INVALID, 'pin error or empty')
      }

      const payload: FormParams = {
        api_key: this.apiKey,
        from: encodeSender(params.from ?? ''),
        secret: params.secret ?? '',
        pin: params.pin ?? '',
      }
      if (params.msisdncheck !== undefined) payload['msisdncheck'] = toInt(params.msisdncheck)

      return this.call('otpCheck', payload)
    })
  }

  /** See {@link validateDlrPayload}; needs no credential */
  validateDlrPayload(payload: Record<string, unknown>): DlrValidationResult {
    return validateDlrPayload(payload)
  }

  // ─── Pipeline ───────────────────────────────────────────────────────────────

  /**
   * Fault boundary shared by all operations: checks the credential, runs the
   * step and serialises whatever comes out, including thrown errors.
   */
  private async run(operation: Operation, step: () => Promise<Result<object>>): Promise<string> {
    const codes = OPERATION_CODES[operation]
    let result: Result<object>

    try {
      result = this.apiKey === '' ? err(ERROR_CODES.API_KEY_EMPTY, 'api_key is empty') : await step()
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error)
      this.log('error', 'Unexpected failure', { operation, message })
      result = err(codes.fault, `Exception: ${message}`)
    }

    if (result.ok) return JSON.stringify(result.value)

    this.log('warn', 'Request failed', { operation, code: result.code, message: result.message })
    return JSON.stringify(buildErrorEnvelope(result.code, result.message, this.timeZone))
  }

  /** Logging must not change an operation's outcome; a failing sink is reported on stderr */
  private log(
    level: 'debug' | 'warn' | 'error',
    message: string,
    data: Record<string, unknown>
  ): void {
    try {
      this.logger[level](message, data)
    } catch (logError) {
      const reason = logError instanceof Error ? logError.message : String(logError)
      console.error(`[ayosms] logger.${level} failed: ${reason}`)
    }
  }

  private async call(
    operation: Operation,
    params: FormParams,
    fallbackError?: string
  ): Promise<Result<ProviderBody>> {
    const endpoint = this.endpoints[operation]
    this.log('debug', 'Calling gateway', { operation, endpoint, params })

    const raw = await this.transport(endpoint, params)
    return standardiseResponse(raw, OPERATION_CODES[operation], fallbackError)
  }
}
