import { z } from 'zod'
import { isKnownTimeZone, GATEWAY_TIMEZONE } from '../../shared/dates'
import { isGsm7Bit, messageLength } from './gsm7'

// ── Client configuration ──────────────────────────────────────────────────────

export const DEFAULT_BASE_URL = 'https://api.ayosms.com/mconnect/gw'

const timeZoneSchema = z
  .string()
  .refine(isKnownTimeZone, 'Unknown time zone — use an IANA name such as Asia/Jakarta')

/**
 * An empty or missing api_key is accepted here: the client is still built and
 * every operation reports ERR999 instead.
 */
export const clientConfigSchema = z.object({
  api_key: z.string().trim().default(''),
  timeZone: timeZoneSchema.default(GATEWAY_TIMEZONE),
  baseUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, ''))
    .default(DEFAULT_BASE_URL),
})

export type ClientConfig = z.infer<typeof clientConfigSchema>

/** Environment variables read by loadAyosmsConfig */
export const envConfigSchema = z.object({
  AYOSMS_API_KEY: z.string().optional(),
  AYOSMS_TIME_ZONE: z.string().optional(),
  AYOSMS_BASE_URL: z.string().optional(),
})

/** One line per zod issue: "baseUrl: Invalid url; timeZone: Unknown time zone…" */
export function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
}

// ── Operation fields ──────────────────────────────────────────────────────────

/** Sender ID: 1–11 characters, counted as code points */
export const senderIdSchema = z
  .string()
  .refine((from) => from.length > 0 && messageLength(from) <= 11, 'from error or empty')

/** Message body: 1–400 characters, counted as code points */
export const messageBodySchema = z
  .string()
  .refine((msg) => msg.length > 0 && messageLength(msg) <= 400, 'msg error or empty')

export const gsm7MessageSchema = z
  .string()
  .refine(isGsm7Bit, 'msg contains non-GSM 7-bit characters')

export const requiredFieldSchema = z.string().min(1)

/** Client reference sent as trx_id; longer values are truncated, not rejected */
export const trxIdSchema = z.string().transform((id) => [...id].slice(0, 36).join(''))

// ── Delivery reports ──────────────────────────────────────────────────────────

/** Required DLR fields, in the order their absence is reported */
export const DLR_REQUIRED_FIELDS = ['msg_id', 'to', 'status'] as const

/** The gateway posts form fields, so numbers may arrive as strings */
const textField = z.union([z.string(), z.number()]).transform(String)
const numericField = z.union([z.number(), z.string().min(1)]).pipe(z.coerce.number())

export const dlrReportSchema = z.object({
  msg_id: textField.pipe(z.string().min(1)),
  to: textField.pipe(z.string().min(1)),
  status: numericField.pipe(z.number().int()),
  trx_id: textField.optional(),
  from: textField.optional(),
  delivered: numericField.optional(),
  'error-text': textField.optional(),
  'meta-data': textField.optional(),
})

/** True if a DLR field holds a usable value (not absent, null or "") */
export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== ''
}
