/**
 * Delivery-report (DLR) callback helpers.
 * The gateway POSTs a report to your webhook when dlr=1 was requested on send,
 * and expects the plain-text body "OK" in reply.
 */

import type { DlrReport, DlrValidationResult } from './types'
import { DLR_REQUIRED_FIELDS, dlrReportSchema, isPresent } from './validation'

/** Plain-text body a DLR webhook must respond with */
export const DLR_ACK = 'OK'

/**
 * Check the fields every delivery report must carry.
 * Never throws; one message per missing field, in msg_id, to, status order.
 */
export function validateDlrPayload(payload: Record<string, unknown>): DlrValidationResult {
  const errors: string[] = []
  for (const field of DLR_REQUIRED_FIELDS) {
    if (!isPresent(payload[field])) errors.push(`${field} is missing`)
  }
  return { valid: errors.length === 0, errors }
}

/**
 * Narrow a callback body into a typed report.
 * Returns null when required fields are missing or malformed.
 */
export function parseDlrPayload(payload: Record<string, unknown>): DlrReport | null {
  const result = dlrReportSchema.safeParse(payload)
  if (!result.success) return null

  const { data } = result
  const report: DlrReport = { msg_id: data.msg_id, to: data.to, status: data.status }
  if (data.trx_id !== undefined) report.trx_id = data.trx_id
  if (data.from !== undefined) report.from = data.from
  if (data.delivered !== undefined) report.delivered = data.delivered
  if (data['error-text'] !== undefined) report['error-text'] = data['error-text']
  if (data['meta-data'] !== undefined) report['meta-data'] = data['meta-data']
  return report
}
