export { AyosmsClient, buildEndpoints } from './lib/modules/sms/client'
export { createAyosmsClientFromEnv, loadAyosmsConfig } from './lib/modules/sms/config'
export { DLR_ACK, parseDlrPayload, validateDlrPayload } from './lib/modules/sms/dlr'
export {
  AyosmsConfigError,
  ERROR_CODES,
  OPERATION_CODES,
  PROVIDER_ERROR_CODES,
  isErrorEnvelope,
  parseEnvelope,
  splitErrorText,
} from './lib/modules/sms/errors'
export { calcSegments, isGsm7Bit } from './lib/modules/sms/gsm7'
export { normaliseDestinations, normaliseMsisdn } from './lib/modules/sms/msisdn'
export { createFetchTransport, REQUEST_TIMEOUT_MS } from './lib/modules/sms/transport'
export { createLogger } from './lib/shared/logger'
export type { Logger, LogLevel } from './lib/shared/logger'
export type {
  AyosmsClientOptions,
  BalanceEnvelope,
  Destinations,
  DlrReport,
  DlrValidationResult,
  EndpointTable,
  ErrorEnvelope,
  FormParams,
  Operation,
  OtpCheckParams,
  OtpRequestParams,
  SendHlrOptions,
  SendSmsOptions,
  Transport,
  TransportResult,
} from './lib/modules/sms/types'
