/**
 * Namespaced console logger.
 * Credentials, OTP secrets and PINs are redacted before anything is written.
 */

const SENSITIVE_FIELDS = new Set([
  'apikey',
  'api_key',
  'secret',
  'pin',
  'token',
  'password',
  'authorization',
  'credential',
  'credentials',
  'access_token',
  'refresh_token',
])

/** Deep copy of `value` with sensitive keys replaced by [REDACTED] */
export function redactSensitive(value: unknown): unknown {
  if (value === null || typeof value !== 'object') return value

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitive(item))
  }

  const result: Record<string, unknown> = {}
  for (const [key, val] of Object.entries(value)) {
    result[key] = SENSITIVE_FIELDS.has(key.toLowerCase()) ? '[REDACTED]' : redactSensitive(val)
  }
  return result
}

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 }

export interface Logger {
  namespace: string
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
}

export function formatLogLine(
  level: LogLevel,
  namespace: string,
  message: string,
  data?: Record<string, unknown>,
  now: Date = new Date()
): string {
  const prefix = `[${now.toISOString()}] [${level}] [${namespace}]`
  if (data) {
    return `${prefix} ${message} ${JSON.stringify(redactSensitive(data))}`
  }
  return `${prefix} ${message}`
}

/** Lines below `minLevel` are dropped; DEBUG output (request params) is off by default */
export function createLogger(namespace: string, minLevel: LogLevel = 'INFO'): Logger {
  const enabled = (level: LogLevel) => LEVEL_RANK[level] >= LEVEL_RANK[minLevel]

  return {
    namespace,
    debug(message, data) {
      if (enabled('DEBUG')) console.debug(formatLogLine('DEBUG', namespace, message, data))
    },
    info(message, data) {
      if (enabled('INFO')) console.info(formatLogLine('INFO', namespace, message, data))
    },
    warn(message, data) {
      if (enabled('WARN')) console.warn(formatLogLine('WARN', namespace, message, data))
    },
    error(message, data) {
      if (enabled('ERROR')) console.error(formatLogLine('ERROR', namespace, message, data))
    },
  }
}
