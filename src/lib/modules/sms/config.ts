/**
 * Environment configuration for the AYOSMS client.
 *
 *   AYOSMS_API_KEY    API key (Account Management > My Account)
 *   AYOSMS_TIME_ZONE  zone of caller-supplied delivery times, default Asia/Jakarta
 *   AYOSMS_BASE_URL   gateway base URL, default https://api.ayosms.com/mconnect/gw
 */

import { AyosmsClient } from './client'
import { AyosmsConfigError } from './errors'
import type { AyosmsClientOptions } from './types'
import { clientConfigSchema, envConfigSchema, formatIssues, type ClientConfig } from './validation'

export function loadAyosmsConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const vars = envConfigSchema.parse(env)
  const parsed = clientConfigSchema.safeParse({
    api_key: vars.AYOSMS_API_KEY,
    timeZone: vars.AYOSMS_TIME_ZONE || undefined,
    baseUrl: vars.AYOSMS_BASE_URL || undefined,
  })

  if (!parsed.success) {
    throw new AyosmsConfigError(`Invalid AYOSMS environment — ${formatIssues(parsed.error)}`)
  }

  return parsed.data
}

/** Build a client from process.env; transport and logger may still be injected */
export function createAyosmsClientFromEnv(
  overrides: Pick<AyosmsClientOptions, 'transport' | 'logger'> = {},
  env: NodeJS.ProcessEnv = process.env
): AyosmsClient {
  return new AyosmsClient({ ...loadAyosmsConfig(env), ...overrides })
}
