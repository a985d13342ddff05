import type { LoggerService } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { CONFIG_ENV_KEYS } from '@proxy-manager/shared'
import type { TokenResponse } from '@proxy-manager/shared'
import { assertValid, ClientConfigDto } from './validation'

export interface SDKConfig {
  /** Admin URL of the proxy manager, e.g. `http://localhost:81`. */
  baseUrl: string
  /** Account email used for the token exchange and as the default Let's Encrypt email. */
  identity: string
  secret: string
  /** Trace every request and the reconciliation decisions. Default `false`. */
  debug?: boolean
  /** Abort requests that take longer than this. Unset means no client-side deadline. */
  timeoutMs?: number
  /** Refresh the token this long before it expires. Default one minute. */
  tokenRefreshMarginMs?: number
  logger?: LoggerService
  onTokenRefresh?: (token: TokenResponse) => void
  onUnauthorized?: () => void
}

export function validateConfig(config: SDKConfig): SDKConfig {
  assertValid(
    ClientConfigDto,
    {
      baseUrl: config.baseUrl,
      identity: config.identity,
      secret: config.secret,
      debug: config.debug,
      timeoutMs: config.timeoutMs,
      tokenRefreshMarginMs: config.tokenRefreshMarginMs,
    },
    'client configuration',
  )
  return config
}

/**
 * Builds an `SDKConfig` from `PROXY_MANAGER_*` settings. Pass the application's
 * `ConfigService` when running inside a Nest app; explicit overrides win.
 */
export function loadConfig(config: ConfigService = new ConfigService(), overrides: Partial<SDKConfig> = {}): SDKConfig {
  const loaded: SDKConfig = {
    baseUrl: readString(config, CONFIG_ENV_KEYS.baseUrl),
    identity: readString(config, CONFIG_ENV_KEYS.identity),
    secret: readString(config, CONFIG_ENV_KEYS.secret),
    debug: readBool(config, CONFIG_ENV_KEYS.debug, false),
    timeoutMs: readInt(config, CONFIG_ENV_KEYS.timeoutMs),
    ...overrides,
  }
  return validateConfig(loaded)
}

function readString(config: ConfigService, key: string) {
  return String(config.get<unknown>(key) ?? '').trim()
}

function readBool(config: ConfigService, key: string, fallback: boolean) {
  const raw = readString(config, key).toLowerCase()
  if (!raw) return fallback
  return ['1', 'true', 'yes', 'on'].includes(raw)
}

function readInt(config: ConfigService, key: string) {
  const value = Number(readString(config, key))
  if (!Number.isFinite(value) || value <= 0) return undefined
  return Math.floor(value)
}
