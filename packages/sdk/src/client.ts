import { Logger } from '@nestjs/common'
import type { LoggerService } from '@nestjs/common'
import { API_PATHS, DEFAULT_TOKEN_TTL_MS, TOKEN_REFRESH_MARGIN_MS } from '@proxy-manager/shared'
import type { TokenResponse } from '@proxy-manager/shared'
import { validateConfig } from './config'
import type { SDKConfig } from './config'
import { APIError, AuthenticationError, ProxyManagerError } from './errors'

export type QueryParams = Record<string, string | undefined>

/** The four verbs the resource APIs and the reconciler need. */
export interface HttpGateway {
  get<T>(path: string, query?: QueryParams): Promise<T>
  post<T>(path: string, body?: unknown): Promise<T>
  put<T>(path: string, body?: unknown): Promise<T>
  delete<T>(path: string): Promise<T>
}

export function withQuery(path: string, query: QueryParams = {}) {
  const params = new URLSearchParams()
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined && value !== '') params.set(key, value)
  }
  const search = params.toString()
  return search ? `${path}?${search}` : path
}

export class ProxyManagerClient implements HttpGateway {
  readonly logger: LoggerService
  private baseUrl: string
  private token: string | null = null
  private tokenExpiresAt = 0
  private closed = false
  private config: SDKConfig

  constructor(config: SDKConfig) {
    this.config = validateConfig(config)
    this.baseUrl = config.baseUrl.replace(/\/$/, '')
    this.logger = config.logger ?? new Logger(ProxyManagerClient.name)
  }

  get identity() {
    return this.config.identity
  }

  get debugEnabled() {
    return this.config.debug === true
  }

  get isAuthenticated() {
    return this.token !== null && !this.closed
  }

  /** Exchanges the configured credentials for a bearer token. */
  async authenticate(): Promise<TokenResponse> {
    this.assertOpen()
    const url = `${this.baseUrl}${API_PATHS.tokens}`
    let res: Response
    try {
      res = await this.fetchWithNetworkGuard(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ identity: this.config.identity, secret: this.config.secret }),
      })
    } catch (error) {
      throw new AuthenticationError(`Authentication failed: ${describe(error)}`, { cause: error })
    }

    if (!res.ok) {
      const failure = await this.buildApiError(res)
      throw new AuthenticationError(`Authentication failed: ${failure.message}`, { cause: failure })
    }

    const tokens = await this.parseSuccessBody<Partial<TokenResponse> | undefined>(res)
    if (!tokens || typeof tokens.token !== 'string' || !tokens.token) {
      throw new AuthenticationError('Authentication failed: token response did not include a token')
    }

    return this.setToken({ token: tokens.token, expires: tokens.expires })
  }

  /** Drops the token. Any request made afterwards rejects. */
  close() {
    this.token = null
    this.tokenExpiresAt = 0
    this.closed = true
  }

  private setToken(tokens: TokenResponse) {
    this.token = tokens.token
    const expiresAt = tokens.expires ? Date.parse(tokens.expires) : Number.NaN
    this.tokenExpiresAt = Number.isFinite(expiresAt) ? expiresAt : Date.now() + DEFAULT_TOKEN_TTL_MS
    this.config.onTokenRefresh?.(tokens)
    return tokens
  }

  private assertOpen() {
    if (this.closed) throw new ProxyManagerError('Client is closed')
  }

  private tokenNeedsRefresh() {
    const margin = this.config.tokenRefreshMarginMs ?? TOKEN_REFRESH_MARGIN_MS
    return Date.now() >= this.tokenExpiresAt - margin
  }

  private async ensureToken() {
    this.assertOpen()
    if (this.token && !this.tokenNeedsRefresh()) return
    if (this.token && (await this.tryRefresh())) return
    await this.authenticate()
  }

  private buildNetworkError(url: string, error: unknown) {
    const detail = error instanceof Error && error.message ? error.message : 'Network request failed.'
    return `Failed to reach proxy manager at ${url}. ${detail}`
  }

  private async fetchWithNetworkGuard(url: string, options: RequestInit) {
    const timeoutMs = this.config.timeoutMs
    const controller = timeoutMs ? new AbortController() : null
    const timeoutId = controller ? setTimeout(() => controller.abort(), timeoutMs) : undefined

    try {
      return await fetch(url, controller ? { ...options, signal: controller.signal } : options)
    } catch (error) {
      throw new APIError(0, this.buildNetworkError(url, error))
    } finally {
      if (timeoutId) clearTimeout(timeoutId)
    }
  }

  private isJsonResponse(res: Response) {
    const contentType = res.headers.get('content-type')?.toLowerCase() ?? ''
    return contentType.includes('application/json') || contentType.includes('+json')
  }

  private async parseSuccessBody<T>(res: Response): Promise<T> {
    if (res.status === 204 || res.status === 205) {
      return undefined as T
    }

    const contentLength = res.headers.get('content-length')
    if (contentLength === '0') {
      return undefined as T
    }

    const raw = await res.text()
    if (!raw.trim()) {
      return undefined as T
    }

    if (this.isJsonResponse(res)) {
      try {
        return JSON.parse(raw) as T
      } catch {
        throw new APIError(res.status, `Invalid JSON response from ${res.url}`, raw)
      }
    }

    return raw as T
  }

  private async buildApiError(res: Response) {
    const body = await res.text()
    const details = extractErrorDetails(body)
    const summary = details ?? body.slice(0, 500)
    const message = summary ? `HTTP ${res.status}: ${summary}` : `HTTP ${res.status}`
    return new APIError(res.status, message, body, details)
  }

  private async request<T>(path: string, options: RequestInit = {}): Promise<T> {
    await this.ensureToken()

    const url = `${this.baseUrl}${path}`
    const method = options.method ?? 'GET'
    const send = () =>
      this.fetchWithNetworkGuard(url, {
        ...options,
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.token}`,
        },
      })

    if (this.debugEnabled) {
      this.logger.debug?.(`${method} ${url}${options.body ? ` ${options.body}` : ''}`)
    }

    let res = await send()

    if (res.status === 401) {
      const refreshed = (await this.tryRefresh()) || (await this.tryReauthenticate())
      if (!refreshed) {
        this.config.onUnauthorized?.()
        throw new APIError(401, 'Unauthorized')
      }
      res = await send()
    }

    if (this.debugEnabled) {
      this.logger.debug?.(`${method} ${url} -> ${res.status}`)
    }

    if (!res.ok) throw await this.buildApiError(res)
    return this.parseSuccessBody<T>(res)
  }

  private async tryRefresh(): Promise<boolean> {
    if (!this.token) return false
    try {
      const res = await this.fetchWithNetworkGuard(`${this.baseUrl}${API_PATHS.tokens}`, {
        method: 'GET',
        headers: { Authorization: `Bearer ${this.token}` },
      })
      if (!res.ok) return false
      const tokens = await this.parseSuccessBody<Partial<TokenResponse> | undefined>(res)
      if (!tokens || typeof tokens.token !== 'string' || !tokens.token) return false
      this.setToken({ token: tokens.token, expires: tokens.expires })
      return true
    } catch (error) {
      this.logger.warn(`Token refresh failed, falling back to credentials: ${describe(error)}`)
      return false
    }
  }

  private async tryReauthenticate(): Promise<boolean> {
    try {
      await this.authenticate()
      return true
    } catch (error) {
      this.logger.warn(`Re-authentication failed: ${describe(error)}`)
      return false
    }
  }

  get<T>(path: string, query?: QueryParams) {
    return this.request<T>(withQuery(path, query), { method: 'GET' })
  }

  post<T>(path: string, body?: unknown) {
    return this.request<T>(path, {
      method: 'POST',
      body: body ? JSON.stringify(body) : undefined,
    })
  }

  put<T>(path: string, body?: unknown) {
    return this.request<T>(path, {
      method: 'PUT',
      body: body ? JSON.stringify(body) : undefined,
    })
  }

  delete<T>(path: string) {
    return this.request<T>(path, { method: 'DELETE' })
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Pulls the human-readable message out of `{ error: { message } }`, `{ error }` or `{ message }` bodies. */
export function extractErrorDetails(body: string): string | null {
  let parsed: unknown
  try {
    parsed = JSON.parse(body)
  } catch {
    return null
  }
  if (!isRecord(parsed)) return null

  const { error, message } = parsed
  if (isRecord(error) && typeof error.message === 'string') return error.message
  if (typeof error === 'string') return error
  if (typeof message === 'string') return message
  return null
}

function describe(error: unknown) {
  return error instanceof Error && error.message ? error.message : String(error)
}
