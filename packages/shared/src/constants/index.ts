export const API_BASE = '/api'

export const API_PATHS = {
  tokens: `${API_BASE}/tokens`,
  me: `${API_BASE}/users/me`,
  proxyHosts: `${API_BASE}/nginx/proxy-hosts`,
  certificates: `${API_BASE}/nginx/certificates`,
} as const

// Tokens issued by the server live for a day; without an `expires` field we assume a bit less.
export const DEFAULT_TOKEN_TTL_MS = 23 * 60 * 60 * 1000 // 23 hours

export const TOKEN_REFRESH_MARGIN_MS = 60 * 1000

export const PROXY_HOST_DEFAULTS = {
  forwardScheme: 'http',
  blockExploits: true,
  http2Support: true,
  sslForced: true,
  hstsEnabled: true,
  hstsSubdomains: false,
  allowWebsocketUpgrade: true,
  cachingEnabled: false,
  accessListId: 0,
  advancedConfig: '',
  reuseCertificate: true,
} as const

export const RENAME_DEFAULTS = {
  renewCertificate: true,
  reuseCertificate: true,
} as const

export const CONFIG_ENV_KEYS = {
  baseUrl: 'PROXY_MANAGER_URL',
  identity: 'PROXY_MANAGER_IDENTITY',
  secret: 'PROXY_MANAGER_SECRET',
  debug: 'PROXY_MANAGER_DEBUG',
  timeoutMs: 'PROXY_MANAGER_TIMEOUT_MS',
} as const
