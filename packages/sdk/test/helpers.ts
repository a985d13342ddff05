import type { Certificate, ProxyHost } from '@proxy-manager/shared'

export const BASE_URL = 'http://npm.test:81'

export function silentLogger() {
  return {
    log: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  }
}

export function makeHost(overrides: Partial<ProxyHost> = {}): ProxyHost {
  return {
    id: 11,
    created_on: '2026-01-01 00:00:00',
    modified_on: '2026-01-01 00:00:00',
    owner_user_id: 1,
    domain_names: ['a.example.com'],
    forward_scheme: 'http',
    forward_host: '10.0.0.5',
    forward_port: 8080,
    access_list_id: 0,
    certificate_id: 0,
    ssl_forced: false,
    caching_enabled: false,
    block_exploits: true,
    allow_websocket_upgrade: true,
    advanced_config: '',
    meta: {},
    enabled: true,
    locations: [],
    http2_support: false,
    hsts_enabled: false,
    hsts_subdomains: false,
    ...overrides,
  }
}

export function makeCertificate(overrides: Partial<Certificate> = {}): Certificate {
  return {
    id: 42,
    created_on: '2026-01-01 00:00:00',
    modified_on: '2026-01-01 00:00:00',
    owner_user_id: 1,
    provider: 'letsencrypt',
    nice_name: 'a.example.com',
    domain_names: ['a.example.com'],
    expires_on: '2026-04-01 00:00:00',
    meta: {},
    ...overrides,
  }
}

export function jsonResponse(status: number, body: unknown) {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  })
}

export interface SeenRequest {
  method: string
  url: string
  authorization: string | null
  body: unknown
}

type Route = (request: SeenRequest) => Response

function headerValue(headers: RequestInit['headers'], name: string): string | null {
  if (!headers) return null
  return new Headers(headers).get(name)
}

/**
 * Replaces global fetch with `route`. Every request is recorded in order;
 * bodies are parsed back from JSON.
 */
export function stubFetch(route: Route) {
  const seen: SeenRequest[] = []
  const spy = jest.spyOn(globalThis, 'fetch').mockImplementation(async (input, init) => {
    const request: SeenRequest = {
      method: init?.method ?? 'GET',
      url: String(input),
      authorization: headerValue(init?.headers, 'authorization'),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    }
    seen.push(request)
    return route(request)
  })
  return { seen, spy }
}

export function inOneHour() {
  return new Date(Date.now() + 60 * 60 * 1000).toISOString()
}
