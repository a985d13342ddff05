import { ConfigService } from '@nestjs/config'
import { loadConfig } from '../src/config'
import { ValidationError } from '../src/errors'

const KEYS = [
  'PROXY_MANAGER_URL',
  'PROXY_MANAGER_IDENTITY',
  'PROXY_MANAGER_SECRET',
  'PROXY_MANAGER_DEBUG',
  'PROXY_MANAGER_TIMEOUT_MS',
]

beforeEach(() => {
  for (const key of KEYS) delete process.env[key]
})

describe('loadConfig', () => {
  it('reads PROXY_MANAGER_* settings', () => {
    const config = loadConfig(
      new ConfigService({
        PROXY_MANAGER_URL: 'http://localhost:81',
        PROXY_MANAGER_IDENTITY: 'admin@example.com',
        PROXY_MANAGER_SECRET: 'test-secret',
        PROXY_MANAGER_DEBUG: 'yes',
        PROXY_MANAGER_TIMEOUT_MS: '2500',
      }),
    )

    expect(config).toEqual({
      baseUrl: 'http://localhost:81',
      identity: 'admin@example.com',
      secret: 'test-secret',
      debug: true,
      timeoutMs: 2500,
    })
  })

  it('falls back to defaults for unset or unusable values', () => {
    const config = loadConfig(
      new ConfigService({
        PROXY_MANAGER_URL: 'http://localhost:81',
        PROXY_MANAGER_IDENTITY: 'admin@example.com',
        PROXY_MANAGER_SECRET: 'test-secret',
        PROXY_MANAGER_TIMEOUT_MS: 'soon',
      }),
    )

    expect(config.debug).toBe(false)
    expect(config.timeoutMs).toBeUndefined()
  })

  it('lets explicit overrides win', () => {
    const config = loadConfig(
      new ConfigService({ PROXY_MANAGER_URL: 'http://localhost:81', PROXY_MANAGER_IDENTITY: 'admin@example.com' }),
      { secret: 'test-secret', baseUrl: 'https://proxy.example.com' },
    )

    expect(config.baseUrl).toBe('https://proxy.example.com')
    expect(config.secret).toBe('test-secret')
  })

  it('rejects missing credentials', () => {
    const load = () => loadConfig(new ConfigService({ PROXY_MANAGER_URL: 'http://localhost:81' }))

    expect(load).toThrow(ValidationError)
    expect(load).toThrow(
      'Invalid client configuration: identity should not be empty; secret should not be empty',
    )
  })
})
