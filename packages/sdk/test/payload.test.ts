import { certificateIdFor, certificateMeta, toCreatePayload, toUpdatePayload } from '../src/payload'

describe('certificateIdFor', () => {
  it('maps each selection to its wire value', () => {
    expect(certificateIdFor({ type: 'none' })).toBe(0)
    expect(certificateIdFor({ type: 'new' })).toBe('new')
    expect(certificateIdFor({ type: 'existing', id: 9 })).toBe(9)
  })
})

describe('certificateMeta', () => {
  it('only carries Let\'s Encrypt options for a new certificate', () => {
    expect(certificateMeta({ type: 'new' }, 'certs@example.com')).toEqual({
      letsencrypt_agree: true,
      letsencrypt_email: 'certs@example.com',
      dns_challenge: false,
    })
    expect(certificateMeta({ type: 'existing', id: 9 }, 'certs@example.com')).toEqual({})
  })
})

describe('toCreatePayload', () => {
  it('keeps caller values over defaults', () => {
    const payload = toCreatePayload(
      {
        domainName: 'a.example.com',
        additionalDomainNames: ['www.a.example.com'],
        forwardHost: 'backend',
        forwardPort: 443,
        forwardScheme: 'https',
        blockExploits: false,
        accessListId: 2,
        advancedConfig: 'client_max_body_size 10m;',
        locations: [{ path: '/api', forward_scheme: 'http', forward_host: 'api', forward_port: 3000 }],
      },
      { type: 'none' },
      'admin@example.com',
    )

    expect(payload).toMatchObject({
      domain_names: ['a.example.com', 'www.a.example.com'],
      forward_scheme: 'https',
      forward_port: 443,
      block_exploits: false,
      access_list_id: 2,
      advanced_config: 'client_max_body_size 10m;',
      certificate_id: 0,
      meta: {},
    })
    expect(payload.locations).toHaveLength(1)
  })
})

describe('toUpdatePayload', () => {
  it('leaves out everything not supplied', () => {
    expect(toUpdatePayload({}, 'admin@example.com')).toEqual({})
  })

  it('sends false values and domain names as given', () => {
    expect(
      toUpdatePayload({ domainNames: ['b.example.com'], sslForced: false, enabled: false }, 'admin@example.com'),
    ).toEqual({ domain_names: ['b.example.com'], ssl_forced: false, enabled: false })
  })

  it('uses the given Let\'s Encrypt email only for a new certificate', () => {
    expect(
      toUpdatePayload({ certificate: { type: 'new' }, letsencryptEmail: 'certs@example.com' }, 'admin@example.com').meta,
    ).toEqual({ letsencrypt_agree: true, letsencrypt_email: 'certs@example.com', dns_challenge: false })
    expect(toUpdatePayload({ letsencryptEmail: 'certs@example.com' }, 'admin@example.com')).toEqual({})
  })

  it('adds Let\'s Encrypt meta when asking for a new certificate', () => {
    expect(toUpdatePayload({ certificate: { type: 'new' } }, 'admin@example.com')).toEqual({
      certificate_id: 'new',
      meta: { letsencrypt_agree: true, letsencrypt_email: 'admin@example.com', dns_challenge: false },
    })
    expect(toUpdatePayload({ certificate: { type: 'existing', id: 4 } }, 'admin@example.com')).toEqual({
      certificate_id: 4,
    })
  })
})
