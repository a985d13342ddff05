import { API_PATHS } from '@proxy-manager/shared'
import type { Certificate, CertificateExpand } from '@proxy-manager/shared'
import type { HttpGateway } from '../client'
import { assertId } from '../validation'

/** Finds a certificate whose domain set is exactly the given one. */
export interface CertificateLookup {
  findByDomains(domainNames: string[]): Promise<Certificate | null>
}

export function normalizeDomains(domainNames: string[]) {
  return domainNames.map((domain) => domain.trim().toLowerCase()).sort()
}

export function coversExactly(certificate: Certificate, domainNames: string[]) {
  const wanted = normalizeDomains(domainNames)
  const held = normalizeDomains(certificate.domain_names)
  return wanted.length === held.length && wanted.every((domain, index) => domain === held[index])
}

const certificatePath = (id: number) => `${API_PATHS.certificates}/${assertId(id, 'certificate id')}`

export function createCertificatesApi(client: HttpGateway) {
  const list = (expand?: CertificateExpand[]) =>
    client.get<Certificate[]>(API_PATHS.certificates, { expand: expand?.join(',') })

  return {
    list,

    get: async (id: number, expand?: CertificateExpand[]) =>
      client.get<Certificate>(certificatePath(id), { expand: expand?.join(',') }),

    delete: async (id: number) =>
      client.delete<boolean | undefined>(certificatePath(id)).then((result) => result !== false),

    // Only Let's Encrypt certificates are candidates: custom uploads are not renewed by the server.
    findByDomains: async (domainNames: string[]) => {
      const certificates = await list()
      return (
        certificates.find(
          (certificate) => certificate.provider === 'letsencrypt' && coversExactly(certificate, domainNames),
        ) ?? null
      )
    },
  }
}

export type CertificatesApi = ReturnType<typeof createCertificatesApi>
