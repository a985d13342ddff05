import type { LoggerService } from '@nestjs/common'
import { API_PATHS, PROXY_HOST_DEFAULTS, RENAME_DEFAULTS } from '@proxy-manager/shared'
import type {
  CertificateSelection,
  CreateProxyHostInput,
  ProxyHost,
  ProxyHostPayload,
  RenameProxyHostInput,
  SslFlags,
  UpdateProxyHostInput,
} from '@proxy-manager/shared'
import type { CertificateLookup } from '../api/certificates'
import type { HttpGateway } from '../client'
import { PartialReconciliationError } from '../errors'
import { certificateIdFor, certificateMeta, domainSet, toCreatePayload, toUpdatePayload } from '../payload'
import { assertId, assertValid, CreateProxyHostDto, RenameProxyHostDto } from '../validation'

export interface ReconcilerOptions {
  /** Let's Encrypt email when neither the caller nor the host names one. */
  defaultEmail: string
  logger: LoggerService
  debug?: boolean
}

/**
 * The server drops `ssl_forced`, `http2_support`, `hsts_enabled` and
 * `hsts_subdomains` when a host is saved with `certificate_id: "new"`, since no
 * certificate is attached yet at that point. Once the response shows the issued
 * certificate, the flags the caller asked for are written back with a second PUT.
 */
export function correctiveUpdate(requested: SslFlags): UpdateProxyHostInput {
  const update: UpdateProxyHostInput = {}
  if (requested.ssl_forced) update.sslForced = true
  if (requested.http2_support) update.http2Support = true
  if (requested.hsts_enabled) {
    update.hstsEnabled = true
    if (requested.hsts_subdomains) update.hstsSubdomains = true
  }
  return update
}

export class ProxyHostReconciler {
  constructor(
    private http: HttpGateway,
    private certificates: CertificateLookup,
    private options: ReconcilerOptions,
  ) {}

  async create(input: CreateProxyHostInput): Promise<ProxyHost> {
    assertValid(CreateProxyHostDto, input, 'proxy host')

    const domainNames = domainSet(input.domainName, input.additionalDomainNames)
    const certificate = await this.resolveCertificate(
      input.certificate ?? { type: 'new' },
      domainNames,
      input.reuseCertificate ?? PROXY_HOST_DEFAULTS.reuseCertificate,
    )
    const payload = toCreatePayload(input, certificate, input.letsencryptEmail ?? this.options.defaultEmail)

    const created = await this.http.post<ProxyHost>(API_PATHS.proxyHosts, payload)
    return this.restoreSslFlags(created, certificate, {
      ssl_forced: payload.ssl_forced === true,
      http2_support: payload.http2_support === true,
      hsts_enabled: payload.hsts_enabled === true,
      hsts_subdomains: payload.hsts_subdomains === true,
    })
  }

  async rename(hostId: number, input: RenameProxyHostInput): Promise<ProxyHost> {
    assertId(hostId, 'host id')
    assertValid(RenameProxyHostDto, input, 'rename')

    const path = `${API_PATHS.proxyHosts}/${hostId}`
    const domainNames = domainSet(input.domainName, input.additionalDomainNames)

    if (!(input.renewCertificate ?? RENAME_DEFAULTS.renewCertificate)) {
      return this.http.put<ProxyHost>(path, { domain_names: domainNames })
    }

    const current = await this.http.get<ProxyHost>(path)
    if (!(current.certificate_id > 0)) {
      this.trace(`Host ${hostId} has no certificate; renaming without requesting one`)
      return this.http.put<ProxyHost>(path, { domain_names: domainNames })
    }

    const certificate = await this.resolveCertificate(
      { type: 'new' },
      domainNames,
      input.reuseCertificate ?? RENAME_DEFAULTS.reuseCertificate,
    )
    const flags: SslFlags = {
      ssl_forced: current.ssl_forced,
      http2_support: current.http2_support,
      hsts_enabled: current.hsts_enabled,
      hsts_subdomains: current.hsts_subdomains,
    }
    const email = input.letsencryptEmail ?? current.meta?.letsencrypt_email ?? this.options.defaultEmail
    const payload: ProxyHostPayload = {
      domain_names: domainNames,
      certificate_id: certificateIdFor(certificate),
      meta: certificateMeta(certificate, email),
      ...flags,
    }

    const renamed = await this.http.put<ProxyHost>(path, payload)
    return this.restoreSslFlags(renamed, certificate, flags)
  }

  private async resolveCertificate(
    requested: CertificateSelection,
    domainNames: string[],
    reuse: boolean,
  ): Promise<CertificateSelection> {
    if (requested.type !== 'new' || !reuse) return requested

    const existing = await this.certificates.findByDomains(domainNames)
    if (!existing) {
      this.trace(`No certificate covers ${domainNames.join(', ')}; requesting a new one`)
      return requested
    }

    this.trace(`Reusing certificate ${existing.id} for ${domainNames.join(', ')}`)
    return { type: 'existing', id: existing.id }
  }

  private async restoreSslFlags(record: ProxyHost, certificate: CertificateSelection, requested: SslFlags) {
    if (certificate.type !== 'new' || !record.certificate_id) return record

    const correction = correctiveUpdate(requested)
    if (Object.keys(correction).length === 0) return record

    this.trace(`Restoring SSL settings on host ${record.id}: ${JSON.stringify(correction)}`)
    try {
      return await this.http.put<ProxyHost>(
        `${API_PATHS.proxyHosts}/${record.id}`,
        toUpdatePayload(correction, this.options.defaultEmail),
      )
    } catch (error) {
      this.options.logger.warn(`Host ${record.id} saved without its SSL settings; retry the update to restore them`)
      throw new PartialReconciliationError(record, correction, error)
    }
  }

  private trace(message: string) {
    if (this.options.debug) this.options.logger.debug?.(message)
  }
}
