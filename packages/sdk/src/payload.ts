import { PROXY_HOST_DEFAULTS } from '@proxy-manager/shared'
import type {
  CertificateIdValue,
  CertificateSelection,
  CreateProxyHostInput,
  ProxyHostMeta,
  ProxyHostPayload,
  UpdateProxyHostInput,
} from '@proxy-manager/shared'

export function domainSet(domainName: string, additionalDomainNames: string[] = []) {
  return [domainName, ...additionalDomainNames]
}

export function certificateIdFor(selection: CertificateSelection): CertificateIdValue {
  switch (selection.type) {
    case 'none':
      return 0
    case 'new':
      return 'new'
    case 'existing':
      return selection.id
  }
}

/** Let's Encrypt options travel in `meta` only when the server is asked to issue a certificate. */
export function certificateMeta(selection: CertificateSelection, letsencryptEmail: string): ProxyHostMeta {
  if (selection.type !== 'new') return {}
  return {
    letsencrypt_agree: true,
    letsencrypt_email: letsencryptEmail,
    dns_challenge: false,
  }
}

/** Full create body with defaults applied; `certificate` is the already-resolved selection. */
export function toCreatePayload(
  input: CreateProxyHostInput,
  certificate: CertificateSelection,
  letsencryptEmail: string,
): ProxyHostPayload {
  return {
    domain_names: domainSet(input.domainName, input.additionalDomainNames),
    forward_scheme: input.forwardScheme ?? PROXY_HOST_DEFAULTS.forwardScheme,
    forward_host: input.forwardHost,
    forward_port: input.forwardPort,
    certificate_id: certificateIdFor(certificate),
    ssl_forced: input.sslForced ?? PROXY_HOST_DEFAULTS.sslForced,
    hsts_enabled: input.hstsEnabled ?? PROXY_HOST_DEFAULTS.hstsEnabled,
    hsts_subdomains: input.hstsSubdomains ?? PROXY_HOST_DEFAULTS.hstsSubdomains,
    http2_support: input.http2Support ?? PROXY_HOST_DEFAULTS.http2Support,
    block_exploits: input.blockExploits ?? PROXY_HOST_DEFAULTS.blockExploits,
    caching_enabled: input.cachingEnabled ?? PROXY_HOST_DEFAULTS.cachingEnabled,
    allow_websocket_upgrade: input.allowWebsocketUpgrade ?? PROXY_HOST_DEFAULTS.allowWebsocketUpgrade,
    access_list_id: input.accessListId ?? PROXY_HOST_DEFAULTS.accessListId,
    advanced_config: input.advancedConfig ?? PROXY_HOST_DEFAULTS.advancedConfig,
    locations: input.locations ?? [],
    enabled: true,
    meta: certificateMeta(certificate, letsencryptEmail),
  }
}

/** Only the supplied fields; anything left undefined stays as it is on the server. */
export function toUpdatePayload(input: UpdateProxyHostInput, defaultEmail: string): ProxyHostPayload {
  const payload: ProxyHostPayload = {}

  if (input.domainNames !== undefined) payload.domain_names = input.domainNames
  if (input.forwardHost !== undefined) payload.forward_host = input.forwardHost
  if (input.forwardPort !== undefined) payload.forward_port = input.forwardPort
  if (input.forwardScheme !== undefined) payload.forward_scheme = input.forwardScheme
  if (input.sslForced !== undefined) payload.ssl_forced = input.sslForced
  if (input.hstsEnabled !== undefined) payload.hsts_enabled = input.hstsEnabled
  if (input.hstsSubdomains !== undefined) payload.hsts_subdomains = input.hstsSubdomains
  if (input.http2Support !== undefined) payload.http2_support = input.http2Support
  if (input.blockExploits !== undefined) payload.block_exploits = input.blockExploits
  if (input.cachingEnabled !== undefined) payload.caching_enabled = input.cachingEnabled
  if (input.allowWebsocketUpgrade !== undefined) payload.allow_websocket_upgrade = input.allowWebsocketUpgrade
  if (input.accessListId !== undefined) payload.access_list_id = input.accessListId
  if (input.advancedConfig !== undefined) payload.advanced_config = input.advancedConfig
  if (input.locations !== undefined) payload.locations = input.locations
  if (input.enabled !== undefined) payload.enabled = input.enabled

  if (input.certificate !== undefined) {
    payload.certificate_id = certificateIdFor(input.certificate)
    if (input.certificate.type === 'new') {
      payload.meta = certificateMeta(input.certificate, input.letsencryptEmail ?? defaultEmail)
    }
  }

  return payload
}
