import type { Certificate } from './certificate'
import type { AccessList, Owner } from './auth'

export type ForwardScheme = 'http' | 'https'
export type ProxyHostExpand = 'owner' | 'access_list' | 'certificate'

export interface ProxyHostLocation {
  path: string
  forward_scheme: ForwardScheme
  forward_host: string
  forward_port: number
  advanced_config?: string
}

export interface ProxyHostMeta {
  letsencrypt_agree?: boolean
  letsencrypt_email?: string
  dns_challenge?: boolean
  nginx_online?: boolean
  nginx_err?: string | null
  [key: string]: unknown
}

/** Which certificate a host should use. Absent means "leave it to the operation's default". */
export type CertificateSelection =
  | { type: 'none' }
  | { type: 'new' }
  | { type: 'existing'; id: number }

/** `0` is no certificate, `'new'` asks the server to issue one. */
export type CertificateIdValue = number | 'new'

export interface SslFlags {
  ssl_forced: boolean
  http2_support: boolean
  hsts_enabled: boolean
  hsts_subdomains: boolean
}

export interface ProxyHost extends SslFlags {
  id: number
  created_on: string
  modified_on: string
  owner_user_id: number
  domain_names: string[]
  forward_scheme: ForwardScheme
  forward_host: string
  forward_port: number
  access_list_id: number
  certificate_id: number
  caching_enabled: boolean
  block_exploits: boolean
  allow_websocket_upgrade: boolean
  advanced_config: string
  meta: ProxyHostMeta
  enabled: boolean
  locations: ProxyHostLocation[] | null
  owner?: Owner
  access_list?: AccessList | null
  certificate?: Certificate | null
}

/** Wire body accepted by the create and update endpoints. */
export interface ProxyHostPayload extends Partial<SslFlags> {
  domain_names?: string[]
  forward_scheme?: ForwardScheme
  forward_host?: string
  forward_port?: number
  access_list_id?: number
  certificate_id?: CertificateIdValue
  caching_enabled?: boolean
  block_exploits?: boolean
  allow_websocket_upgrade?: boolean
  advanced_config?: string
  meta?: ProxyHostMeta
  enabled?: boolean
  locations?: ProxyHostLocation[]
}

export interface CreateProxyHostInput {
  domainName: string
  additionalDomainNames?: string[]
  forwardHost: string
  forwardPort: number
  forwardScheme?: ForwardScheme
  blockExploits?: boolean
  http2Support?: boolean
  sslForced?: boolean
  hstsEnabled?: boolean
  hstsSubdomains?: boolean
  allowWebsocketUpgrade?: boolean
  cachingEnabled?: boolean
  accessListId?: number
  advancedConfig?: string
  locations?: ProxyHostLocation[]
  certificate?: CertificateSelection
  letsencryptEmail?: string
  reuseCertificate?: boolean
}

export interface UpdateProxyHostInput {
  domainNames?: string[]
  forwardHost?: string
  forwardPort?: number
  forwardScheme?: ForwardScheme
  blockExploits?: boolean
  http2Support?: boolean
  sslForced?: boolean
  hstsEnabled?: boolean
  hstsSubdomains?: boolean
  allowWebsocketUpgrade?: boolean
  cachingEnabled?: boolean
  accessListId?: number
  advancedConfig?: string
  locations?: ProxyHostLocation[]
  certificate?: CertificateSelection
  /** Only sent with `certificate: { type: 'new' }`; ignored otherwise. */
  letsencryptEmail?: string
  enabled?: boolean
}

export interface RenameProxyHostInput {
  domainName: string
  additionalDomainNames?: string[]
  renewCertificate?: boolean
  reuseCertificate?: boolean
  letsencryptEmail?: string
}

export interface ListProxyHostsQuery {
  expand?: ProxyHostExpand[]
  query?: string
}
