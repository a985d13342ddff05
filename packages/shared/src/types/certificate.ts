import type { Owner } from './auth'
import type { ProxyHost } from './proxy-host'

export type CertificateProvider = 'letsencrypt' | 'other'
export type CertificateExpand = 'owner' | 'proxy_hosts'

export interface CertificateMeta {
  letsencrypt_agree?: boolean
  letsencrypt_email?: string
  dns_challenge?: boolean
  [key: string]: unknown
}

export interface Certificate {
  id: number
  created_on: string
  modified_on: string
  owner_user_id: number
  provider: CertificateProvider
  nice_name: string
  domain_names: string[]
  expires_on: string
  meta: CertificateMeta
  owner?: Owner
  proxy_hosts?: ProxyHost[]
}
