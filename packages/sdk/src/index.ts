import 'reflect-metadata'

export { ProxyManagerClient, withQuery, extractErrorDetails } from './client'
export type { HttpGateway, QueryParams } from './client'
export { loadConfig, validateConfig } from './config'
export type { SDKConfig } from './config'
export {
  ProxyManagerError,
  AuthenticationError,
  APIError,
  ValidationError,
  PartialReconciliationError,
} from './errors'
export { ProxyHostReconciler, correctiveUpdate } from './reconciler/proxy-host-reconciler'
export type { ReconcilerOptions } from './reconciler/proxy-host-reconciler'
export { createAuthApi } from './api/auth'
export { createProxyHostsApi } from './api/proxy-hosts'
export type { ProxyHostsApi } from './api/proxy-hosts'
export { createCertificatesApi } from './api/certificates'
export type { CertificateLookup, CertificatesApi } from './api/certificates'

import { ProxyManagerClient } from './client'
import { createAuthApi } from './api/auth'
import { createProxyHostsApi } from './api/proxy-hosts'
import { createCertificatesApi } from './api/certificates'
import type { SDKConfig } from './config'

/** Convenience factory: creates a fully-wired SDK instance. Authenticates on first request. */
export function createSDK(config: SDKConfig) {
  const client = new ProxyManagerClient(config)
  const certificates = createCertificatesApi(client)
  return {
    client,
    auth: createAuthApi(client),
    certificates,
    proxyHosts: createProxyHostsApi(client, certificates),
    close: () => client.close(),
  }
}

export type ProxyManagerSDK = ReturnType<typeof createSDK>

/** Like `createSDK`, but exchanges credentials up front so bad credentials fail here. */
export async function connectSDK(config: SDKConfig): Promise<ProxyManagerSDK> {
  const sdk = createSDK(config)
  await sdk.client.authenticate()
  return sdk
}
