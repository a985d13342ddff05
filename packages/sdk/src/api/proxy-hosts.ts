import { API_PATHS } from '@proxy-manager/shared'
import type {
  CreateProxyHostInput,
  ListProxyHostsQuery,
  ProxyHost,
  ProxyHostExpand,
  RenameProxyHostInput,
  UpdateProxyHostInput,
} from '@proxy-manager/shared'
import type { ProxyManagerClient } from '../client'
import { toUpdatePayload } from '../payload'
import { ProxyHostReconciler } from '../reconciler/proxy-host-reconciler'
import { assertId, assertValid, UpdateProxyHostDto } from '../validation'
import type { CertificateLookup } from './certificates'

const hostPath = (id: number) => `${API_PATHS.proxyHosts}/${assertId(id, 'host id')}`

export function createProxyHostsApi(client: ProxyManagerClient, certificates: CertificateLookup) {
  const reconciler = new ProxyHostReconciler(client, certificates, {
    defaultEmail: client.identity,
    logger: client.logger,
    debug: client.debugEnabled,
  })

  const update = async (id: number, input: UpdateProxyHostInput) => {
    const path = hostPath(id)
    assertValid(UpdateProxyHostDto, input, 'proxy host update')
    return client.put<ProxyHost>(path, toUpdatePayload(input, client.identity))
  }

  return {
    list: (query: ListProxyHostsQuery = {}) =>
      client.get<ProxyHost[]>(API_PATHS.proxyHosts, {
        expand: query.expand?.join(','),
        query: query.query,
      }),

    get: async (id: number, expand?: ProxyHostExpand[]) =>
      client.get<ProxyHost>(hostPath(id), { expand: expand?.join(',') }),

    /** Creates the host and, when a certificate was requested, restores its SSL flags. */
    create: (input: CreateProxyHostInput) => reconciler.create(input),

    rename: (id: number, input: RenameProxyHostInput) => reconciler.rename(id, input),

    update,

    enable: (id: number) => update(id, { enabled: true }),

    disable: (id: number) => update(id, { enabled: false }),

    delete: async (id: number) =>
      client.delete<boolean | undefined>(hostPath(id)).then((result) => result !== false),
  }
}

export type ProxyHostsApi = ReturnType<typeof createProxyHostsApi>
