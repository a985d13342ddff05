import { API_PATHS } from '@proxy-manager/shared'
import type { Owner, TokenResponse } from '@proxy-manager/shared'
import type { ProxyManagerClient } from '../client'

export function createAuthApi(client: ProxyManagerClient) {
  return {
    login: (): Promise<TokenResponse> => client.authenticate(),

    me: () => client.get<Owner>(API_PATHS.me),

    logout: () => client.close(),
  }
}
