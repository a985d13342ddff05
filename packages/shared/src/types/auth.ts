export interface Credentials {
  identity: string
  secret: string
}

export interface TokenResponse {
  token: string
  /** ISO timestamp; some server versions omit it. */
  expires?: string
}

export interface Owner {
  id: number
  email: string
  name: string
  nickname: string
  avatar: string
  is_disabled: boolean
  roles: string[]
}

export interface AccessList {
  id: number
  name: string
  owner_user_id: number
  satisfy_any: boolean
  pass_auth: boolean
}
