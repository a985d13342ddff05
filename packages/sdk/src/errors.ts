import type { ProxyHost, UpdateProxyHostInput } from '@proxy-manager/shared'

export class ProxyManagerError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ProxyManagerError'
  }
}

export class AuthenticationError extends ProxyManagerError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'AuthenticationError'
  }
}

/** A non-2xx response, or status 0 when the server could not be reached. */
export class APIError extends ProxyManagerError {
  constructor(
    public status: number,
    message: string,
    public body = '',
    public details: string | null = null,
  ) {
    super(message)
    this.name = 'APIError'
  }
}

export class ValidationError extends ProxyManagerError {
  constructor(
    message: string,
    public constraints: string[] = [],
  ) {
    super(message)
    this.name = 'ValidationError'
  }
}

/**
 * The host was created (or renamed) but the follow-up update that restores its
 * SSL flags failed. Retry with `proxyHosts.update(error.hostId, ...)` using
 * `error.pendingUpdate`.
 */
export class PartialReconciliationError extends ProxyManagerError {
  readonly hostId: number

  constructor(
    public record: ProxyHost,
    public pendingUpdate: UpdateProxyHostInput,
    cause: unknown,
  ) {
    super(
      `Proxy host ${record.id} was saved but its SSL settings could not be restored: ${describeCause(cause)}`,
      { cause },
    )
    this.name = 'PartialReconciliationError'
    this.hostId = record.id
  }
}

function describeCause(cause: unknown) {
  return cause instanceof Error && cause.message ? cause.message : String(cause)
}
