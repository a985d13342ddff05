import 'reflect-metadata'
import { plainToInstance, Type } from 'class-transformer'
import type { ClassConstructor } from 'class-transformer'
import {
  ArrayNotEmpty,
  IsArray,
  IsBoolean,
  IsEmail,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
  ValidateIf,
  ValidateNested,
  validateSync,
} from 'class-validator'
import type { ValidationError as ConstraintViolation } from 'class-validator'
import type { CertificateSelection, ForwardScheme } from '@proxy-manager/shared'
import { ValidationError } from './errors'

const FORWARD_SCHEMES: ForwardScheme[] = ['http', 'https']
const CERTIFICATE_TYPES: CertificateSelection['type'][] = ['none', 'new', 'existing']
const NO_WHITESPACE = /^\S+$/

class LocationDto {
  @IsString() @IsNotEmpty() path!: string
  @IsIn(FORWARD_SCHEMES) forward_scheme!: ForwardScheme
  @IsString() @IsNotEmpty() forward_host!: string
  @IsInt() @Min(1) @Max(65535) forward_port!: number
  @IsString() @IsOptional() advanced_config?: string
}

class CertificateSelectionDto {
  @IsIn(CERTIFICATE_TYPES) type!: CertificateSelection['type']

  @ValidateIf((selection: CertificateSelectionDto) => selection.type === 'existing')
  @IsInt()
  @Min(1)
  id?: number
}

class ProxyHostSettingsDto {
  @IsIn(FORWARD_SCHEMES) @IsOptional() forwardScheme?: ForwardScheme
  @IsBoolean() @IsOptional() blockExploits?: boolean
  @IsBoolean() @IsOptional() http2Support?: boolean
  @IsBoolean() @IsOptional() sslForced?: boolean
  @IsBoolean() @IsOptional() hstsEnabled?: boolean
  @IsBoolean() @IsOptional() hstsSubdomains?: boolean
  @IsBoolean() @IsOptional() allowWebsocketUpgrade?: boolean
  @IsBoolean() @IsOptional() cachingEnabled?: boolean
  @IsInt() @Min(0) @IsOptional() accessListId?: number
  @IsString() @IsOptional() advancedConfig?: string
  @IsEmail() @IsOptional() letsencryptEmail?: string

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => LocationDto)
  @IsOptional()
  locations?: LocationDto[]

  @ValidateNested()
  @Type(() => CertificateSelectionDto)
  @IsOptional()
  certificate?: CertificateSelectionDto
}

export class CreateProxyHostDto extends ProxyHostSettingsDto {
  @IsString() @Matches(NO_WHITESPACE, { message: 'domainName must be a single non-empty host name' })
  domainName!: string

  @IsArray() @Matches(NO_WHITESPACE, { each: true }) @IsOptional()
  additionalDomainNames?: string[]

  @IsString() @IsNotEmpty() forwardHost!: string
  @IsInt() @Min(1) @Max(65535) forwardPort!: number

  @IsBoolean() @IsOptional() reuseCertificate?: boolean
}

export class UpdateProxyHostDto extends ProxyHostSettingsDto {
  @IsArray() @ArrayNotEmpty() @Matches(NO_WHITESPACE, { each: true }) @IsOptional()
  domainNames?: string[]

  @IsString() @IsNotEmpty() @IsOptional() forwardHost?: string
  @IsInt() @Min(1) @Max(65535) @IsOptional() forwardPort?: number
  @IsBoolean() @IsOptional() enabled?: boolean
}

export class RenameProxyHostDto {
  @IsString() @Matches(NO_WHITESPACE, { message: 'domainName must be a single non-empty host name' })
  domainName!: string

  @IsArray() @Matches(NO_WHITESPACE, { each: true }) @IsOptional()
  additionalDomainNames?: string[]

  @IsBoolean() @IsOptional() renewCertificate?: boolean
  @IsBoolean() @IsOptional() reuseCertificate?: boolean
  @IsEmail() @IsOptional() letsencryptEmail?: string
}

export class ClientConfigDto {
  @IsUrl({ require_tld: false, require_protocol: true, protocols: ['http', 'https'] })
  baseUrl!: string

  @IsString() @IsNotEmpty() identity!: string
  @IsString() @IsNotEmpty() secret!: string
  @IsBoolean() @IsOptional() debug?: boolean
  @IsInt() @Min(1) @IsOptional() timeoutMs?: number
  @IsInt() @Min(0) @IsOptional() tokenRefreshMarginMs?: number
}

export function collectConstraints(errors: ConstraintViolation[], prefix = ''): string[] {
  return errors.flatMap((error) => {
    const path = prefix ? `${prefix}.${error.property}` : error.property
    const own = Object.values(error.constraints ?? {}).map((message) =>
      prefix ? `${path}: ${message}` : message,
    )
    return [...own, ...collectConstraints(error.children ?? [], path)]
  })
}

/** Validates `plain` against `dto` and throws `ValidationError` listing every violated constraint. */
export function assertValid<T extends object>(dto: ClassConstructor<T>, plain: object, label: string): T {
  const instance = plainToInstance(dto, plain)
  const constraints = collectConstraints(validateSync(instance))
  if (constraints.length > 0) {
    throw new ValidationError(`Invalid ${label}: ${constraints.join('; ')}`, constraints)
  }
  return instance
}

export function assertId(id: number, label: string) {
  if (!Number.isInteger(id) || id <= 0) {
    const message = `${label} must be a positive integer`
    throw new ValidationError(`Invalid ${label}: ${message}`, [message])
  }
  return id
}
