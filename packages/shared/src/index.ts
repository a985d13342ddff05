export * from './types/auth'
export * from './types/certificate'
export * from './types/proxy-host'
export * from './constants'
