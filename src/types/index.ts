export * from './types'
export * from './service'
export * from './system'
export * from './errors'
