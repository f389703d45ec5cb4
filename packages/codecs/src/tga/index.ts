export * from './types'
export * from './encoder'
