export * from './types'
export * from './errors'
export * from './dxt'
export * from './pixels'
export * from './swizzle'
export * from './taggs'
export * from './mipmap'
export * from './decoder'
export * from './file'
export * from './codec'
