/**
 * @paakit/core - shared image model and format detection
 */

export * from './types'
export * from './format'
