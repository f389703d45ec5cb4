/**
 * @paakit/transform - post-decode pixel layout operations
 */

export * from './flip'
