/**
 * @paakit/codecs - PAA texture decoding and TGA export
 */

export * from './paa/index'
export * from './tga/index'
