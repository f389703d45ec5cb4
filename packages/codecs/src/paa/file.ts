import { readFile } from 'node:fs/promises'
import { readPaa } from './decoder'
import type { PaaFile, PaaReadOptions } from './types'

/**
 * Read and parse a PAA file from disk
 */
export async function readPaaFile(path: string, options?: PaaReadOptions): Promise<PaaFile> {
	const data = await readFile(path)
	return readPaa(new Uint8Array(data.buffer, data.byteOffset, data.byteLength), options)
}
