import {
	type PaaFile,
	type PaaTagg,
	type SwizzleSelectors,
	encodedSize,
	findChainBreak,
	formatName,
	isAlpha,
	isIdentitySwizzle,
	mipmapSize,
} from '@paakit/codecs'

function formatSelectors(selectors: SwizzleSelectors): string {
	return (['red', 'green', 'blue', 'alpha'] as const)
		.map((channel) => {
			const { source, invert } = selectors[channel]
			return `${channel}=${invert ? '1-' : ''}${source}`
		})
		.join(' ')
}

function describeTagg(tagg: PaaTagg): string {
	switch (tagg.kind) {
		case 'averageColor':
			return `average color (${tagg.color.join(', ')})`
		case 'maxColor':
			return `max color (${tagg.color.join(', ')})`
		case 'flag':
			return `alpha flag ${tagg.value}`
		case 'swizzle':
			return isIdentitySwizzle(tagg.selectors) ? 'swizzle (identity)' : `swizzle ${formatSelectors(tagg.selectors)}`
		case 'offset':
			return `offsets ${tagg.offsets.filter((offset) => offset !== 0).join(', ')}`
		case 'unknown':
			return `unknown, ${tagg.data.length} bytes`
	}
}

export function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

/**
 * Human-readable summary of a parsed texture
 */
export function formatInfo(file: PaaFile, source: string, size: number, verbose = false): string[] {
	const lines = [
		`Source: ${source}`,
		`Size: ${formatBytes(size)}`,
		`Format: ${formatName(file.format)}`,
		`Alpha: ${isAlpha(file) ? 'yes' : 'no'}`,
		`Taggs: ${file.taggs.length}`,
	]

	for (const tagg of file.taggs) {
		lines.push(`  ${tagg.signature}  ${describeTagg(tagg)}`)
	}

	lines.push(`Mipmaps: ${file.mipmaps.length}`)
	file.mipmaps.forEach((mip, level) => {
		let line = `  #${level}  ${mip.width} x ${mip.height}`
		if (verbose) {
			line += `  ${formatBytes(mip.data.length)} stored, ${formatBytes(encodedSize(file.format, mip.width, mip.height))} encoded`
		}
		if (mip.compressed) line += '  (compressed)'
		lines.push(line)
	})

	const broken = findChainBreak(file.mipmaps)
	const top = file.mipmaps[0]
	if (broken !== -1 && top) {
		const mip = file.mipmaps[broken]!
		const expected = mipmapSize(top.width, top.height, broken)
		lines.push(`Warning: mipmap ${broken} is ${mip.width} x ${mip.height}, expected ${expected.width} x ${expected.height}`)
	}

	return lines
}
