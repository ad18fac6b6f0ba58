/**
 * Key-to-instance assignment for keyed exchanges.
 *
 * Uses the murmur2 hash (seed 0x9747b28c) over the encoded key, so every record
 * whose key encodes to the same bytes reaches the same operator instance.
 */

/**
 * 32-bit murmur2 hash of `data`, as a signed integer.
 */
export function murmur2(data: Uint8Array): number {
	const seed = 0x9747b28c
	const m = 0x5bd1e995
	const r = 24

	let h = seed ^ data.length
	let length = data.length
	let offset = 0

	while (length >= 4) {
		let k =
			(byteAt(data, offset) & 0xff) |
			((byteAt(data, offset + 1) & 0xff) << 8) |
			((byteAt(data, offset + 2) & 0xff) << 16) |
			((byteAt(data, offset + 3) & 0xff) << 24)

		k = Math.imul(k, m)
		k ^= k >>> r
		k = Math.imul(k, m)

		h = Math.imul(h, m)
		h ^= k

		offset += 4
		length -= 4
	}

	switch (length) {
		case 3:
			h ^= (byteAt(data, offset + 2) & 0xff) << 16
		// falls through
		case 2:
			h ^= (byteAt(data, offset + 1) & 0xff) << 8
		// falls through
		case 1:
			h ^= byteAt(data, offset) & 0xff
			h = Math.imul(h, m)
	}

	h ^= h >>> 13
	h = Math.imul(h, m)
	h ^= h >>> 15

	return h
}

function byteAt(data: Uint8Array, index: number): number {
	return data[index] ?? 0
}

/**
 * Instance index in `[0, instances)` for an encoded key.
 */
export function partitionFor(keyBytes: Uint8Array, instances: number): number {
	if (instances <= 1) {
		return 0
	}
	return (murmur2(keyBytes) & 0x7fffffff) % instances
}
