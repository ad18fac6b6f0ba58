export interface Codec<T> {
	encode(value: T): Buffer
	decode(buffer: Buffer): T
}

export function string(): Codec<string> {
	return {
		encode: value => Buffer.from(value, 'utf-8'),
		decode: buffer => buffer.toString('utf-8'),
	}
}

const UNDEFINED_TOKEN = 'undefined'

/**
 * UTF-8 JSON. `undefined`, which JSON cannot represent, is written as the bare token
 * `undefined` so that an absent key still encodes and groups like any other.
 */
export function json<T>(): Codec<T> {
	return {
		encode: value => Buffer.from(JSON.stringify(value) ?? UNDEFINED_TOKEN, 'utf-8'),
		decode: buffer => {
			const text = buffer.toString('utf-8')
			return (text === UNDEFINED_TOKEN ? undefined : JSON.parse(text)) as T
		},
	}
}

export function buffer(): Codec<Buffer> {
	return {
		encode: value => value,
		decode: value => value,
	}
}

/**
 * 8-byte big-endian double; keeps numeric keys compact in state ids.
 */
export function number(): Codec<number> {
	return {
		encode: value => {
			const buf = Buffer.alloc(8)
			buf.writeDoubleBE(value, 0)
			return buf
		},
		decode: buffer => buffer.readDoubleBE(0),
	}
}

export const codec = {
	string,
	json,
	buffer,
	number,
}
