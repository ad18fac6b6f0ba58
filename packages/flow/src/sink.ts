import { once } from 'node:events'
import type { Writable } from 'node:stream'
import dayjs from 'dayjs'
import type { Codec } from '@/codec.js'

/**
 * Terminal consumer of a stream. `consume` is called once per value, in order per
 * upstream partition. A throw fails this sink's branch only.
 */
export interface Sink<T> {
	readonly name: string
	consume(value: T): void | Promise<void>

	/**
	 * Called once after the last value of a completed pipeline.
	 */
	close?(): void | Promise<void>
}

export function callbackSink<T>(name: string, fn: (value: T) => void | Promise<void>): Sink<T> {
	return { name, consume: fn }
}

/**
 * Prints `<prefix>: <value>` lines.
 *
 * @example
 * ```typescript
 * stream.sink(consoleSink('Sink-1'))
 * // Sink-1: {"type":1,"count":3,"avgPrice":42}
 * ```
 */
export function consoleSink<T>(prefix: string, format: (value: T) => string = formatValue): Sink<T> {
	return {
		name: prefix,
		consume: value => {
			console.log(`${prefix}: ${format(value)}`)
		},
	}
}

/**
 * Writes each value as one encoded line, waiting for `drain` when the stream buffers.
 */
export function linesSink<T>(name: string, output: Writable, codec: Codec<T>): Sink<T> {
	return {
		name,
		async consume(value) {
			const line = Buffer.concat([codec.encode(value), Buffer.from('\n', 'utf-8')])
			if (!output.write(line)) {
				await once(output, 'drain')
			}
		},
	}
}

/**
 * JSON rendering where a `windowEnd` field is shown as an ISO-8601 instant.
 */
export function formatValue(value: unknown): string {
	return JSON.stringify(value, (key, field: unknown) =>
		key === 'windowEnd' && typeof field === 'number' && Number.isFinite(field) ? dayjs(field).toISOString() : field
	)
}
