import { createReadStream } from 'node:fs'
import { createInterface } from 'node:readline'
import type { Codec } from '@/codec.js'

/**
 * A bounded source signals end-of-stream when exhausted, which drives every
 * downstream watermark to +Infinity. An unbounded source that stops is not treated
 * as finished.
 */
export type Boundedness = 'bounded' | 'unbounded'

export interface Source<T> {
	readonly name: string
	readonly boundedness: Boundedness

	/**
	 * Produce values until exhausted or until `signal` aborts.
	 */
	read(signal: AbortSignal): AsyncIterable<T>
}

export function fromIterable<T>(name: string, values: Iterable<T>): Source<T> {
	return {
		name,
		boundedness: 'bounded',
		async *read(signal) {
			for (const value of values) {
				if (signal.aborted) {
					return
				}
				yield value
			}
		},
	}
}

export function fromAsyncIterable<T>(
	name: string,
	values: AsyncIterable<T>,
	options: { boundedness?: Boundedness } = {}
): Source<T> {
	return {
		name,
		boundedness: options.boundedness ?? 'bounded',
		async *read(signal) {
			const iterator = values[Symbol.asyncIterator]()
			let settled = false
			try {
				for (;;) {
					const next = await untilAborted(iterator.next(), signal)
					if (next === ABORTED || next.done) {
						settled = true
						return
					}
					yield next.value
				}
			} finally {
				// After an abort the inner next() is still pending; return() would queue behind it
				if (!settled) {
					await iterator.return?.()
				}
			}
		},
	}
}

export const ABORTED: unique symbol = Symbol('aborted')

/**
 * Settles with `promise`, or with ABORTED as soon as `signal` aborts. A value or error
 * arriving after the abort is discarded.
 */
export function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | typeof ABORTED> {
	return new Promise<T | typeof ABORTED>((resolve, reject) => {
		const onAbort = (): void => resolve(ABORTED)
		if (signal.aborted) {
			onAbort()
		} else {
			signal.addEventListener('abort', onAbort, { once: true })
		}
		void promise.then(
			value => {
				signal.removeEventListener('abort', onAbort)
				resolve(value)
			},
			(error: unknown) => {
				signal.removeEventListener('abort', onAbort)
				reject(error)
			}
		)
	})
}

/**
 * `count` values from `generator(index)`. Without a count the source is unbounded and
 * only stops when the pipeline is closed.
 *
 * @example
 * ```typescript
 * const ticks = generateSource('ticks', 100, index => ({ id: index, at: index * 10 }))
 * ```
 */
export function generateSource<T>(name: string, count: number | undefined, generator: (index: number) => T): Source<T> {
	return {
		name,
		boundedness: count === undefined ? 'unbounded' : 'bounded',
		async *read(signal) {
			for (let index = 0; count === undefined || index < count; index++) {
				if (signal.aborted) {
					return
				}
				yield generator(index)
				// Unbounded generators would otherwise starve timers and other sources
				if (count === undefined) {
					await new Promise<void>(resolve => setImmediate(resolve))
				}
			}
		},
	}
}

/**
 * One value per non-empty line of a file, decoded with `codec`.
 */
export function linesSource<T>(name: string, path: string, codec: Codec<T>): Source<T> {
	return {
		name,
		boundedness: 'bounded',
		async *read(signal) {
			const input = createReadStream(path)
			const lines = createInterface({ input, crlfDelay: Infinity })
			try {
				for await (const line of lines) {
					if (signal.aborted) {
						return
					}
					if (line.trim() === '') {
						continue
					}
					yield codec.decode(Buffer.from(line, 'utf-8'))
				}
			} finally {
				lines.close()
				input.destroy()
			}
		},
	}
}
