/**
 * Testing infrastructure for flow pipelines.
 *
 * Drive a pipeline one value at a time and inspect what reached its sinks, without
 * timers or polling.
 *
 * @example Basic usage
 * ```typescript
 * import { ManualSource, ResultCollector } from '@windflow/flow/testing'
 *
 * const events = new ManualSource<Click>('clicks')
 * const counts = new ResultCollector<WindowResult<string, number>>('counts')
 *
 * const app = flow({ applicationId: 'test' })
 * app
 *   .source(events)
 *   .assignTimestamps(WatermarkStrategy.forTimestamps(click => click.at))
 *   .keyBy(click => click.page)
 *   .window(TumblingWindows.of('1s'))
 *   .count()
 *   .sink(counts)
 *
 * const running = app.run()
 * await events.push({ page: '/', at: 100 })
 * await events.push({ page: '/', at: 1_100 })
 * expect(counts.values).toEqual([{ key: '/', value: 1, windowEnd: 1_000 }])
 *
 * events.end()
 * await running
 * ```
 */

import type { Sink } from '@/sink.js'
import type { Boundedness, Source } from '@/source.js'
import { parseWindowDuration, type WindowDuration } from '@/window.js'

// ============================================================================
// Sources
// ============================================================================

type PendingItem<T> =
	| { readonly kind: 'value'; readonly value: T; readonly processed: () => void }
	| { readonly kind: 'end' }
	| { readonly kind: 'error'; readonly error: unknown }

/**
 * Source fed by the test.
 *
 * `push` resolves once the pipeline has finished processing the value, including
 * every window it fired and every sink it reached. `end()` finishes the stream;
 * for an unbounded source that stops the reader without an end-of-stream.
 */
export class ManualSource<T> implements Source<T> {
	readonly boundedness: Boundedness
	private readonly pending: PendingItem<T>[] = []
	private wake: (() => void) | undefined
	private ended = false

	constructor(
		readonly name: string,
		options: { boundedness?: Boundedness } = {}
	) {
		this.boundedness = options.boundedness ?? 'bounded'
	}

	push(value: T): Promise<void> {
		if (this.ended) {
			return Promise.reject(new Error(`ManualSource '${this.name}' has already ended`))
		}
		return new Promise<void>(resolve => {
			this.enqueue({ kind: 'value', value, processed: resolve })
		})
	}

	/**
	 * Push values in order, each after the previous one was processed.
	 */
	async pushAll(values: Iterable<T>): Promise<void> {
		for (const value of values) {
			await this.push(value)
		}
	}

	end(): void {
		if (this.ended) {
			return
		}
		this.ended = true
		this.enqueue({ kind: 'end' })
	}

	/**
	 * Make the reader throw `error`, as a broken upstream would.
	 */
	fail(error: unknown): void {
		this.ended = true
		this.enqueue({ kind: 'error', error })
	}

	async *read(signal: AbortSignal): AsyncGenerator<T> {
		const onAbort = (): void => this.notify()
		signal.addEventListener('abort', onAbort, { once: true })
		let inFlight: (() => void) | undefined
		try {
			while (!signal.aborted) {
				const item = this.pending.shift()
				if (!item) {
					await new Promise<void>(resolve => {
						this.wake = resolve
					})
					continue
				}
				if (item.kind === 'end') {
					return
				}
				if (item.kind === 'error') {
					throw item.error
				}
				inFlight = item.processed
				yield item.value
				inFlight = undefined
				item.processed()
			}
		} finally {
			signal.removeEventListener('abort', onAbort)
			inFlight?.()
			// Values that will never be read still release their callers
			for (const item of this.pending.splice(0)) {
				if (item.kind === 'value') {
					item.processed()
				}
			}
		}
	}

	private enqueue(item: PendingItem<T>): void {
		this.pending.push(item)
		this.notify()
	}

	private notify(): void {
		const wake = this.wake
		this.wake = undefined
		wake?.()
	}
}

// ============================================================================
// Sinks
// ============================================================================

/**
 * Sink that keeps every value it receives
 *
 * @example
 * ```typescript
 * const results = new ResultCollector<Joined>('joined')
 * joined.sink(results)
 *
 * await app.run()
 * expect(results.length).toBe(1)
 * expect(results.get(0).avgPrice).toBe(42)
 * ```
 */
export class ResultCollector<T> implements Sink<T> {
	private readonly items: T[] = []
	private closeCount = 0

	constructor(readonly name = 'results') {}

	consume(value: T): void {
		this.items.push(value)
	}

	close(): void {
		this.closeCount++
	}

	/**
	 * Whether the pipeline completed and closed this sink
	 */
	get closed(): boolean {
		return this.closeCount > 0
	}

	/**
	 * Times `close()` was called
	 */
	get closeCalls(): number {
		return this.closeCount
	}

	/**
	 * Get all collected values
	 */
	get values(): T[] {
		return [...this.items]
	}

	/**
	 * Get a specific value by index
	 */
	get(index: number): T {
		const item = this.items[index]
		if (item === undefined) {
			throw new Error(`No value at index ${index}. Collection has ${this.items.length} items.`)
		}
		return item
	}

	get first(): T | undefined {
		return this.items[0]
	}

	get last(): T | undefined {
		return this.items[this.items.length - 1]
	}

	get length(): number {
		return this.items.length
	}

	get isEmpty(): boolean {
		return this.items.length === 0
	}

	clear(): void {
		this.items.length = 0
	}

	filter(predicate: (value: T) => boolean): T[] {
		return this.items.filter(predicate)
	}

	some(predicate: (value: T) => boolean): boolean {
		return this.items.some(predicate)
	}

	every(predicate: (value: T) => boolean): boolean {
		return this.items.every(predicate)
	}
}

// ============================================================================
// Test Data
// ============================================================================

/**
 * Create a factory for generating test data
 *
 * @example
 * ```typescript
 * const orderFactory = createFactory<Order>(index => ({
 *   type: (index % 3) + 1,
 *   price: 10 * index,
 *   orderTime: '2024-03-01T09:30:00',
 * }))
 *
 * const orders = orderFactory.createMany(10)
 * const expensive = orderFactory.create({ price: 10_000 })
 * ```
 */
export function createFactory<T>(generator: (index: number) => T) {
	let counter = 0

	return {
		/**
		 * Create a single instance with optional overrides
		 */
		create(overrides: Partial<T> = {}): T {
			const base = generator(counter++)
			return { ...base, ...overrides }
		},

		createMany(count: number, overrides: Partial<T> = {}): T[] {
			return Array.from({ length: count }, () => this.create(overrides))
		},

		reset(): void {
			counter = 0
		},
	}
}

export interface Timestamps {
	/** Timestamp at an offset from the base */
	at(offset: WindowDuration): number
	readonly base: number
	/** New helper whose base is moved forward by `duration` */
	advance(duration: WindowDuration): Timestamps
}

/**
 * Epoch-millisecond timestamps relative to a base time
 *
 * @example
 * ```typescript
 * const ts = timestamps(1_000)
 * ts.at(0)      // 1000
 * ts.at('1s')   // 2000
 * ts.advance('1m').at('100ms') // 61100
 * ```
 */
export function timestamps(baseTime = 0): Timestamps {
	return {
		at(offset: WindowDuration): number {
			return baseTime + parseWindowDuration(offset)
		},

		get base(): number {
			return baseTime
		},

		advance(duration: WindowDuration): Timestamps {
			return timestamps(baseTime + parseWindowDuration(duration))
		},
	}
}
