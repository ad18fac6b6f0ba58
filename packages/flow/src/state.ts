import type { Codec } from './codec.js'
import type { TimeWindow } from './window.js'

/**
 * Configuration shared by every keyed state store.
 */
export interface StateStoreOptions<K> {
	/** Serializes keys into the store's identity space; equal encodings are the same key */
	keyCodec: Codec<K>
}

export interface StateStore {
	/** Unique name of this store */
	readonly name: string

	/**
	 * Drop all state and release resources.
	 */
	close(): void
}

/**
 * Latest value per key, used by the join operator for each of its sides.
 *
 * Operations are synchronous: state access never suspends the pipeline.
 */
export interface KeyValueStore<K, V> extends StateStore {
	get(key: K): V | undefined
	put(key: K, value: V): void
	delete(key: K): void
	entries(): IterableIterator<[K, V]>
	readonly size: number
}

/**
 * One accumulator owned by a (key, window) pair.
 */
export interface WindowedEntry<K, A> {
	readonly key: K
	readonly window: TimeWindow
	readonly value: A
}

/**
 * Arena of per-(key, window) accumulators.
 *
 * Entries are addressed by the composite (window start, serialized key) and indexed by
 * window end so a watermark can take every finished window without scanning the arena.
 */
export interface WindowStore<K, A> extends StateStore {
	get(key: K, window: TimeWindow): A | undefined
	put(key: K, window: TimeWindow, value: A): void

	/**
	 * Remove and return every entry whose window end is at or before `watermark`,
	 * ordered by window end, then by creation order.
	 */
	takeExpired(watermark: number): WindowedEntry<K, A>[]

	/** Number of (key, window) entries not yet taken */
	readonly size: number

	/** Smallest pending window end, if any */
	nextWindowEnd(): number | undefined
}

/**
 * Factory for the stores of one pipeline run.
 *
 * Implementations can back state with something other than process memory while
 * keeping the same synchronous interface.
 */
export interface StateStoreProvider {
	/** Provider name for debugging */
	readonly name: string

	createKeyValueStore<K, V>(name: string, options: StateStoreOptions<K>): KeyValueStore<K, V>

	createWindowStore<K, A>(name: string, options: StateStoreOptions<K>): WindowStore<K, A>

	/**
	 * Close all stores created by this provider.
	 */
	close(): void
}
