import type { Codec } from '@/codec.js'
import type {
	KeyValueStore,
	StateStore,
	StateStoreOptions,
	StateStoreProvider,
	WindowedEntry,
	WindowStore,
} from '@/state.js'
import type { TimeWindow } from '@/window.js'

function keyId<K>(codec: Codec<K>, key: K): string {
	return codec.encode(key).toString('base64')
}

/**
 * In-memory implementation of KeyValueStore.
 *
 * Keys are serialized with the key codec, so structurally equal keys address the same entry.
 */
export class InMemoryKeyValueStore<K, V> implements KeyValueStore<K, V> {
	private readonly store = new Map<string, { key: K; value: V }>()
	private readonly keyCodec: Codec<K>

	constructor(
		readonly name: string,
		options: StateStoreOptions<K>
	) {
		this.keyCodec = options.keyCodec
	}

	get(key: K): V | undefined {
		return this.store.get(keyId(this.keyCodec, key))?.value
	}

	put(key: K, value: V): void {
		this.store.set(keyId(this.keyCodec, key), { key, value })
	}

	delete(key: K): void {
		this.store.delete(keyId(this.keyCodec, key))
	}

	*entries(): IterableIterator<[K, V]> {
		for (const entry of this.store.values()) {
			yield [entry.key, entry.value]
		}
	}

	get size(): number {
		return this.store.size
	}

	close(): void {
		this.store.clear()
	}
}

type ArenaEntry<K, A> = { key: K; window: TimeWindow; value: A }

/**
 * In-memory implementation of WindowStore.
 *
 * Entries live in one map keyed by `${windowStart}:${keyId}`; a second map groups the
 * entry ids by window end, and `ends` keeps those ends sorted ascending. Firing a
 * window end removes its group in one step.
 */
export class InMemoryWindowStore<K, A> implements WindowStore<K, A> {
	private readonly arena = new Map<string, ArenaEntry<K, A>>()
	private readonly idsByEnd = new Map<number, Set<string>>()
	private readonly ends: number[] = []
	private readonly keyCodec: Codec<K>

	constructor(
		readonly name: string,
		options: StateStoreOptions<K>
	) {
		this.keyCodec = options.keyCodec
	}

	get(key: K, window: TimeWindow): A | undefined {
		return this.arena.get(this.entryId(key, window))?.value
	}

	put(key: K, window: TimeWindow, value: A): void {
		const id = this.entryId(key, window)
		const existing = this.arena.get(id)
		if (existing) {
			existing.value = value
			return
		}
		this.arena.set(id, { key, window, value })
		let ids = this.idsByEnd.get(window.end)
		if (!ids) {
			ids = new Set()
			this.idsByEnd.set(window.end, ids)
			this.ends.splice(this.insertionIndex(window.end), 0, window.end)
		}
		ids.add(id)
	}

	takeExpired(watermark: number): WindowedEntry<K, A>[] {
		const expired: WindowedEntry<K, A>[] = []
		let taken = 0
		for (const end of this.ends) {
			if (end > watermark) {
				break
			}
			taken++
			const ids = this.idsByEnd.get(end)
			this.idsByEnd.delete(end)
			if (!ids) {
				continue
			}
			for (const id of ids) {
				const entry = this.arena.get(id)
				if (entry) {
					this.arena.delete(id)
					expired.push({ key: entry.key, window: entry.window, value: entry.value })
				}
			}
		}
		this.ends.splice(0, taken)
		return expired
	}

	get size(): number {
		return this.arena.size
	}

	nextWindowEnd(): number | undefined {
		return this.ends[0]
	}

	close(): void {
		this.arena.clear()
		this.idsByEnd.clear()
		this.ends.length = 0
	}

	private entryId(key: K, window: TimeWindow): string {
		return `${window.start}:${keyId(this.keyCodec, key)}`
	}

	/**
	 * Binary search for the first index whose end is greater than `end`.
	 */
	private insertionIndex(end: number): number {
		let low = 0
		let high = this.ends.length
		while (low < high) {
			const mid = (low + high) >>> 1
			const value = this.ends[mid]
			if (value !== undefined && value <= end) {
				low = mid + 1
			} else {
				high = mid
			}
		}
		return low
	}
}

/**
 * In-memory state store provider.
 *
 * State is lost when the pipeline stops.
 */
export class InMemoryStateStoreProvider implements StateStoreProvider {
	readonly name = 'in-memory'
	private readonly stores: StateStore[] = []

	createKeyValueStore<K, V>(name: string, options: StateStoreOptions<K>): KeyValueStore<K, V> {
		const store = new InMemoryKeyValueStore<K, V>(name, options)
		this.stores.push(store)
		return store
	}

	createWindowStore<K, A>(name: string, options: StateStoreOptions<K>): WindowStore<K, A> {
		const store = new InMemoryWindowStore<K, A>(name, options)
		this.stores.push(store)
		return store
	}

	close(): void {
		for (const store of this.stores) {
			store.close()
		}
		this.stores.length = 0
	}
}

/**
 * Create an in-memory state store provider.
 */
export function inMemory(): StateStoreProvider {
	return new InMemoryStateStoreProvider()
}
