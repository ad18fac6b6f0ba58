import type { KeyValueStore } from '@/state.js'

export type JoinSide = 'left' | 'right'

/**
 * One update arriving at the join, tagged with the input it came from.
 */
export type JoinEvent<K, L, R> =
	| { readonly side: 'left'; readonly key: K; readonly value: L; readonly timestamp: number | undefined }
	| { readonly side: 'right'; readonly key: K; readonly value: R; readonly timestamp: number | undefined }

export type Joiner<K, L, R, VR> = (left: L, right: R, key: K) => VR

export type JoinStateEntry<T> = { readonly value: T; readonly timestamp: number | undefined }

/**
 * Both sides' latest values for a key at the moment of a match.
 */
export interface JoinMatch<K, L, R> {
	readonly key: K
	readonly left: L
	readonly right: R
	/** Later of the two sides' timestamps */
	readonly timestamp: number | undefined
}

/**
 * Inner equi-join over two append-only keyed changelogs.
 *
 * Each side keeps only its most recent value per key (last write wins). Applying an
 * event replaces that side's value and, when the other side already holds a value for
 * the key, yields exactly one match. State is never evicted.
 */
export class KeyedJoinState<K, L, R> {
	constructor(
		private readonly leftStore: KeyValueStore<K, JoinStateEntry<L>>,
		private readonly rightStore: KeyValueStore<K, JoinStateEntry<R>>
	) {}

	apply(event: JoinEvent<K, L, R>): JoinMatch<K, L, R> | undefined {
		switch (event.side) {
			case 'left': {
				this.leftStore.put(event.key, { value: event.value, timestamp: event.timestamp })
				const other = this.rightStore.get(event.key)
				if (!other) {
					return undefined
				}
				return {
					key: event.key,
					left: event.value,
					right: other.value,
					timestamp: laterOf(event.timestamp, other.timestamp),
				}
			}
			case 'right': {
				this.rightStore.put(event.key, { value: event.value, timestamp: event.timestamp })
				const other = this.leftStore.get(event.key)
				if (!other) {
					return undefined
				}
				return {
					key: event.key,
					left: other.value,
					right: event.value,
					timestamp: laterOf(other.timestamp, event.timestamp),
				}
			}
		}
	}

	/** Keys currently held by each side */
	get sizes(): { left: number; right: number } {
		return { left: this.leftStore.size, right: this.rightStore.size }
	}
}

function laterOf(a: number | undefined, b: number | undefined): number | undefined {
	if (a === undefined) return b
	if (b === undefined) return a
	return Math.max(a, b)
}

