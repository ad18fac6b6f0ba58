import type { TimeWindow } from '@/window.js'

/**
 * Incremental aggregation over the values of one (key, window).
 *
 * `merge` combines two accumulators of the same window. Tumbling windows never
 * overlap, so the window operator does not call it; it is part of the contract so
 * the same function can be reused by merging window kinds.
 */
export interface AggregateFunction<V, A, R> {
	createAccumulator(): A
	add(value: V, accumulator: A): A
	merge(a: A, b: A): A
	getResult(accumulator: A): R
}

export interface Collector<T> {
	collect(value: T): void
}

/**
 * Turns the aggregate of one fired window into zero or more output values.
 */
export type WindowFunction<K, R, OUT> = (key: K, window: TimeWindow, results: Iterable<R>, out: Collector<OUT>) => void

/**
 * One fired window: `windowEnd` is the exclusive end in epoch ms.
 */
export interface WindowResult<K, R> {
	readonly key: K
	readonly value: R
	readonly windowEnd: number
}

/**
 * Emits one `{ key, value, windowEnd }` per aggregate.
 */
export function windowResult<K, R>(): WindowFunction<K, R, WindowResult<K, R>> {
	return (key, window, results, out) => {
		for (const value of results) {
			out.collect({ key, value, windowEnd: window.end })
		}
	}
}

export function countAggregate<V>(): AggregateFunction<V, number, number> {
	return {
		createAccumulator: () => 0,
		add: (_value, count) => count + 1,
		merge: (a, b) => a + b,
		getResult: count => count,
	}
}

export function sumAggregate<V>(fn: (value: V) => number): AggregateFunction<V, number, number> {
	return {
		createAccumulator: () => 0,
		add: (value, sum) => sum + fn(value),
		merge: (a, b) => a + b,
		getResult: sum => sum,
	}
}

type AverageAccumulator = { readonly sum: number; readonly count: number }

/**
 * Mean of `fn(value)`; an accumulator that never saw a value yields NaN.
 */
export function averageAggregate<V>(fn: (value: V) => number): AggregateFunction<V, AverageAccumulator, number> {
	return {
		createAccumulator: () => ({ sum: 0, count: 0 }),
		add: (value, acc) => ({ sum: acc.sum + fn(value), count: acc.count + 1 }),
		merge: (a, b) => ({ sum: a.sum + b.sum, count: a.count + b.count }),
		getResult: acc => (acc.count === 0 ? Number.NaN : acc.sum / acc.count),
	}
}

type ReduceAccumulator<V> = { readonly present: false } | { readonly present: true; readonly value: V }

/**
 * Pairwise reduction. Windows are created by their first value, so the result always exists.
 */
export function reduceAggregate<V>(reducer: (aggregate: V, value: V) => V): AggregateFunction<V, ReduceAccumulator<V>, V> {
	return {
		createAccumulator: () => ({ present: false }),
		add: (value, acc) => ({ present: true, value: acc.present ? reducer(acc.value, value) : value }),
		merge: (a, b) => {
			if (!a.present) return b
			if (!b.present) return a
			return { present: true, value: reducer(a.value, b.value) }
		},
		getResult: acc => {
			if (!acc.present) {
				throw new Error('reduceAggregate: result requested from an empty accumulator')
			}
			return acc.value
		},
	}
}
