import { fileURLToPath } from 'node:url'
import { codec, formatLocalDateTime, generateSource, linesSource, type Source } from '@windflow/flow'
import type { Order, TypeStat } from './types.js'

export const TYPE_STATS_PATH = fileURLToPath(new URL('./type-stats.jsonl', import.meta.url))

export interface OrderSourceOptions {
	/** Epoch ms of the first order. Default: 2024-03-01T01:30:00Z */
	start?: number
	/** Offset the generated local order times are written in. Default: +08:00 */
	timeZoneOffset?: string
	/** Number of distinct order types, numbered from 1. Default: 4 */
	types?: number
	seed?: number
}

/**
 * `count` orders with random type and price, each 0-499 ms after the previous one.
 * The same seed always yields the same orders.
 */
export function orderSource(count: number, options: OrderSourceOptions = {}): Source<Order> {
	const random = mulberry32(options.seed ?? 1)
	const types = options.types ?? 4
	const timeZoneOffset = options.timeZoneOffset ?? '+08:00'
	let time = options.start ?? Date.parse('2024-03-01T01:30:00Z')

	return generateSource('orders', count, () => {
		time += Math.floor(random() * 500)
		return {
			type: 1 + Math.floor(random() * types),
			price: Math.round(random() * 10_000) / 100,
			orderTime: formatLocalDateTime(time, timeZoneOffset),
		}
	})
}

/**
 * Average price per order type, one JSON object per line.
 */
export function typeStatSource(path: string = TYPE_STATS_PATH): Source<TypeStat> {
	return linesSource('type-stats', path, codec.json<TypeStat>())
}

function mulberry32(seed: number): () => number {
	let state = seed >>> 0
	return () => {
		state = (state + 0x6d2b79f5) >>> 0
		let t = state
		t = Math.imul(t ^ (t >>> 15), t | 1)
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
		return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296
	}
}
