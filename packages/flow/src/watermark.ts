import dayjs from 'dayjs'
import { InvalidTimestampError, OutOfOrderWatermarkError } from '@/errors.js'
import { noopLogger, type Logger } from '@/logger.js'
import type { Counter } from '@/metrics.js'
import { parseWindowDuration, type WindowDuration } from '@/window.js'

/**
 * Extracts the event time (epoch ms) of a value. `previousTimestamp` is the timestamp
 * the record carried before this assignment, if any.
 */
export type TimestampAssigner<V> = (value: V, previousTimestamp: number | undefined) => number

/**
 * Optional per-record watermark hint for punctuated strategies.
 */
export type WatermarkExtractor<V> = (value: V, timestamp: number) => number | undefined

export const WATERMARK_STRATEGY_KINDS = ['no-delay', 'constant-zero'] as const

export type WatermarkStrategyKind = (typeof WATERMARK_STRATEGY_KINDS)[number]

/**
 * Produces watermark candidates as records pass a timestamp assignment step.
 */
export interface WatermarkGenerator<V> {
	onEvent(value: V, timestamp: number): number | undefined
}

/**
 * How a stream derives event time and watermarks.
 *
 * @example
 * ```typescript
 * // Watermark follows the largest order time seen so far
 * WatermarkStrategy.forTimestamps<Order>(order => epochMillis(order.orderTime, '+08:00'))
 *
 * // Records without a meaningful event time: everything lands at t=0 and
 * // windows fire once the stream ends
 * WatermarkStrategy.constantZero<TypeStat>()
 * ```
 */
export class WatermarkStrategy<V> {
	private constructor(
		readonly kind: WatermarkStrategyKind | 'punctuated',
		readonly assigner: TimestampAssigner<V>,
		readonly maxOutOfOrdernessMs: number,
		private readonly extractor?: WatermarkExtractor<V>
	) {}

	/**
	 * Watermark tracks the maximum assigned timestamp (no out-of-orderness allowance).
	 */
	static forTimestamps<V>(assigner: TimestampAssigner<V>): WatermarkStrategy<V> {
		return new WatermarkStrategy<V>('no-delay', assigner, 0)
	}

	/**
	 * Every record is stamped 0 and the watermark stays pinned at 0.
	 */
	static constantZero<V>(): WatermarkStrategy<V> {
		return new WatermarkStrategy<V>('constant-zero', () => 0, 0)
	}

	/**
	 * Watermarks come only from `watermarkOf`; candidates below the current watermark are rejected.
	 */
	static punctuated<V>(assigner: TimestampAssigner<V>, watermarkOf: WatermarkExtractor<V>): WatermarkStrategy<V> {
		return new WatermarkStrategy<V>('punctuated', assigner, 0, watermarkOf)
	}

	/**
	 * Pick a strategy by its configured name. `constant-zero` ignores the assigner.
	 */
	static fromKind<V>(kind: WatermarkStrategyKind, assigner: TimestampAssigner<V>): WatermarkStrategy<V> {
		switch (kind) {
			case 'no-delay':
				return WatermarkStrategy.forTimestamps(assigner)
			case 'constant-zero':
				return WatermarkStrategy.constantZero<V>()
		}
	}

	/**
	 * Hold the watermark `delay` behind the largest timestamp seen.
	 */
	withOutOfOrderness(delay: WindowDuration): WatermarkStrategy<V> {
		return new WatermarkStrategy<V>(this.kind, this.assigner, parseWindowDuration(delay), this.extractor)
	}

	createGenerator(): WatermarkGenerator<V> {
		const extractor = this.extractor
		const delay = this.maxOutOfOrdernessMs
		if (extractor) {
			return {
				onEvent: (value, timestamp) => {
					const candidate = extractor(value, timestamp)
					return candidate === undefined ? undefined : candidate - delay
				},
			}
		}
		let maxTimestamp = -Infinity
		return {
			onEvent: (_value, timestamp) => {
				maxTimestamp = Math.max(maxTimestamp, timestamp)
				return maxTimestamp - delay
			},
		}
	}
}

/**
 * Monotonic watermark holder. Regressions are rejected, logged and counted, never thrown.
 */
export class WatermarkTracker {
	private value = -Infinity

	constructor(
		private readonly logger: Logger = noopLogger,
		private readonly rejected?: Counter
	) {}

	get current(): number {
		return this.value
	}

	/**
	 * @returns true when the watermark moved forward
	 */
	advance(candidate: number): boolean {
		if (Number.isNaN(candidate)) {
			throw new InvalidTimestampError('Watermark candidate is NaN')
		}
		if (candidate < this.value) {
			const error = new OutOfOrderWatermarkError(this.value, candidate)
			this.rejected?.inc()
			this.logger.warn('Rejected out-of-order watermark', {
				code: error.code,
				current: this.value,
				candidate,
			})
			return false
		}
		if (candidate === this.value) {
			return false
		}
		this.value = candidate
		return true
	}
}

/** `±HH:mm` */
export const TIME_ZONE_OFFSET_PATTERN = /^([+-])(\d{2}):(\d{2})$/

/**
 * `+08:00` -> 28_800_000
 */
export function timeZoneOffsetMillis(timeZoneOffset: string): number {
	const match = TIME_ZONE_OFFSET_PATTERN.exec(timeZoneOffset)
	if (!match) {
		throw new InvalidTimestampError(`Invalid time zone offset '${timeZoneOffset}', expected ±HH:mm`)
	}
	const [, sign, hours, minutes] = match
	const magnitude = (Number(hours) * 60 + Number(minutes)) * 60_000
	return sign === '-' ? -magnitude : magnitude
}

/**
 * Convert a zone-less local date-time (`2024-03-01T09:30:00`) observed at a fixed UTC
 * offset (`+08:00`) into epoch milliseconds.
 */
export function epochMillis(localDateTime: string, timeZoneOffset: string): number {
	timeZoneOffsetMillis(timeZoneOffset)
	const parsed = dayjs(`${localDateTime}${timeZoneOffset}`)
	if (!parsed.isValid()) {
		throw new InvalidTimestampError(`Cannot parse date-time '${localDateTime}'`)
	}
	return parsed.valueOf()
}

/**
 * Inverse of `epochMillis`: wall-clock time at `timeZoneOffset`, without zone,
 * e.g. `2024-03-01T09:30:00.000`.
 */
export function formatLocalDateTime(epochMs: number, timeZoneOffset: string): string {
	return dayjs(epochMs + timeZoneOffsetMillis(timeZoneOffset))
		.toISOString()
		.slice(0, 23)
}

/**
 * Ensure an assigned timestamp is usable for window assignment.
 */
export function checkTimestamp(timestamp: number): number {
	if (!Number.isFinite(timestamp)) {
		throw new InvalidTimestampError(`Event timestamp must be a finite number, got ${timestamp}`)
	}
	return timestamp
}
