import { InvalidWindowDurationError } from '@/errors.js'

export type WindowDuration = number | `${number}ms` | `${number}s` | `${number}m` | `${number}h` | `${number}d`

const UNIT_MS = {
	ms: 1,
	s: 1000,
	m: 60 * 1000,
	h: 60 * 60 * 1000,
	d: 24 * 60 * 60 * 1000,
} as const

/**
 * Parse a WindowDuration to milliseconds.
 */
export function parseWindowDuration(duration: WindowDuration): number {
	if (typeof duration === 'number') {
		if (!Number.isFinite(duration) || duration < 0) {
			throw new InvalidWindowDurationError(duration)
		}
		return duration
	}
	const match = /^(\d+)(ms|s|m|h|d)$/.exec(duration)
	if (!match) {
		throw new InvalidWindowDurationError(duration)
	}
	const [, amount, unit] = match
	if (amount === undefined || !isUnit(unit)) {
		throw new InvalidWindowDurationError(duration)
	}
	return parseInt(amount, 10) * UNIT_MS[unit]
}

function isUnit(unit: string | undefined): unit is keyof typeof UNIT_MS {
	return unit !== undefined && Object.hasOwn(UNIT_MS, unit)
}

/**
 * A half-open time interval [start, end) in epoch milliseconds.
 */
export interface TimeWindow {
	readonly start: number
	readonly end: number
}

/**
 * Fixed-size, non-overlapping, contiguous event-time windows.
 *
 * @example
 * ```typescript
 * TumblingWindows.of('1s').assign(1_250) // { start: 1000, end: 2000 }
 * TumblingWindows.of('1d').withOffset(-8 * 3_600_000) // calendar days in UTC+8
 * ```
 */
export class TumblingWindows {
	readonly sizeMs: number
	readonly offsetMs: number

	private constructor(size: WindowDuration, offsetMs: number) {
		this.sizeMs = parseWindowDuration(size)
		if (this.sizeMs <= 0) {
			throw new InvalidWindowDurationError(size, 'window size must be positive')
		}
		if (!Number.isFinite(offsetMs)) {
			throw new InvalidWindowDurationError(offsetMs, 'window offset must be finite')
		}
		// Normalized into [0, size) so assignment stays a single floor division
		this.offsetMs = ((offsetMs % this.sizeMs) + this.sizeMs) % this.sizeMs
	}

	static of(size: WindowDuration): TumblingWindows {
		return new TumblingWindows(size, 0)
	}

	/**
	 * Shift window boundaries. Plain numbers may be negative.
	 */
	withOffset(offset: WindowDuration): TumblingWindows {
		const offsetMs = typeof offset === 'number' ? offset : parseWindowDuration(offset)
		return new TumblingWindows(this.sizeMs, offsetMs)
	}

	/**
	 * The single window containing `timestamp`.
	 */
	assign(timestamp: number): TimeWindow {
		const start = Math.floor((timestamp - this.offsetMs) / this.sizeMs) * this.sizeMs + this.offsetMs
		return { start, end: start + this.sizeMs }
	}
}
