import { describe, expect, it } from 'vitest'
import {
	checkTimestamp,
	createLogger,
	epochMillis,
	formatLocalDateTime,
	InvalidTimestampError,
	MetricsRegistry,
	timeZoneOffsetMillis,
	WatermarkStrategy,
	WatermarkTracker,
} from '../../src/index.js'

type Reading = { at: number; mark?: number }

describe('WatermarkStrategy', () => {
	it('follows the largest timestamp seen', () => {
		const strategy = WatermarkStrategy.forTimestamps<Reading>(reading => reading.at)
		const generator = strategy.createGenerator()

		expect(strategy.kind).toBe('no-delay')
		expect(strategy.assigner({ at: 100 }, undefined)).toBe(100)
		expect(generator.onEvent({ at: 100 }, 100)).toBe(100)
		expect(generator.onEvent({ at: 50 }, 50)).toBe(100)
		expect(generator.onEvent({ at: 300 }, 300)).toBe(300)
	})

	it('holds the watermark back by the out-of-orderness delay', () => {
		const generator = WatermarkStrategy.forTimestamps<Reading>(reading => reading.at)
			.withOutOfOrderness('200ms')
			.createGenerator()

		expect(generator.onEvent({ at: 1_000 }, 1_000)).toBe(800)
	})

	it('pins everything at zero for constant-zero', () => {
		const strategy = WatermarkStrategy.constantZero<Reading>()
		const generator = strategy.createGenerator()

		expect(strategy.assigner({ at: 5_000 }, 42)).toBe(0)
		expect(generator.onEvent({ at: 5_000 }, 0)).toBe(0)
		expect(generator.onEvent({ at: 9_000 }, 0)).toBe(0)
	})

	it('takes watermarks only from the extractor when punctuated', () => {
		const generator = WatermarkStrategy.punctuated<Reading>(
			reading => reading.at,
			reading => reading.mark
		).createGenerator()

		expect(generator.onEvent({ at: 100 }, 100)).toBeUndefined()
		expect(generator.onEvent({ at: 200, mark: 150 }, 200)).toBe(150)
	})

	it('holds punctuated watermarks back by the out-of-orderness delay', () => {
		const generator = WatermarkStrategy.punctuated<Reading>(
			reading => reading.at,
			(_reading, timestamp) => (timestamp % 1_000 === 0 ? timestamp : undefined)
		)
			.withOutOfOrderness('1s')
			.createGenerator()

		expect(generator.onEvent({ at: 5_000 }, 5_000)).toBe(4_000)
		expect(generator.onEvent({ at: 5_500 }, 5_500)).toBeUndefined()
	})

	it('selects a strategy by kind', () => {
		const noDelay = WatermarkStrategy.fromKind<Reading>('no-delay', reading => reading.at)
		const zero = WatermarkStrategy.fromKind<Reading>('constant-zero', reading => reading.at)

		expect(noDelay.kind).toBe('no-delay')
		expect(noDelay.assigner({ at: 7 }, undefined)).toBe(7)
		expect(zero.kind).toBe('constant-zero')
		expect(zero.assigner({ at: 7 }, undefined)).toBe(0)
	})
})

describe('WatermarkTracker', () => {
	it('advances monotonically', () => {
		const tracker = new WatermarkTracker()

		expect(tracker.current).toBe(-Infinity)
		expect(tracker.advance(100)).toBe(true)
		expect(tracker.advance(100)).toBe(false)
		expect(tracker.advance(Infinity)).toBe(true)
		expect(tracker.current).toBe(Infinity)
	})

	it('rejects, logs and counts a regression', () => {
		const lines: string[] = []
		const logger = createLogger('warn', { operator: 'ts' }, (_level, line) => lines.push(line))
		const metrics = new MetricsRegistry()
		const tracker = new WatermarkTracker(logger, metrics.counter('ts', 'watermarksRejected'))

		tracker.advance(500)
		expect(tracker.advance(300)).toBe(false)

		expect(tracker.current).toBe(500)
		expect(metrics.get('ts', 'watermarksRejected')).toBe(1)
		expect(lines).toHaveLength(1)
		expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
			level: 'warn',
			message: 'Rejected out-of-order watermark',
			operator: 'ts',
			code: 'OUT_OF_ORDER_WATERMARK',
			current: 500,
			candidate: 300,
		})
	})

	it('throws on NaN', () => {
		expect(() => new WatermarkTracker().advance(Number.NaN)).toThrow(InvalidTimestampError)
	})
})

describe('epochMillis', () => {
	it('reads a local date-time at a fixed offset', () => {
		expect(epochMillis('2024-03-01T09:30:00', '+08:00')).toBe(Date.UTC(2024, 2, 1, 1, 30, 0))
		expect(epochMillis('1970-01-01T08:00:00.250', '+08:00')).toBe(250)
		expect(epochMillis('1969-12-31T19:00:01', '-05:00')).toBe(1_000)
	})

	it('rejects malformed offsets and date-times', () => {
		expect(() => epochMillis('2024-03-01T09:30:00', '8')).toThrow(InvalidTimestampError)
		expect(() => epochMillis('not a date', '+08:00')).toThrow("Cannot parse date-time 'not a date'")
	})
})

describe('timeZoneOffsetMillis', () => {
	it('converts offsets to milliseconds', () => {
		expect(timeZoneOffsetMillis('+08:00')).toBe(28_800_000)
		expect(timeZoneOffsetMillis('-05:30')).toBe(-19_800_000)
	})

	it('rejects malformed offsets', () => {
		expect(() => timeZoneOffsetMillis('8')).toThrow(InvalidTimestampError)
		expect(() => timeZoneOffsetMillis('8')).toThrow("Invalid time zone offset '8', expected ±HH:mm")
	})
})

describe('formatLocalDateTime', () => {
	it('writes the local date-time at an offset without a zone', () => {
		expect(formatLocalDateTime(0, '+08:00')).toBe('1970-01-01T08:00:00.000')
		expect(formatLocalDateTime(Date.UTC(2024, 2, 1, 1, 30), '+08:00')).toBe('2024-03-01T09:30:00.000')
		expect(formatLocalDateTime(0, '-05:30')).toBe('1969-12-31T18:30:00.000')
	})

	it('reads back with epochMillis', () => {
		const time = Date.UTC(2024, 2, 1, 1, 30, 12, 345)

		expect(epochMillis(formatLocalDateTime(time, '+08:00'), '+08:00')).toBe(time)
	})
})

describe('checkTimestamp', () => {
	it('passes finite numbers through', () => {
		expect(checkTimestamp(5)).toBe(5)
	})

	it('rejects NaN and infinities', () => {
		expect(() => checkTimestamp(Number.NaN)).toThrow(InvalidTimestampError)
		expect(() => checkTimestamp(Infinity)).toThrow('Event timestamp must be a finite number, got Infinity')
	})
})
