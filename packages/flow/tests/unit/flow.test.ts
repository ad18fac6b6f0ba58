import { describe, expect, it, vi } from 'vitest'
import {
	callbackSink,
	codec,
	createLogger,
	flow,
	fromAsyncIterable,
	fromIterable,
	InvalidTimestampError,
	PendingWindowsError,
	PipelineError,
	SourceError,
	TopologyError,
	TumblingWindows,
	WatermarkStrategy,
	type FlowApp,
	type TimeWindow,
	type WindowResult,
} from '../../src/index.js'
import { ManualSource, ResultCollector } from '../../src/testing.js'

type Click = { key: number; at: number }

function clickCounts(options: { parallelism?: number; onLateRecord?: (value: Click, window: TimeWindow, watermark: number) => void } = {}) {
	const app = flow({ applicationId: 'clicks-test', parallelism: options.parallelism })
	const clicks = new ManualSource<Click>('clicks')
	const results = new ResultCollector<WindowResult<number, number>>()

	app
		.source(clicks)
		.assignTimestamps(
			WatermarkStrategy.forTimestamps(click => click.at),
			{ name: 'ts' }
		)
		.keyBy(click => click.key)
		.window(TumblingWindows.of('1s'), { name: 'clicks-per-second', onLateRecord: options.onLateRecord })
		.count()
		.sink(results)

	return { app, clicks, results }
}

function byWindowThenKey(a: WindowResult<number, number>, b: WindowResult<number, number>): number {
	return a.windowEnd - b.windowEnd || a.key - b.key
}

describe('flow', () => {
	describe('tumbling window counts', () => {
		it('fires a window once the watermark reaches its end', async () => {
			const { app, clicks, results } = clickCounts()
			const running = app.run()

			await clicks.pushAll([
				{ key: 1, at: 100 },
				{ key: 1, at: 300 },
				{ key: 1, at: 900 },
			])
			expect(results.values).toEqual([])

			await clicks.push({ key: 1, at: 1_200 })
			expect(results.values).toEqual([{ key: 1, value: 3, windowEnd: 1_000 }])

			clicks.end()
			const result = await running

			expect(results.values).toEqual([
				{ key: 1, value: 3, windowEnd: 1_000 },
				{ key: 1, value: 1, windowEnd: 2_000 },
			])
			expect(result.state).toBe('COMPLETED')
			expect(result.metrics['clicks-per-second']).toMatchObject({ recordsIn: 4, recordsOut: 2, windowsFired: 2 })
			expect(app.state()).toBe('COMPLETED')
			expect(app.getLastError()).toBeNull()
			expect(results.closeCalls).toBe(1)
		})

		it('drops records for windows that already fired', async () => {
			const late: { value: Click; window: TimeWindow; watermark: number }[] = []
			const { app, clicks, results } = clickCounts({
				onLateRecord: (value, window, watermark) => late.push({ value, window, watermark }),
			})
			const running = app.run()

			await clicks.pushAll([
				{ key: 1, at: 100 },
				{ key: 1, at: 1_500 },
				{ key: 1, at: 500 },
			])
			clicks.end()
			const result = await running

			expect(results.values).toEqual([
				{ key: 1, value: 1, windowEnd: 1_000 },
				{ key: 1, value: 1, windowEnd: 2_000 },
			])
			expect(late).toEqual([{ value: { key: 1, at: 500 }, window: { start: 0, end: 1_000 }, watermark: 1_500 }])
			expect(result.metrics['clicks-per-second']?.lateRecordsDropped).toBe(1)
		})

		it('keeps a record whose window ends after the watermark', async () => {
			const { app, clicks, results } = clickCounts()
			const running = app.run()

			await clicks.pushAll([
				{ key: 1, at: 500 },
				{ key: 1, at: 999 },
				{ key: 1, at: 999 },
			])
			expect(results.values).toEqual([])

			await clicks.push({ key: 1, at: 1_000 })
			expect(results.values).toEqual([{ key: 1, value: 3, windowEnd: 1_000 }])

			clicks.end()
			await running
		})

		it('flushes every key when the input ends', async () => {
			const { app, clicks, results } = clickCounts()
			const running = app.run()

			await clicks.pushAll([
				{ key: 1, at: 100 },
				{ key: 2, at: 200 },
				{ key: 1, at: 300 },
			])
			clicks.end()
			await running

			expect(results.values).toEqual([
				{ key: 1, value: 2, windowEnd: 1_000 },
				{ key: 2, value: 1, windowEnd: 1_000 },
			])
		})

		it('partitions keys across parallel window instances', async () => {
			const { app, clicks, results } = clickCounts({ parallelism: 4 })
			const keys = [1, 2, 3, 4, 5, 6, 7, 8]
			const running = app.run()

			await clicks.pushAll(keys.map(key => ({ key, at: 100 })))
			await clicks.pushAll(keys.map(key => ({ key, at: 1_100 })))
			clicks.end()
			const result = await running

			expect(results.values.sort(byWindowThenKey)).toEqual([
				...keys.map(key => ({ key, value: 1, windowEnd: 1_000 })),
				...keys.map(key => ({ key, value: 1, windowEnd: 2_000 })),
			])
			expect(result.metrics['clicks-per-second']?.windowsFired).toBe(16)
			expect(results.closeCalls).toBe(1)
		})

		it('re-windows results stamped with a constant timestamp', async () => {
			const app = flow({ applicationId: 'summary-test' })
			const results = new ResultCollector<WindowResult<number, number>>()

			app
				.source(fromIterable('results', [{ key: 1 }, { key: 1 }]), { name: 'counts' })
				.assignTimestamps(WatermarkStrategy.constantZero())
				.keyBy(value => value.key)
				.window(TumblingWindows.of('10000d'))
				.count()
				.sink(results, { name: 'summary' })

			await app.run()

			expect(results.values).toEqual([{ key: 1, value: 2, windowEnd: 864_000_000_000 }])
		})

		it('groups records whose key is missing', async () => {
			type Visit = { page?: string; at: number }
			const app = flow({ applicationId: 'visits-test' })
			const results = new ResultCollector<WindowResult<string | undefined, number>>()
			const visits: Visit[] = [{ at: 100 }, { page: 'a', at: 200 }, { at: 300 }]

			app
				.source(fromIterable('visits', visits))
				.assignTimestamps(WatermarkStrategy.forTimestamps(visit => visit.at))
				.keyBy(visit => visit.page)
				.window(TumblingWindows.of('1s'))
				.count()
				.sink(results)

			const result = await app.run()

			expect(result.state).toBe('COMPLETED')
			expect(results.values).toEqual([
				{ key: undefined, value: 2, windowEnd: 1_000 },
				{ key: 'a', value: 1, windowEnd: 1_000 },
			])
		})
	})

	describe('merge', () => {
		it('advances on the slowest input', async () => {
			const app = flow({ applicationId: 'merge-test' })
			const a = new ManualSource<{ id: string; at: number }>('a')
			const b = new ManualSource<{ id: string; at: number }>('b')
			const results = new ResultCollector<WindowResult<string, number>>()
			const strategy = WatermarkStrategy.forTimestamps<{ id: string; at: number }>(value => value.at)

			app
				.source(a)
				.assignTimestamps(strategy, { name: 'ts-a' })
				.merge(app.source(b).assignTimestamps(strategy, { name: 'ts-b' }))
				.keyBy(value => value.id)
				.window(TumblingWindows.of('1s'))
				.count()
				.sink(results)
			const running = app.run()

			await a.push({ id: 'x', at: 100 })
			await b.push({ id: 'x', at: 1_500 })
			expect(results.values).toEqual([])

			await a.push({ id: 'x', at: 1_200 })
			expect(results.values).toEqual([{ key: 'x', value: 1, windowEnd: 1_000 }])

			a.end()
			b.end()
			await running

			expect(results.values).toEqual([
				{ key: 'x', value: 1, windowEnd: 1_000 },
				{ key: 'x', value: 2, windowEnd: 2_000 },
			])
		})

		it('rejects streams of another app', () => {
			const first = flow({ applicationId: 'first' }).source(fromIterable('numbers', [1]))
			const second = flow({ applicationId: 'second' }).source(fromIterable('numbers', [2]))

			expect(() => first.merge(second)).toThrow('Streams can only be combined within the same app')
		})
	})

	describe('join', () => {
		type Count = { type: number; count: number }
		type Stat = { type: number; avgPrice: number }
		type Joined = { type: number; count: number; avgPrice: number }

		function joinPipeline() {
			const app = flow({ applicationId: 'join-test' })
			const counts = new ManualSource<Count>('counts')
			const stats = new ManualSource<Stat>('stats')
			const joined = new ResultCollector<Joined>('joined')

			app
				.source(counts)
				.keyBy(count => count.type)
				.join(
					app.source(stats).keyBy(stat => stat.type),
					(count, stat, type) => ({ type, count: count.count, avgPrice: stat.avgPrice }),
					{ name: 'count-stat-join' }
				)
				.sink(joined)

			return { app, counts, stats, joined }
		}

		it('matches when the right side arrives first', async () => {
			const { app, counts, stats, joined } = joinPipeline()
			const running = app.run()

			await stats.push({ type: 1, avgPrice: 42 })
			await counts.push({ type: 1, count: 3 })
			counts.end()
			stats.end()
			await running

			expect(joined.values).toEqual([{ type: 1, count: 3, avgPrice: 42 }])
			expect(joined.closeCalls).toBe(1)
		})

		it('matches when the left side arrives first', async () => {
			const { app, counts, stats, joined } = joinPipeline()
			const running = app.run()

			await counts.push({ type: 1, count: 3 })
			await stats.push({ type: 2, avgPrice: 17.5 })
			await stats.push({ type: 1, avgPrice: 42 })
			counts.end()
			stats.end()
			await running

			expect(joined.values).toEqual([{ type: 1, count: 3, avgPrice: 42 }])
		})

		it('joins the latest value of each side', async () => {
			const { app, counts, stats, joined } = joinPipeline()
			const running = app.run()

			await counts.push({ type: 1, count: 3 })
			await counts.push({ type: 1, count: 5 })
			await stats.push({ type: 1, avgPrice: 42 })
			await stats.push({ type: 1, avgPrice: 50 })
			counts.end()
			stats.end()
			const result = await running

			expect(joined.values).toEqual([
				{ type: 1, count: 5, avgPrice: 42 },
				{ type: 1, count: 5, avgPrice: 50 },
			])
			expect(result.metrics['count-stat-join']).toMatchObject({ joinMatches: 2, unmatchedEvents: 2 })
		})
	})

	describe('stateless operators', () => {
		it('applies map, filter, flatMap and peek in order', async () => {
			const app = flow({ applicationId: 'stateless-test' })
			const seen: number[] = []
			const results = new ResultCollector<number>()

			app
				.source(fromIterable('numbers', [1, 2, 3, 4]))
				.map(value => value * 10)
				.filter(value => value > 10)
				.flatMap(value => [value, value + 1])
				.peek(value => {
					seen.push(value)
				})
				.sink(results)

			const result = await app.run()

			expect(results.values).toEqual([20, 21, 30, 31, 40, 41])
			expect(seen).toEqual([20, 21, 30, 31, 40, 41])
			expect(result.metrics['filter-2']).toMatchObject({ recordsIn: 4, recordsOut: 3 })
			expect(result.metrics['numbers']).toMatchObject({ recordsOut: 4 })
		})

		it('fans a stream out to several sinks', async () => {
			const app = flow({ applicationId: 'fan-out-test' })
			const evens = new ResultCollector<number>('evens')
			const all = new ResultCollector<number>('all')
			const numbers = app.source(fromIterable('numbers', [1, 2, 3, 4]))

			numbers.filter(value => value % 2 === 0).sink(evens)
			numbers.sink(all)
			await app.run()

			expect(evens.values).toEqual([2, 4])
			expect(all.values).toEqual([1, 2, 3, 4])
		})
	})

	describe('watermarks', () => {
		it('rejects a punctuated watermark that moves backwards', async () => {
			type Reading = { at: number; mark: number }
			const warnings: Record<string, unknown>[] = []
			const app = flow({
				applicationId: 'punctuated-test',
				logger: createLogger('warn', {}, (_level, line) => {
					warnings.push(JSON.parse(line) as Record<string, unknown>)
				}),
			})
			const results = new ResultCollector<Reading>()

			app
				.source(
					fromIterable('readings', [
						{ at: 100, mark: 500 },
						{ at: 200, mark: 300 },
					])
				)
				.assignTimestamps(
					WatermarkStrategy.punctuated<Reading>(
						reading => reading.at,
						reading => reading.mark
					),
					{ name: 'ts' }
				)
				.sink(results)

			const result = await app.run()

			expect(results.length).toBe(2)
			expect(result.metrics['ts']?.watermarksRejected).toBe(1)
			expect(warnings).toHaveLength(1)
			expect(warnings[0]).toMatchObject({
				level: 'warn',
				message: 'Rejected out-of-order watermark',
				applicationId: 'punctuated-test',
				operator: 'ts',
				code: 'OUT_OF_ORDER_WATERMARK',
				current: 500,
				candidate: 300,
			})
		})

		it('fails on a timestamp that is not a number', async () => {
			const app = flow({ applicationId: 'nan-test' })

			app
				.source(fromIterable('numbers', [1]))
				.assignTimestamps(WatermarkStrategy.forTimestamps<number>(() => Number.NaN))
				.sink(new ResultCollector<number>())

			await expect(app.run()).rejects.toThrow(InvalidTimestampError)
			expect(app.state()).toBe('ERROR')
			expect(app.getLastError()?.message).toBe('Event timestamp must be a finite number, got NaN')
		})
	})

	describe('failures', () => {
		it('reports a failed sink after the other sinks completed', async () => {
			const app = flow({ applicationId: 'sink-failure-test' })
			const results = new ResultCollector<number>()
			const numbers = app.source(fromIterable('numbers', [1, 2, 3]))

			numbers.sink(
				callbackSink<number>('broken', () => {
					throw new Error('disk full')
				})
			)
			numbers.sink(results)

			const error = await app.run().catch((failure: unknown) => failure)

			expect(error).toBeInstanceOf(PipelineError)
			if (error instanceof PipelineError) {
				expect(error.message).toBe('1 sink(s) failed: broken')
				expect(error.failures.map(failure => failure.message)).toEqual(["Sink 'broken' failed: disk full"])
			}
			expect(results.values).toEqual([1, 2, 3])
			expect(results.closed).toBe(true)
			expect(app.metrics()['broken']).toMatchObject({ sinkFailures: 1, recordsDiscarded: 2 })
			expect(app.state()).toBe('ERROR')
		})

		it('reports windows left open by an unbounded source', async () => {
			const app = flow({ applicationId: 'pending-test' })
			const clicks = new ManualSource<Click>('clicks', { boundedness: 'unbounded' })

			app
				.source(clicks)
				.assignTimestamps(WatermarkStrategy.forTimestamps(click => click.at))
				.keyBy(click => click.key)
				.window(TumblingWindows.of('1s'), { name: 'clicks-per-second' })
				.count()
				.sink(new ResultCollector<WindowResult<number, number>>())
			const running = app.run().catch((failure: unknown) => failure)

			await clicks.push({ key: 1, at: 100 })
			clicks.end()
			const error = await running

			expect(error).toBeInstanceOf(PendingWindowsError)
			if (error instanceof PendingWindowsError) {
				expect(error.operator).toBe('clicks-per-second')
				expect(error.pendingWindows).toBe(1)
			}
		})

		it('wraps source read failures', async () => {
			const { app, clicks } = clickCounts()
			const running = app.run().catch((failure: unknown) => failure)

			await clicks.push({ key: 1, at: 100 })
			clicks.fail(new Error('connection reset'))
			const error = await running

			expect(error).toBeInstanceOf(SourceError)
			if (error instanceof SourceError) {
				expect(error.message).toBe("Source 'clicks' failed: connection reset")
				expect(error.code).toBe('SOURCE_FAILURE')
			}
			expect(app.state()).toBe('ERROR')
		})
	})

	describe('close', () => {
		it('stops a running pipeline without flushing windows', async () => {
			const { app, clicks, results } = clickCounts()
			const running = app.run()

			await clicks.push({ key: 1, at: 100 })
			await app.close()

			await expect(running).resolves.toMatchObject({ state: 'STOPPED' })
			expect(app.state()).toBe('STOPPED')
			expect(results.isEmpty).toBe(true)
			expect(results.closed).toBe(false)
		})

		it('stops while a source is waiting for its next value', async () => {
			async function* stalled() {
				yield 1
				await new Promise<never>(() => undefined)
			}
			const app = flow({ applicationId: 'stalled-test' })
			const results = new ResultCollector<number>()
			app.source(fromAsyncIterable('stalled', stalled(), { boundedness: 'unbounded' })).sink(results)

			const running = app.run()
			await vi.waitFor(() => expect(results.length).toBe(1))
			await app.close()

			await expect(running).resolves.toMatchObject({ state: 'STOPPED' })
			expect(app.state()).toBe('STOPPED')
		})

		it('stops an app that never ran', async () => {
			const { app } = clickCounts()

			await app.close()

			expect(app.state()).toBe('STOPPED')
			await expect(app.run()).rejects.toThrow("App 'clicks-test' cannot run from state STOPPED")
		})
	})

	describe('topology', () => {
		let app: FlowApp

		it('requires a source', async () => {
			app = flow({ applicationId: 'empty' })

			await expect(app.run()).rejects.toThrow(new TopologyError("App 'empty' has no sources"))
		})

		it('requires every stream to reach a sink', async () => {
			app = flow({ applicationId: 'dangling' })
			app.source(fromIterable('numbers', [1])).map(value => value * 2, { name: 'double' })

			await expect(app.run()).rejects.toThrow("Stream 'double' is not connected to a sink")
		})

		it('rejects duplicate operator names', () => {
			app = flow({ applicationId: 'duplicates' })
			app.source(fromIterable('numbers', [1]))

			expect(() => app.source(fromIterable('numbers', [2]))).toThrow("Duplicate operator name 'numbers'")
		})

		it('rejects changes after the app started', async () => {
			app = flow({ applicationId: 'started' })
			app.source(fromIterable('numbers', [1])).sink(new ResultCollector<number>())
			await app.run()

			expect(() => app.source(fromIterable('late', [2]))).toThrow(
				"Cannot add 'late' to app 'started' after it started"
			)
			await expect(app.run()).rejects.toThrow("App 'started' cannot run from state COMPLETED")
		})

		it('rejects a join whose right side brings its own key codec', () => {
			app = flow({ applicationId: 'join-codecs' })
			const left = app.source(fromIterable('left', ['a'])).keyBy(value => value)
			const right = app.source(fromIterable('right', ['a'])).keyBy(value => value, { key: codec.string() })

			expect(() => left.join(right, (l, r) => `${l}-${r}`, { name: 'pair' })).toThrow(TopologyError)
			expect(() => left.join(right, (l, r) => `${l}-${r}`, { name: 'pair' })).toThrow(
				"Join 'pair': the right stream was keyed with its own codec, but both sides are partitioned with the left stream's codec; key both sides with the same codec"
			)
		})

		it('joins sides keyed with the same codec', async () => {
			app = flow({ applicationId: 'join-codecs' })
			const keys = codec.string()
			const results = new ResultCollector<string>()
			const left = app.source(fromIterable('left', ['a'])).keyBy(value => value, { key: keys })
			const right = app.source(fromIterable('right', ['a'])).keyBy(value => value, { key: keys })

			left.join(right, (l, r) => `${l}-${r}`, { name: 'pair' }).sink(results)
			await app.run()

			expect(results.values).toEqual(['a-a'])
		})

		it('requires event time before windowing', () => {
			app = flow({ applicationId: 'no-time' })
			const keyed = app.source(fromIterable('numbers', [1])).keyBy(value => value)

			expect(() => keyed.window(TumblingWindows.of('1s'))).toThrow(
				"Stream 'numbers' has no event time; call assignTimestamps() before window()"
			)
		})
	})
})
