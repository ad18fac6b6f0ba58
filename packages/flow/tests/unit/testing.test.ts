import { describe, expect, it } from 'vitest'
import { createFactory, ManualSource, ResultCollector, timestamps } from '../../src/testing.js'

describe('ManualSource', () => {
	it('resolves a push once the reader asks for the next value', async () => {
		const source = new ManualSource<number>('numbers')
		const iterator = source.read(new AbortController().signal)[Symbol.asyncIterator]()
		let processed = false

		const pushed = source.push(1).then(() => {
			processed = true
		})

		expect(await iterator.next()).toEqual({ value: 1, done: false })
		expect(processed).toBe(false)

		const next = iterator.next()
		await pushed
		expect(processed).toBe(true)

		source.end()
		expect(await next).toEqual({ value: undefined, done: true })
	})

	it('is bounded unless told otherwise', () => {
		expect(new ManualSource('a').boundedness).toBe('bounded')
		expect(new ManualSource('b', { boundedness: 'unbounded' }).boundedness).toBe('unbounded')
	})

	it('releases unread pushes when the reader is aborted', async () => {
		const source = new ManualSource<number>('numbers')
		const controller = new AbortController()
		const iterator = source.read(controller.signal)[Symbol.asyncIterator]()

		const first = source.push(1)
		const second = source.push(2)
		await iterator.next()
		controller.abort()

		expect(await iterator.next()).toEqual({ value: undefined, done: true })
		await expect(Promise.all([first, second])).resolves.toEqual([undefined, undefined])
	})

	it('stops a waiting reader on abort', async () => {
		const source = new ManualSource<number>('numbers')
		const controller = new AbortController()
		const next = source.read(controller.signal)[Symbol.asyncIterator]().next()

		controller.abort()

		expect(await next).toEqual({ value: undefined, done: true })
	})

	it('throws the failure from the reader', async () => {
		const source = new ManualSource<number>('numbers')
		const iterator = source.read(new AbortController().signal)[Symbol.asyncIterator]()

		source.fail(new Error('upstream broke'))

		await expect(iterator.next()).rejects.toThrow('upstream broke')
	})

	it('rejects pushes after end', async () => {
		const source = new ManualSource<number>('numbers')

		source.end()

		await expect(source.push(1)).rejects.toThrow("ManualSource 'numbers' has already ended")
	})
})

describe('ResultCollector', () => {
	it('collects values in order', () => {
		const results = new ResultCollector<number>('numbers')

		results.consume(1)
		results.consume(2)
		results.consume(3)

		expect(results.name).toBe('numbers')
		expect(results.values).toEqual([1, 2, 3])
		expect(results.length).toBe(3)
		expect(results.first).toBe(1)
		expect(results.last).toBe(3)
		expect(results.get(1)).toBe(2)
		expect(results.filter(value => value > 1)).toEqual([2, 3])
		expect(results.some(value => value === 2)).toBe(true)
		expect(results.every(value => value > 1)).toBe(false)
	})

	it('throws for a missing index', () => {
		const results = new ResultCollector<number>()

		expect(results.name).toBe('results')
		expect(() => results.get(0)).toThrow('No value at index 0. Collection has 0 items.')
	})

	it('returns a copy of its values', () => {
		const results = new ResultCollector<number>()
		results.consume(1)

		results.values.push(2)

		expect(results.length).toBe(1)
	})

	it('tracks close calls and clears', () => {
		const results = new ResultCollector<number>()
		results.consume(1)

		expect(results.closed).toBe(false)
		results.close()
		results.clear()

		expect(results.closed).toBe(true)
		expect(results.closeCalls).toBe(1)
		expect(results.isEmpty).toBe(true)
	})
})

describe('createFactory', () => {
	it('creates numbered values with overrides', () => {
		const orders = createFactory(index => ({ type: (index % 3) + 1, price: 10 * index }))

		expect(orders.createMany(2)).toEqual([
			{ type: 1, price: 0 },
			{ type: 2, price: 10 },
		])
		expect(orders.create({ price: 10_000 })).toEqual({ type: 3, price: 10_000 })

		orders.reset()
		expect(orders.create()).toEqual({ type: 1, price: 0 })
	})
})

describe('timestamps', () => {
	it('offsets from a base time', () => {
		const ts = timestamps(1_000)

		expect(ts.base).toBe(1_000)
		expect(ts.at(0)).toBe(1_000)
		expect(ts.at('1s')).toBe(2_000)
		expect(ts.advance('1m').at('100ms')).toBe(61_100)
	})
})
