import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { StreamError } from '@windflow/flow'
import { RecordValidationError, zodCodec } from '../../src/index.js'

const orderSchema = z.object({
	type: z.number().int(),
	price: z.number().nonnegative(),
	orderTime: z.string(),
})

function failure(fn: () => unknown): RecordValidationError {
	try {
		fn()
	} catch (error) {
		if (error instanceof RecordValidationError) {
			return error
		}
		throw error
	}
	throw new Error('expected a RecordValidationError')
}

describe('zodCodec', () => {
	const orders = zodCodec(orderSchema, { label: 'order' })

	it('decodes valid JSON records', () => {
		const buffer = Buffer.from('{"type":1,"price":12.5,"orderTime":"2024-03-01T09:30:00"}')

		expect(orders.decode(buffer)).toEqual({ type: 1, price: 12.5, orderTime: '2024-03-01T09:30:00' })
	})

	it('encodes valid records as JSON', () => {
		const encoded = orders.encode({ type: 1, price: 12.5, orderTime: '2024-03-01T09:30:00' })

		expect(encoded.toString('utf-8')).toBe('{"type":1,"price":12.5,"orderTime":"2024-03-01T09:30:00"}')
	})

	it('strips unknown fields', () => {
		const buffer = Buffer.from('{"type":1,"price":1,"orderTime":"t","extra":true}')

		expect(orders.decode(buffer)).toEqual({ type: 1, price: 1, orderTime: 't' })
	})

	it('rejects invalid records on decode', () => {
		const error = failure(() => orders.decode(Buffer.from('{"type":1,"price":"12","orderTime":"t"}')))

		expect(error.message).toBe('Invalid order record on decode: price: Expected number, received string')
		expect(error.direction).toBe('decode')
		expect(error.issues).toEqual(['price: Expected number, received string'])
		expect(error.code).toBe('INVALID_RECORD')
		expect(error).toBeInstanceOf(StreamError)
	})

	it('rejects invalid records on encode', () => {
		const error = failure(() => orders.encode({ type: 1, price: -1, orderTime: 't' }))

		expect(error.message).toBe('Invalid order record on encode: price: Number must be greater than or equal to 0')
		expect(error.direction).toBe('encode')
	})

	it('reports every issue', () => {
		const error = failure(() => orders.decode(Buffer.from('{"type":1.5}')))

		expect(error.issues).toEqual([
			'type: Expected integer, received float',
			'price: Required',
			'orderTime: Required',
		])
	})

	it('reports root issues', () => {
		const error = failure(() => orders.decode(Buffer.from('42')))

		expect(error.issues).toEqual(['(root): Expected object, received number'])
	})

	it('reports unparseable input as a decode failure', () => {
		const error = failure(() => orders.decode(Buffer.from('{not json')))

		expect(error.direction).toBe('decode')
		expect(error.issues).toHaveLength(1)
		expect(error.cause).toBeInstanceOf(SyntaxError)
	})

	it('uses custom serialization and a default label', () => {
		const numbers = zodCodec(z.number().int(), {
			encode: value => Buffer.from(String(value)),
			decode: buffer => Number(buffer.toString('utf-8')),
		})

		expect(numbers.decode(Buffer.from('7'))).toBe(7)
		expect(numbers.encode(7).toString('utf-8')).toBe('7')
		expect(failure(() => numbers.decode(Buffer.from('abc'))).message).toBe(
			'Invalid zod record on decode: (root): Expected number, received nan'
		)
	})
})
