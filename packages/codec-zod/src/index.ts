import { StreamError, type Codec } from '@windflow/flow'
import type { ZodType } from 'zod'

export interface ZodCodecOptions {
	/** Serializes a validated value. Default: UTF-8 JSON */
	encode?: (value: unknown) => Buffer
	/** Parses raw bytes before validation. Default: UTF-8 JSON */
	decode?: (buffer: Buffer) => unknown
	/** Used in error messages, e.g. the source or sink the codec belongs to */
	label?: string
}

/**
 * A value failed schema validation while being encoded or decoded.
 */
export class RecordValidationError extends StreamError {
	readonly direction: 'encode' | 'decode'
	readonly issues: readonly string[]

	constructor(label: string, direction: 'encode' | 'decode', issues: readonly string[], cause?: unknown) {
		super(`Invalid ${label} record on ${direction}: ${issues.join('; ')}`, 'INVALID_RECORD', { cause })
		this.name = 'RecordValidationError'
		this.direction = direction
		this.issues = issues
	}
}

/**
 * Codec that validates with `schema` in both directions
 *
 * @example
 * ```typescript
 * const orderSchema = z.object({ type: z.number().int(), price: z.number(), orderTime: z.string() })
 * const orders = linesSource('orders', 'orders.jsonl', zodCodec(orderSchema, { label: 'order' }))
 * ```
 */
export function zodCodec<T>(schema: ZodType<T>, options: ZodCodecOptions = {}): Codec<T> {
	const label = options.label ?? 'zod'
	const encodeValue = options.encode ?? ((value: unknown) => Buffer.from(JSON.stringify(value), 'utf-8'))
	const decodeValue = options.decode ?? ((buffer: Buffer): unknown => JSON.parse(buffer.toString('utf-8')))

	const validate = (value: unknown, direction: 'encode' | 'decode'): T => {
		const result = schema.safeParse(value)
		if (!result.success) {
			throw new RecordValidationError(
				label,
				direction,
				result.error.issues.map(
					issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
				),
				result.error
			)
		}
		return result.data
	}

	return {
		encode: value => encodeValue(validate(value, 'encode')),
		decode: buffer => {
			let raw: unknown
			try {
				raw = decodeValue(buffer)
			} catch (error) {
				throw new RecordValidationError(
					label,
					'decode',
					[error instanceof Error ? error.message : String(error)],
					error
				)
			}
			return validate(raw, 'decode')
		},
	}
}
