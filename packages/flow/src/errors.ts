/**
 * Flow error hierarchy
 *
 * Every error raised by the engine carries a stable `code` so callers can branch
 * on the condition without matching messages.
 */

export type StreamErrorCode =
	| 'OUT_OF_ORDER_WATERMARK'
	| 'SINK_FAILURE'
	| 'SOURCE_FAILURE'
	| 'PENDING_WINDOWS'
	| 'PIPELINE_FAILED'
	| 'INVALID_CONFIG'
	| 'INVALID_TOPOLOGY'
	| 'INVALID_TIMESTAMP'
	| 'INVALID_WINDOW_DURATION'
	| 'INVALID_RECORD'

/**
 * Base class for all flow errors
 */
export class StreamError extends Error {
	readonly code: StreamErrorCode

	constructor(message: string, code: StreamErrorCode, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'StreamError'
		this.code = code

		// Maintains proper stack trace for where error was thrown (V8 only)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor)
		}
	}
}

/**
 * A watermark candidate was lower than the current watermark.
 *
 * Raised for logging only: the candidate is rejected and the watermark stays where it was.
 */
export class OutOfOrderWatermarkError extends StreamError {
	readonly current: number
	readonly candidate: number

	constructor(current: number, candidate: number) {
		super(`Watermark regression rejected: ${candidate} < ${current}`, 'OUT_OF_ORDER_WATERMARK')
		this.name = 'OutOfOrderWatermarkError'
		this.current = current
		this.candidate = candidate
	}
}

/**
 * A sink threw while consuming a value. Fatal to the sink's branch only.
 */
export class SinkFailureError extends StreamError {
	readonly sink: string

	constructor(sink: string, cause: unknown) {
		super(`Sink '${sink}' failed: ${describeCause(cause)}`, 'SINK_FAILURE', { cause })
		this.name = 'SinkFailureError'
		this.sink = sink
	}
}

export class SourceError extends StreamError {
	readonly source: string

	constructor(source: string, cause: unknown) {
		super(`Source '${source}' failed: ${describeCause(cause)}`, 'SOURCE_FAILURE', { cause })
		this.name = 'SourceError'
		this.source = source
	}
}

/**
 * All sources finished but a window operator still holds unfired windows, which
 * means its watermark never reached the end of those windows.
 */
export class PendingWindowsError extends StreamError {
	readonly operator: string
	readonly pendingWindows: number

	constructor(operator: string, pendingWindows: number) {
		super(
			`Operator '${operator}' finished with ${pendingWindows} unfired window(s); ` +
				'an input ended without advancing its watermark to the end of time',
			'PENDING_WINDOWS'
		)
		this.name = 'PendingWindowsError'
		this.operator = operator
		this.pendingWindows = pendingWindows
	}
}

/**
 * Raised by `run()` once every source finished when one or more sinks failed.
 */
export class PipelineError extends StreamError {
	readonly failures: readonly SinkFailureError[]

	constructor(failures: readonly SinkFailureError[]) {
		super(
			`${failures.length} sink(s) failed: ${failures.map(failure => failure.sink).join(', ')}`,
			'PIPELINE_FAILED'
		)
		this.name = 'PipelineError'
		this.failures = failures
	}
}

export class ConfigError extends StreamError {
	readonly issues: readonly string[]

	constructor(message: string, issues: readonly string[] = []) {
		super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'INVALID_CONFIG')
		this.name = 'ConfigError'
		this.issues = issues
	}
}

export class TopologyError extends StreamError {
	constructor(message: string) {
		super(message, 'INVALID_TOPOLOGY')
		this.name = 'TopologyError'
	}
}

export class InvalidTimestampError extends StreamError {
	constructor(message: string) {
		super(message, 'INVALID_TIMESTAMP')
		this.name = 'InvalidTimestampError'
	}
}

export class InvalidWindowDurationError extends StreamError {
	readonly duration: unknown

	constructor(duration: unknown, reason = 'expected a positive number of ms or <n>ms|s|m|h|d') {
		super(`Invalid window duration ${JSON.stringify(duration)}: ${reason}`, 'INVALID_WINDOW_DURATION')
		this.name = 'InvalidWindowDurationError'
		this.duration = duration
	}
}

function describeCause(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause)
}
